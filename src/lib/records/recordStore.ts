import { DEFAULT_EXCLUDED_RESULT_NAMES, REQUIRED_COLUMNS, type RequiredColumn } from "../config";
import { SchemaError } from "../errors";
import { toPairKey } from "../keys";
import { formatCellText, toNumericValue } from "./numeric";
import type {
  CellValue,
  DatasetStats,
  RawTable,
  SessionId,
  TestRecord,
  ValueRange
} from "./types";

export type RecordStore = {
  readonly columns: readonly string[];
  readonly records: readonly TestRecord[];
  distinctItems: () => string[];
  distinctResultNames: (excluding?: Iterable<string>, items?: Iterable<string>) => string[];
  valueRange: (itemNumber: string, resultName: string) => ValueRange | null;
  valueRangeAcross: (items: Iterable<string>, resultName: string) => ValueRange | null;
  filterByItems: (items: Iterable<string>) => TestRecord[];
  testCount: (itemNumber: string) => number;
  stats: () => DatasetStats;
};

type ItemIndex = {
  resultNames: string[];
  testNumbers: Set<SessionId>;
};

const toKeyText = (value: CellValue | undefined): string => formatCellText(value);

// Canonical number text such as "100" shares a session with the number 100; "007" or "1e2" stay text.
const toSessionId = (value: CellValue | undefined): SessionId | null => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  const text = formatCellText(value).trim();
  if (!text) {
    return null;
  }
  const numeric = toNumericValue(text);
  return numeric !== null && String(numeric) === text ? numeric : text;
};

const freezeRecord = (record: TestRecord): TestRecord =>
  Object.freeze({
    ...record,
    fields: Object.freeze(record.fields.map((field) => Object.freeze(field)))
  });

const mergeRange = (range: ValueRange | undefined, value: number): ValueRange =>
  range
    ? { min: Math.min(range.min, value), max: Math.max(range.max, value) }
    : { min: value, max: value };

const resolveColumnIndexes = (headers: string[]): Record<RequiredColumn, number> => {
  const missing = REQUIRED_COLUMNS.filter((column) => !headers.includes(column));
  if (missing.length > 0) {
    throw new SchemaError(missing);
  }
  return {
    ITEM_NUMBER: headers.indexOf("ITEM_NUMBER"),
    TEST_NUMBER: headers.indexOf("TEST_NUMBER"),
    RESULT_NAME: headers.indexOf("RESULT_NAME"),
    RESPONSE: headers.indexOf("RESPONSE")
  };
};

export const loadRecordStore = (table: RawTable): RecordStore => {
  const columns = Object.freeze([...table.headers]);
  const indexes = resolveColumnIndexes(table.headers);

  const items = new Map<string, ItemIndex>();
  const resultNames: string[] = [];
  const seenResultNames = new Set<string>();
  const ranges = new Map<string, ValueRange>();
  const allTests = new Set<SessionId>();

  const records = table.rows.map((row, rowIndex): TestRecord => {
    const record: TestRecord = {
      rowIndex,
      itemNumber: toKeyText(row[indexes.ITEM_NUMBER]),
      testNumber: toSessionId(row[indexes.TEST_NUMBER]),
      resultName: toKeyText(row[indexes.RESULT_NAME]),
      response: row[indexes.RESPONSE] ?? null,
      fields: columns.map((column, index) => ({ column, value: row[index] ?? null }))
    };

    let item = items.get(record.itemNumber);
    if (!item) {
      item = { resultNames: [], testNumbers: new Set() };
      items.set(record.itemNumber, item);
    }
    if (!item.resultNames.includes(record.resultName)) {
      item.resultNames.push(record.resultName);
    }
    if (!seenResultNames.has(record.resultName)) {
      seenResultNames.add(record.resultName);
      resultNames.push(record.resultName);
    }
    if (record.testNumber !== null) {
      item.testNumbers.add(record.testNumber);
      allTests.add(record.testNumber);
    }

    const numeric = toNumericValue(record.response);
    if (numeric !== null) {
      const key = toPairKey(record.itemNumber, record.resultName);
      ranges.set(key, mergeRange(ranges.get(key), numeric));
    }

    return freezeRecord(record);
  });

  const frozenRecords = Object.freeze(records);

  const distinctResultNames = (
    excluding: Iterable<string> = DEFAULT_EXCLUDED_RESULT_NAMES,
    selectedItems?: Iterable<string>
  ): string[] => {
    const excluded = new Set(excluding);
    let candidates = resultNames;
    if (selectedItems !== undefined) {
      const selected = new Set(selectedItems);
      const inSelection = new Set<string>();
      selected.forEach((itemNumber) => {
        items.get(itemNumber)?.resultNames.forEach((name) => inSelection.add(name));
      });
      candidates = resultNames.filter((name) => inSelection.has(name));
    }
    return candidates.filter((name) => !excluded.has(name));
  };

  const valueRange = (itemNumber: string, resultName: string): ValueRange | null =>
    ranges.get(toPairKey(itemNumber, resultName)) ?? null;

  const valueRangeAcross = (selectedItems: Iterable<string>, resultName: string) => {
    let combined: ValueRange | undefined;
    for (const itemNumber of new Set(selectedItems)) {
      const range = valueRange(itemNumber, resultName);
      if (range) {
        combined = mergeRange(mergeRange(combined, range.min), range.max);
      }
    }
    return combined ?? null;
  };

  const filterByItems = (selectedItems: Iterable<string>): TestRecord[] => {
    const selected = new Set(selectedItems);
    return frozenRecords.filter((record) => selected.has(record.itemNumber));
  };

  console.info("[records] loaded", {
    sheetName: table.sheetName ?? null,
    rows: records.length,
    items: items.size,
    columns: columns.length
  });

  return {
    columns,
    records: frozenRecords,
    distinctItems: () => Array.from(items.keys()),
    distinctResultNames,
    valueRange,
    valueRangeAcross,
    filterByItems,
    testCount: (itemNumber) => items.get(itemNumber)?.testNumbers.size ?? 0,
    stats: () => ({
      totalRows: records.length,
      totalItems: items.size,
      totalTests: allTests.size
    })
  };
};
