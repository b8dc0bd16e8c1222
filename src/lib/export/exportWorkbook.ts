import ExcelJS, { type Fill } from "exceljs";
import {
  BOUND_COLUMNS,
  EXPORT_FILE_NAME,
  EXPORT_MIME_TYPE,
  REQUIRED_COLUMNS,
  resolveAnalysisConfig
} from "../config";
import type { ClassifiedRecord } from "../detection/types";
import type { CellValue } from "../records/types";

export type ExportOptions = {
  columns?: readonly string[];
  sheetName?: string;
  highlightColor?: string;
};

const resolveColumns = (
  records: readonly ClassifiedRecord[],
  columns: readonly string[] | undefined
): readonly string[] => {
  if (columns) {
    return columns;
  }
  const [first] = records;
  return first ? first.fields.map((field) => field.column) : REQUIRED_COLUMNS;
};

// Values are looked up by column name; a name listed twice takes its next occurrence in the record.
const toRowValues = (record: ClassifiedRecord, columns: readonly string[]): CellValue[] => {
  const byColumn = new Map<string, CellValue[]>();
  record.fields.forEach((field) => {
    const values = byColumn.get(field.column);
    if (values) {
      values.push(field.value);
    } else {
      byColumn.set(field.column, [field.value]);
    }
  });
  const taken = new Map<string, number>();
  const values = columns.map((column) => {
    const occurrence = taken.get(column) ?? 0;
    taken.set(column, occurrence + 1);
    return byColumn.get(column)?.[occurrence] ?? null;
  });
  values.push(record.lowerBound, record.upperBound, record.status);
  return values;
};

const toArrayBuffer = (written: ArrayBuffer): ArrayBuffer => {
  const bytes = new Uint8Array(written);
  const result = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(result).set(bytes);
  return result;
};

export const exportResultsWorkbook = async (
  records: readonly ClassifiedRecord[],
  options: ExportOptions = {}
): Promise<ArrayBuffer> => {
  const config = resolveAnalysisConfig({
    exportSheetName: options.sheetName,
    highlightColor: options.highlightColor
  });
  const columns = resolveColumns(records, options.columns);
  const header = [...columns, BOUND_COLUMNS.lower, BOUND_COLUMNS.upper, BOUND_COLUMNS.status];

  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet(config.exportSheetName);
  worksheet.addRow(header);

  const highlight: Fill = {
    type: "pattern",
    pattern: "solid",
    fgColor: { argb: `FF${config.highlightColor}` }
  };

  let highlighted = 0;
  records.forEach((record) => {
    const row = worksheet.addRow(toRowValues(record, columns));
    if (record.status !== "ABNORMAL") {
      return;
    }
    highlighted += 1;
    for (let column = 1; column <= header.length; column += 1) {
      row.getCell(column).fill = highlight;
    }
  });

  // Under Node the writer hands back a Buffer view; copy it into a standalone ArrayBuffer.
  const buffer = toArrayBuffer(await workbook.xlsx.writeBuffer());
  console.info("[export] workbook written", {
    sheetName: config.exportSheetName,
    rows: records.length,
    highlighted
  });
  return buffer;
};

export type ResultsDownload = {
  fileName: string;
  mimeType: string;
  data: ArrayBuffer;
};

export const buildResultsDownload = async (
  records: readonly ClassifiedRecord[],
  options: ExportOptions = {}
): Promise<ResultsDownload> => ({
  fileName: EXPORT_FILE_NAME,
  mimeType: EXPORT_MIME_TYPE,
  data: await exportResultsWorkbook(records, options)
});
