import type { CriteriaSet } from "../criteria/types";
import { AnalysisAbortedError } from "../errors";
import { toNumericValue } from "../records/numeric";
import type { TestRecord } from "../records/types";
import type { ClassifiedRecord, OutlierStatus } from "./types";

export type ClassifyOptions = {
  signal?: AbortSignal;
  // Result names that stay NOT_ANALYZED whatever the criteria say.
  excludedResultNames?: ReadonlySet<string>;
};

const stripDerived = (record: TestRecord): TestRecord => ({
  rowIndex: record.rowIndex,
  itemNumber: record.itemNumber,
  testNumber: record.testNumber,
  resultName: record.resultName,
  response: record.response,
  fields: record.fields
});

export const classifyRecord = (
  record: TestRecord,
  criteria: CriteriaSet,
  excludedResultNames?: ReadonlySet<string>
): ClassifiedRecord => {
  const base = stripDerived(record);
  const bound = excludedResultNames?.has(record.resultName)
    ? undefined
    : criteria.lookup(record.itemNumber, record.resultName);

  if (!bound) {
    return { ...base, lowerBound: null, upperBound: null, status: "NOT_ANALYZED" };
  }

  const response = toNumericValue(record.response);
  let status: OutlierStatus = "NOT_ANALYZED";
  if (response !== null) {
    status = response < bound.lower || response > bound.upper ? "ABNORMAL" : "NORMAL";
  }

  return { ...base, lowerBound: bound.lower, upperBound: bound.upper, status };
};

export const classifyRecords = (
  records: readonly TestRecord[],
  criteria: CriteriaSet,
  options: ClassifyOptions = {}
): ClassifiedRecord[] => {
  const { signal, excludedResultNames } = options;
  const classified: ClassifiedRecord[] = [];
  for (const record of records) {
    if (signal?.aborted) {
      throw new AnalysisAbortedError(classified.length);
    }
    classified.push(classifyRecord(record, criteria, excludedResultNames));
  }
  return classified;
};

// True when a bound applied but the response could not be read as a number.
export const isCoercionMiss = (record: ClassifiedRecord): boolean =>
  record.status === "NOT_ANALYZED" && record.lowerBound !== null;
