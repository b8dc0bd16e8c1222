import { isBlankCell, toNumericValue } from "./numeric";
import type { RecordStore } from "./recordStore";
import type { DatasetStats } from "./types";

export type FindingSeverity = "info" | "warn" | "error";

export type LoadStatus = "clean" | "needs-info" | "broken";

export type LoadFindingCode =
  | "EMPTY_DATASET"
  | "MISSING_KEY_VALUES"
  | "NON_NUMERIC_RESPONSES"
  | "MISSING_RESPONSES";

export type LoadFinding = {
  code: LoadFindingCode;
  severity: FindingSeverity;
  title: string;
  description: string;
  hint?: string;
  details?: {
    rowCount?: number;
  };
};

export type LoadReport = {
  status: LoadStatus;
  stats: DatasetStats;
  findings: LoadFinding[];
};

export const checkEmptyDataset = (store: RecordStore): LoadFinding | null => {
  if (store.records.length > 0) {
    return null;
  }
  return {
    code: "EMPTY_DATASET",
    severity: "warn",
    title: "No data rows",
    description: "The sheet has the required columns but contains no measurements.",
    hint: "Check that the first sheet of the workbook holds the test results."
  };
};

export const checkMissingKeyValues = (store: RecordStore): LoadFinding | null => {
  const rowCount = store.records.filter(
    (record) => record.itemNumber.trim() === "" || record.resultName.trim() === ""
  ).length;
  if (rowCount === 0) {
    return null;
  }
  return {
    code: "MISSING_KEY_VALUES",
    severity: "warn",
    title: "Rows without product or test type",
    description:
      "Some rows have an empty ITEM_NUMBER or RESULT_NAME. No criterion can match them, so they are never analyzed.",
    hint: "Fill in the missing identifiers in the source file.",
    details: { rowCount }
  };
};

export const checkNonNumericResponses = (store: RecordStore): LoadFinding | null => {
  const rowCount = store.records.filter(
    (record) => !isBlankCell(record.response) && toNumericValue(record.response) === null
  ).length;
  if (rowCount === 0) {
    return null;
  }
  return {
    code: "NON_NUMERIC_RESPONSES",
    severity: "info",
    title: "Text responses present",
    description:
      "Some RESPONSE values are text (for example Yes/No answers). They are kept in the export but cannot be checked against bounds.",
    details: { rowCount }
  };
};

export const checkMissingResponses = (store: RecordStore): LoadFinding | null => {
  const rowCount = store.records.filter((record) => isBlankCell(record.response)).length;
  if (rowCount === 0) {
    return null;
  }
  return {
    code: "MISSING_RESPONSES",
    severity: "info",
    title: "Empty responses",
    description: "Some rows have no RESPONSE value and will be reported as not analyzed.",
    details: { rowCount }
  };
};

export const getLoadFindings = (store: RecordStore): LoadFinding[] => {
  const findings = [
    checkEmptyDataset(store),
    checkMissingKeyValues(store),
    checkNonNumericResponses(store),
    checkMissingResponses(store)
  ];
  return findings.filter((finding): finding is LoadFinding => Boolean(finding));
};

export const resolveStatus = (findings: LoadFinding[]): LoadStatus => {
  if (findings.some((finding) => finding.severity === "error")) {
    return "broken";
  }
  if (findings.length > 0) {
    return "needs-info";
  }
  return "clean";
};

export const generateLoadReport = (store: RecordStore): LoadReport => {
  const findings = getLoadFindings(store);
  return {
    status: resolveStatus(findings),
    stats: store.stats(),
    findings
  };
};
