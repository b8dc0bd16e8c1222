export * from "./config";
export * from "./errors";
export type { CellValue, DatasetStats, RawTable, RecordField, SessionId, TestRecord, ValueRange } from "./records/types";
export { parseCsvText } from "./records/parseCsv";
export { parseXlsxBuffer } from "./records/parseXlsx";
export { parseUpload, type ParsedUpload, type UploadedFile } from "./records/parseUpload";
export { loadRecordStore, type RecordStore } from "./records/recordStore";
export { formatCellText, toNumericValue } from "./records/numeric";
export {
  generateLoadReport,
  getLoadFindings,
  type LoadFinding,
  type LoadReport,
  type LoadStatus
} from "./records/validation";
export type { Bound, CriteriaBuildResult, CriteriaSet, CriterionEntry, RejectedCriterion } from "./criteria/types";
export {
  EMPTY_CRITERIA,
  buildCriteriaSet,
  buildCriteriaSetStrict,
  criteriaForItems,
  type TestTypeBounds
} from "./criteria/criteriaSet";
export {
  parseCriteriaJson,
  parseCriteriaRecords,
  serializeCriteria,
  type SerializedCriterion
} from "./criteria/format";
export { createMemoryCriteriaStore, loadCriteriaEntries, type CriteriaStore } from "./criteria/criteriaStore";
export type { ClassifiedRecord, OutlierStatus } from "./detection/types";
export { classifyRecord, classifyRecords, type ClassifyOptions } from "./detection/classify";
export {
  ANOMALY_VIEW_COLUMNS,
  formatPercentage,
  selectAnomalyRecords,
  summarizeClassifiedRecords,
  type AnalysisSummary,
  type AnomalyRow,
  type ResultNameBreakdown,
  type SessionBreakdown
} from "./analysis/summary";
export {
  runAnalysis,
  type AnalysisDiagnostic,
  type AnalysisRequest,
  type AnalysisRun
} from "./analysis/runAnalysis";
export {
  buildResultsDownload,
  exportResultsWorkbook,
  type ExportOptions,
  type ResultsDownload
} from "./export/exportWorkbook";
