import { DEFAULT_EXCLUDED_RESULT_NAMES } from "../config";
import type { CriteriaSet } from "../criteria/types";
import { classifyRecords, isCoercionMiss } from "../detection/classify";
import type { ClassifiedRecord } from "../detection/types";
import { AnalysisAbortedError } from "../errors";
import type { RecordStore } from "../records/recordStore";
import { summarizeClassifiedRecords, type AnalysisSummary } from "./summary";

export type AnalysisDiagnosticCode = "EMPTY_SELECTION" | "NUMERIC_COERCION";

export type AnalysisDiagnostic = {
  code: AnalysisDiagnosticCode;
  severity: "info" | "warn";
  title: string;
  description: string;
  details?: {
    rowCount?: number;
  };
};

export type AnalysisRequest = {
  store: RecordStore;
  criteria: CriteriaSet;
  selectedItems?: Iterable<string>;
  excludedResultNames?: Iterable<string>;
  signal?: AbortSignal;
};

export type AnalysisRun = {
  columns: readonly string[];
  records: ClassifiedRecord[];
  summary: AnalysisSummary;
  diagnostics: AnalysisDiagnostic[];
};

const emptySelectionDiagnostic = (noItems: boolean): AnalysisDiagnostic => ({
  code: "EMPTY_SELECTION",
  severity: "info",
  title: noItems ? "No products selected" : "Nothing to analyze",
  description: noItems
    ? "No ITEM_NUMBER was selected, so the run produced no classified rows."
    : "Neither criteria nor records were supplied. Every row is reported as not analyzed."
});

const coercionDiagnostic = (rowCount: number): AnalysisDiagnostic => ({
  code: "NUMERIC_COERCION",
  severity: "warn",
  title: "Responses could not be checked",
  description:
    "A bound applies to these rows but their RESPONSE is not a number. They are reported as not analyzed.",
  details: { rowCount }
});

export const runAnalysis = ({
  store,
  criteria,
  selectedItems,
  excludedResultNames = DEFAULT_EXCLUDED_RESULT_NAMES,
  signal
}: AnalysisRequest): AnalysisRun => {
  const items = selectedItems === undefined ? store.distinctItems() : Array.from(new Set(selectedItems));
  const excluded = new Set(excludedResultNames);
  const selected = store.filterByItems(items);

  console.info("[analysis] start", {
    items: items.length,
    records: selected.length,
    criteria: criteria.size,
    excluded: excluded.size
  });

  let records: ClassifiedRecord[];
  try {
    records = classifyRecords(selected, criteria, { signal, excludedResultNames: excluded });
  } catch (error) {
    if (error instanceof AnalysisAbortedError) {
      console.warn("[analysis] aborted", { processedRecords: error.processedRecords });
    }
    throw error;
  }

  const summary = summarizeClassifiedRecords(records);
  const diagnostics: AnalysisDiagnostic[] = [];
  if (selectedItems !== undefined && items.length === 0) {
    diagnostics.push(emptySelectionDiagnostic(true));
  } else if (criteria.size === 0 && store.records.length === 0) {
    diagnostics.push(emptySelectionDiagnostic(false));
  }
  const coercionMisses = records.filter(isCoercionMiss).length;
  if (coercionMisses > 0) {
    diagnostics.push(coercionDiagnostic(coercionMisses));
  }

  console.info("[analysis] complete", {
    total: summary.total,
    abnormal: summary.abnormal,
    notAnalyzed: summary.notAnalyzed,
    diagnostics: diagnostics.map((diagnostic) => diagnostic.code)
  });

  return {
    columns: store.columns,
    records,
    summary,
    diagnostics
  };
};
