import { BOUND_COLUMNS } from "../config";
import type { ClassifiedRecord, OutlierStatus } from "../detection/types";
import type { CellValue, SessionId } from "../records/types";

export type ResultNameBreakdown = {
  resultName: string;
  abnormalCount: number;
};

export type SessionBreakdown = {
  testNumber: SessionId;
  abnormalCount: number;
  resultNames: string[];
};

export type AnalysisSummary = {
  total: number;
  normal: number;
  abnormal: number;
  notAnalyzed: number;
  abnormalPercentage: number;
  byResultName: ResultNameBreakdown[];
  bySession: SessionBreakdown[];
};

type SessionTally = SessionBreakdown & {
  seen: Set<string>;
};

const byCountDescending = <T extends { abnormalCount: number }>(entries: T[]): T[] =>
  // Array#sort is stable, so equal counts keep first-seen order.
  [...entries].sort((a, b) => b.abnormalCount - a.abnormalCount);

export const summarizeClassifiedRecords = (
  records: Iterable<ClassifiedRecord>
): AnalysisSummary => {
  const counts: Record<OutlierStatus, number> = { NORMAL: 0, ABNORMAL: 0, NOT_ANALYZED: 0 };
  const resultNames = new Map<string, ResultNameBreakdown>();
  const sessions = new Map<SessionId, SessionTally>();

  for (const record of records) {
    counts[record.status] += 1;
    if (record.status !== "ABNORMAL") {
      continue;
    }

    const byName = resultNames.get(record.resultName);
    if (byName) {
      byName.abnormalCount += 1;
    } else {
      resultNames.set(record.resultName, { resultName: record.resultName, abnormalCount: 1 });
    }

    if (record.testNumber === null) {
      continue;
    }
    let session = sessions.get(record.testNumber);
    if (!session) {
      session = { testNumber: record.testNumber, abnormalCount: 0, resultNames: [], seen: new Set() };
      sessions.set(record.testNumber, session);
    }
    session.abnormalCount += 1;
    if (!session.seen.has(record.resultName)) {
      session.seen.add(record.resultName);
      session.resultNames.push(record.resultName);
    }
  }

  const evaluated = counts.NORMAL + counts.ABNORMAL;

  return {
    total: counts.NORMAL + counts.ABNORMAL + counts.NOT_ANALYZED,
    normal: counts.NORMAL,
    abnormal: counts.ABNORMAL,
    notAnalyzed: counts.NOT_ANALYZED,
    abnormalPercentage: evaluated === 0 ? 0 : (counts.ABNORMAL / evaluated) * 100,
    byResultName: byCountDescending(Array.from(resultNames.values())),
    bySession: byCountDescending(
      Array.from(sessions.values(), ({ testNumber, abnormalCount, resultNames: names }) => ({
        testNumber,
        abnormalCount,
        resultNames: names
      }))
    )
  };
};

export const formatPercentage = (value: number): string => `${value.toFixed(1)}%`;

export const ANOMALY_VIEW_COLUMNS = [
  "ITEM_NUMBER",
  "TEST_NUMBER",
  "RESULT_NAME",
  "RESPONSE",
  BOUND_COLUMNS.lower,
  BOUND_COLUMNS.upper,
  BOUND_COLUMNS.status
] as const;

export type AnomalyViewColumn = (typeof ANOMALY_VIEW_COLUMNS)[number];

export type AnomalyRow = {
  rowIndex: number;
  values: Record<AnomalyViewColumn, CellValue>;
};

export const selectAnomalyRecords = (records: Iterable<ClassifiedRecord>): AnomalyRow[] => {
  const rows: AnomalyRow[] = [];
  for (const record of records) {
    if (record.status !== "ABNORMAL") {
      continue;
    }
    rows.push({
      rowIndex: record.rowIndex,
      values: {
        ITEM_NUMBER: record.itemNumber,
        TEST_NUMBER: record.testNumber,
        RESULT_NAME: record.resultName,
        RESPONSE: record.response,
        Lower_Bound: record.lowerBound,
        Upper_Bound: record.upperBound,
        IS_OUTLIER: record.status
      }
    });
  }
  return rows;
};
