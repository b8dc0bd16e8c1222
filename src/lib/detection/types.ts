import type { TestRecord } from "../records/types";

export type OutlierStatus = "NORMAL" | "ABNORMAL" | "NOT_ANALYZED";

export type ClassifiedRecord = TestRecord & {
  lowerBound: number | null;
  upperBound: number | null;
  status: OutlierStatus;
};
