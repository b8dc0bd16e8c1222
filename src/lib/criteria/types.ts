import type { ConfigurationError } from "../errors";

export type Bound = {
  lower: number;
  upper: number;
};

export type CriterionEntry = {
  itemNumber: string;
  resultName: string;
  lowerBound: number;
  upperBound: number;
};

export type CriteriaSet = {
  readonly size: number;
  lookup: (itemNumber: string, resultName: string) => Bound | undefined;
  entries: () => CriterionEntry[];
};

export type RejectedCriterion = {
  entry: CriterionEntry;
  error: ConfigurationError;
};

export type CriteriaBuildResult = {
  criteria: CriteriaSet;
  accepted: CriterionEntry[];
  rejected: RejectedCriterion[];
};
