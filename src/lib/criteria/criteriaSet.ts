import { ConfigurationError } from "../errors";
import { toPairKey } from "../keys";
import type {
  Bound,
  CriteriaBuildResult,
  CriteriaSet,
  CriterionEntry,
  RejectedCriterion
} from "./types";

const validateEntry = (entry: CriterionEntry): ConfigurationError | null => {
  if (!Number.isFinite(entry.lowerBound) || !Number.isFinite(entry.upperBound)) {
    return new ConfigurationError(entry, "bounds must be finite numbers");
  }
  if (entry.lowerBound > entry.upperBound) {
    return new ConfigurationError(
      entry,
      `lower bound ${entry.lowerBound} is greater than upper bound ${entry.upperBound}`
    );
  }
  return null;
};

const createCriteriaSet = (entries: CriterionEntry[]): CriteriaSet => {
  const byKey = new Map<string, CriterionEntry>();
  entries.forEach((entry) => {
    byKey.set(toPairKey(entry.itemNumber, entry.resultName), { ...entry });
  });

  return {
    size: byKey.size,
    lookup: (itemNumber, resultName): Bound | undefined => {
      const entry = byKey.get(toPairKey(itemNumber, resultName));
      return entry ? { lower: entry.lowerBound, upper: entry.upperBound } : undefined;
    },
    entries: () => Array.from(byKey.values(), (entry) => ({ ...entry }))
  };
};

export const EMPTY_CRITERIA: CriteriaSet = createCriteriaSet([]);

export const buildCriteriaSet = (entries: Iterable<CriterionEntry>): CriteriaBuildResult => {
  const accepted: CriterionEntry[] = [];
  const rejected: RejectedCriterion[] = [];

  for (const entry of entries) {
    const error = validateEntry(entry);
    if (error) {
      rejected.push({ entry, error });
    } else {
      accepted.push(entry);
    }
  }

  if (rejected.length > 0) {
    console.warn("[criteria] rejected entries", {
      accepted: accepted.length,
      rejected: rejected.map(({ error }) => error.message)
    });
  }

  return {
    criteria: createCriteriaSet(accepted),
    accepted,
    rejected
  };
};

export const buildCriteriaSetStrict = (entries: Iterable<CriterionEntry>): CriteriaSet => {
  const { criteria, rejected } = buildCriteriaSet(entries);
  const [firstRejected] = rejected;
  if (firstRejected) {
    throw firstRejected.error;
  }
  return criteria;
};

export type TestTypeBounds = {
  resultName: string;
  lowerBound: number;
  upperBound: number;
};

export const criteriaForItems = (
  items: Iterable<string>,
  bounds: TestTypeBounds[]
): CriterionEntry[] => {
  const entries: CriterionEntry[] = [];
  for (const itemNumber of new Set(items)) {
    bounds.forEach(({ resultName, lowerBound, upperBound }) => {
      entries.push({ itemNumber, resultName, lowerBound, upperBound });
    });
  }
  return entries;
};
