import { toPairKey } from "../keys";
import type { CriterionEntry } from "./types";

export type CriteriaStore = {
  load: (itemNumber: string, resultName: string) => Promise<CriterionEntry | null>;
  save: (entry: CriterionEntry) => Promise<void>;
  remove: (itemNumber: string, resultName: string) => Promise<boolean>;
  list: (itemNumber?: string) => Promise<CriterionEntry[]>;
};

export const createMemoryCriteriaStore = (initial: CriterionEntry[] = []): CriteriaStore => {
  const entries = new Map<string, CriterionEntry>();
  initial.forEach((entry) => entries.set(toPairKey(entry.itemNumber, entry.resultName), { ...entry }));

  return {
    load: async (itemNumber, resultName) => {
      const entry = entries.get(toPairKey(itemNumber, resultName));
      return entry ? { ...entry } : null;
    },
    save: async (entry) => {
      entries.set(toPairKey(entry.itemNumber, entry.resultName), { ...entry });
    },
    remove: async (itemNumber, resultName) => entries.delete(toPairKey(itemNumber, resultName)),
    list: async (itemNumber) =>
      Array.from(entries.values())
        .filter((entry) => itemNumber === undefined || entry.itemNumber === itemNumber)
        .map((entry) => ({ ...entry }))
  };
};

export const loadCriteriaEntries = async (
  store: CriteriaStore,
  items: Iterable<string>,
  resultNames: Iterable<string>
): Promise<CriterionEntry[]> => {
  const names = Array.from(resultNames);
  const lookups: Promise<CriterionEntry | null>[] = [];
  for (const itemNumber of new Set(items)) {
    names.forEach((resultName) => lookups.push(store.load(itemNumber, resultName)));
  }
  const loaded = await Promise.all(lookups);
  return loaded.filter((entry): entry is CriterionEntry => entry !== null);
};
