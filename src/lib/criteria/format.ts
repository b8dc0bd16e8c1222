import { z } from "zod";
import { CriteriaFormatError } from "../errors";
import { isNumericText } from "../records/numeric";
import type { CriteriaSet, CriterionEntry } from "./types";

const keyText = z.union([z.string(), z.number().finite().transform((value) => String(value))]);

const boundValue = z.union([
  z.number(),
  z
    .string()
    .refine(isNumericText, { message: "Expected a number" })
    .transform((value) => Number(value.trim()))
]);

const criterionRecordSchema = z.object({
  item_number: keyText,
  result_name: keyText,
  lower_bound: boundValue,
  upper_bound: boundValue
});

const criteriaFileSchema = z.array(criterionRecordSchema);

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );

export const parseCriteriaRecords = (input: unknown): CriterionEntry[] => {
  const parsed = criteriaFileSchema.safeParse(input);
  if (!parsed.success) {
    throw new CriteriaFormatError(formatIssues(parsed.error));
  }
  return parsed.data.map((record) => ({
    itemNumber: record.item_number,
    resultName: record.result_name,
    lowerBound: record.lower_bound,
    upperBound: record.upper_bound
  }));
};

export const parseCriteriaJson = (text: string): CriterionEntry[] => {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CriteriaFormatError([`Invalid JSON: ${reason}`]);
  }
  return parseCriteriaRecords(payload);
};

export type SerializedCriterion = {
  item_number: string;
  result_name: string;
  lower_bound: number;
  upper_bound: number;
};

export const serializeCriteria = (criteria: CriteriaSet): SerializedCriterion[] =>
  criteria.entries().map((entry) => ({
    item_number: entry.itemNumber,
    result_name: entry.resultName,
    lower_bound: entry.lowerBound,
    upper_bound: entry.upperBound
  }));
