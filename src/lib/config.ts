import { z } from "zod";

export const REQUIRED_COLUMNS = ["ITEM_NUMBER", "TEST_NUMBER", "RESULT_NAME", "RESPONSE"] as const;

export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

// Summary rows the test rig writes alongside the raw measurements.
export const DEFAULT_EXCLUDED_RESULT_NAMES: readonly string[] = [
  "Ave Dim Stab Warp",
  "Std Dim Stab Warp",
  "Ave Dim Stab Fill",
  "Std Dim Stab Fill",
  "Test Complete?"
];

export const BOUND_COLUMNS = {
  lower: "Lower_Bound",
  upper: "Upper_Bound",
  status: "IS_OUTLIER"
} as const;

export const EXPORT_FILE_NAME = "anomaly_detection_results.xlsx";

export const EXPORT_MIME_TYPE =
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

const hexColor = z
  .string()
  .trim()
  .regex(/^#?[0-9a-fA-F]{6}$/, "Expected a 6 digit hex colour")
  .transform((value) => value.replace(/^#/, "").toUpperCase());

const analysisConfigSchema = z
  .object({
    excludedResultNames: z.array(z.string().min(1)).default([...DEFAULT_EXCLUDED_RESULT_NAMES]),
    exportSheetName: z.string().trim().min(1).max(31).default("Results"),
    highlightColor: hexColor.default("FFCCCC")
  })
  .strict();

export type AnalysisConfig = z.infer<typeof analysisConfigSchema>;

export type AnalysisConfigOverrides = z.input<typeof analysisConfigSchema>;

export const resolveAnalysisConfig = (overrides: AnalysisConfigOverrides = {}): AnalysisConfig =>
  analysisConfigSchema.parse(overrides);

const splitList = (value: string): string[] =>
  value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

export const readConfigFromEnv = (
  env: Record<string, string | undefined> = process.env
): AnalysisConfig => {
  const overrides: AnalysisConfigOverrides = {};
  const excluded = env.ANALYSIS_EXCLUDED_RESULT_NAMES;
  if (excluded !== undefined) {
    overrides.excludedResultNames = splitList(excluded);
  }
  if (env.EXPORT_SHEET_NAME) {
    overrides.exportSheetName = env.EXPORT_SHEET_NAME;
  }
  if (env.EXPORT_HIGHLIGHT_COLOR) {
    overrides.highlightColor = env.EXPORT_HIGHLIGHT_COLOR;
  }
  return resolveAnalysisConfig(overrides);
};
