export type AnalysisErrorCode =
  | "SCHEMA_ERROR"
  | "CONFIGURATION_ERROR"
  | "CRITERIA_FORMAT_ERROR"
  | "IMPORT_ERROR"
  | "ANALYSIS_ABORTED";

export class AnalysisError extends Error {
  code: AnalysisErrorCode;

  constructor(code: AnalysisErrorCode, message: string) {
    super(message);
    this.name = "AnalysisError";
    this.code = code;
  }
}

export class SchemaError extends AnalysisError {
  missingColumns: string[];

  constructor(missingColumns: string[]) {
    super("SCHEMA_ERROR", `Missing required columns: ${missingColumns.join(", ")}`);
    this.name = "SchemaError";
    this.missingColumns = missingColumns;
  }
}

export type InvalidCriterion = {
  itemNumber: string;
  resultName: string;
  lowerBound: number;
  upperBound: number;
};

export class ConfigurationError extends AnalysisError {
  criterion: InvalidCriterion;

  constructor(criterion: InvalidCriterion, reason: string) {
    super(
      "CONFIGURATION_ERROR",
      `Invalid bounds for ${criterion.itemNumber} / ${criterion.resultName}: ${reason}`
    );
    this.name = "ConfigurationError";
    this.criterion = criterion;
  }
}

export class CriteriaFormatError extends AnalysisError {
  issues: string[];

  constructor(issues: string[]) {
    super("CRITERIA_FORMAT_ERROR", `Criteria file is not valid: ${issues.join("; ")}`);
    this.name = "CriteriaFormatError";
    this.issues = issues;
  }
}

export class ImportError extends AnalysisError {
  constructor(message: string) {
    super("IMPORT_ERROR", message);
    this.name = "ImportError";
  }
}

export class AnalysisAbortedError extends AnalysisError {
  processedRecords: number;

  constructor(processedRecords: number) {
    super("ANALYSIS_ABORTED", `Analysis aborted after ${processedRecords} records.`);
    this.name = "AnalysisAbortedError";
    this.processedRecords = processedRecords;
  }
}
