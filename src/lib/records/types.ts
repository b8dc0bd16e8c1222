// Passthrough cell. Dates and booleans keep their native type so exports can write them back unchanged.
export type CellValue = string | number | boolean | Date | null;

export type RawTable = {
  sheetName?: string;
  headers: string[];
  rows: CellValue[][];
};

export type RecordField = {
  readonly column: string;
  readonly value: CellValue;
};

export type SessionId = number | string;

export type TestRecord = {
  rowIndex: number;
  itemNumber: string;
  testNumber: SessionId | null;
  resultName: string;
  response: CellValue;
  fields: readonly RecordField[];
};

export type ValueRange = {
  min: number;
  max: number;
};

export type DatasetStats = {
  totalRows: number;
  totalItems: number;
  totalTests: number;
};
