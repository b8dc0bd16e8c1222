import type { ClassifiedRecord } from "../lib/detection/types";
import type { CellValue, RawTable } from "../lib/records/types";

export const HEADERS = ["ITEM_NUMBER", "TEST_NUMBER", "RESULT_NAME", "RESPONSE", "OPERATOR"];

export const buildTable = (rows: CellValue[][], headers: string[] = HEADERS): RawTable => ({
  sheetName: "Data",
  headers: [...headers],
  rows
});

export const warpRows = (): CellValue[][] => [
  ["A001", 100, "Dim Stab Warp", -5.0, "op-1"],
  ["A001", 100, "Dim Stab Warp", -3.0, "op-1"],
  ["A001", 100, "Dim Stab Warp", -2.75, "op-2"]
];

export const warpCriterion = {
  itemNumber: "A001",
  resultName: "Dim Stab Warp",
  lowerBound: -4.75,
  upperBound: -2.75
};

let nextRowIndex = 0;

export const buildClassified = (overrides: Partial<ClassifiedRecord> = {}): ClassifiedRecord => {
  const rowIndex = overrides.rowIndex ?? nextRowIndex++;
  return {
    rowIndex,
    itemNumber: "A001",
    testNumber: 1,
    resultName: "Dim Stab Warp",
    response: 0,
    fields: [],
    lowerBound: null,
    upperBound: null,
    status: "NOT_ANALYZED",
    ...overrides
  };
};

export const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};
