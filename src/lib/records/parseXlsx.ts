import * as XLSX from "xlsx";
import { formatCellText } from "./numeric";
import type { CellValue, RawTable } from "./types";

const normalizeCell = (value: unknown): CellValue => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === "boolean" || typeof value === "string") {
    return value;
  }
  return String(value);
};

const buildHeaders = (rawHeaders: unknown[]): string[] =>
  Array.from(rawHeaders, (header, index) => {
    const label = formatCellText(normalizeCell(header));
    return label === "" ? `Column ${index + 1}` : label;
  });

export const parseXlsxBuffer = (buffer: ArrayBuffer | Uint8Array): RawTable[] => {
  const workbook = XLSX.read(buffer, { type: "array", cellDates: true });
  return workbook.SheetNames.map((sheetName) => {
    const sheet = workbook.Sheets[sheetName];
    const rows: unknown[][] = sheet
      ? XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, blankrows: false })
      : [];

    const headers = buildHeaders(rows[0] ?? []);
    const dataRows = rows.slice(1).map((row) => headers.map((_, index) => normalizeCell(row[index])));

    return {
      sheetName,
      headers,
      rows: dataRows
    };
  });
};
