import { ImportError } from "../errors";
import type { CellValue, RawTable } from "./types";

const DELIMITERS = [",", ";"] as const;

type Delimiter = (typeof DELIMITERS)[number];

// Counts candidates on the header record only, ignoring quoted text.
const pickDelimiter = (text: string): Delimiter => {
  const counts = new Map<string, number>();
  let quoted = false;
  for (const char of text) {
    if (char === '"') {
      quoted = !quoted;
    } else if (!quoted && char === "\n") {
      break;
    } else if (!quoted) {
      counts.set(char, (counts.get(char) ?? 0) + 1);
    }
  }
  return (counts.get(";") ?? 0) > (counts.get(",") ?? 0) ? ";" : ",";
};

// Splits the whole text into records so quoted cells may span lines.
const readRecords = (text: string, delimiter: Delimiter): string[][] => {
  const records: string[][] = [];
  let record: string[] = [];
  let cell = "";
  let quoted = false;

  const endCell = () => {
    record.push(cell);
    cell = "";
  };
  const endRecord = () => {
    endCell();
    records.push(record);
    record = [];
  };

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];
    if (quoted) {
      if (char !== '"') {
        cell += char;
      } else if (text[index + 1] === '"') {
        cell += '"';
        index += 1;
      } else {
        quoted = false;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === delimiter) {
      endCell();
    } else if (char === "\n") {
      endRecord();
    } else {
      cell += char;
    }
  }
  if (cell !== "" || record.length > 0) {
    endRecord();
  }

  return records.filter((values) => values.some((value) => value.trim() !== ""));
};

// Text stays verbatim; numeric reading happens where a value is compared.
const toCell = (value: string | undefined): CellValue =>
  value === undefined || value.trim() === "" ? null : value;

const toHeader = (value: string, index: number): string => value.trim() || `Column ${index + 1}`;

export const parseCsvText = (text: string): RawTable => {
  const normalized = text.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
  const delimiter = pickDelimiter(normalized);
  const [headerValues, ...rowValues] = readRecords(normalized, delimiter);
  if (!headerValues) {
    throw new ImportError("CSV appears to be empty.");
  }

  const headers = headerValues.map(toHeader);
  return {
    headers,
    rows: rowValues.map((values) => headers.map((_, index) => toCell(values[index])))
  };
};
