import { ImportError } from "../errors";
import { parseCsvText } from "./parseCsv";
import { parseXlsxBuffer } from "./parseXlsx";
import type { RawTable } from "./types";

export type UploadedFile = {
  name: string;
  text: () => Promise<string>;
  arrayBuffer: () => Promise<ArrayBuffer>;
};

export type ParsedUpload = {
  fileType: "csv" | "xlsx";
  sheetNames: string[];
  activeTable: RawTable;
};

const fileExtension = (name: string): string => name.split(".").pop()?.toLowerCase() ?? "";

export const parseUpload = async (file: UploadedFile): Promise<ParsedUpload> => {
  const extension = fileExtension(file.name);
  if (extension === "csv") {
    const table = parseCsvText(await file.text());
    return {
      fileType: "csv",
      sheetNames: [],
      activeTable: table
    };
  }

  if (extension === "xlsx") {
    let tables: RawTable[];
    try {
      tables = parseXlsxBuffer(await file.arrayBuffer());
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ImportError(`Error reading Excel file: ${reason}`);
    }
    const [activeTable] = tables;
    if (!activeTable) {
      throw new ImportError("No sheets detected in the XLSX file.");
    }
    return {
      fileType: "xlsx",
      sheetNames: tables.map((table) => table.sheetName ?? "Sheet"),
      activeTable
    };
  }

  throw new ImportError("Unsupported file type. Please upload a .csv or .xlsx file.");
};
