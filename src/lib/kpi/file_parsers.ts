import path from "node:path";
import { parse as parseCsv } from "csv-parse/sync";
import ExcelJS from "exceljs";

import { ValidationError } from "./errors";

export type ParsedTable = {
  filename: string;
  columns: string[];
  rows: Record<string, string>[];
};

export function normalizeHeader(value: string) {
  return value.toLowerCase().replace(/[\s_\-()/]+/g, "").trim();
}

function toRecords(columns: string[], cells: string[][]): Record<string, string>[] {
  return cells.map((cellRow) => {
    const record: Record<string, string> = {};
    columns.forEach((column, index) => {
      record[column] = (cellRow[index] ?? "").trim();
    });
    return record;
  });
}

export function parseCsvFile(filename: string, buffer: Buffer): ParsedTable {
  const text = buffer.toString("utf8");
  let records: string[][];
  try {
    records = parseCsv(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    }) as string[][];
  } catch (error) {
    throw new ValidationError({
      reason: `Could not read ${filename} as CSV: ${error instanceof Error ? error.message : String(error)}`,
    });
  }

  const [header, ...body] = records;
  if (!header) {
    return { filename, columns: [], rows: [] };
  }

  const columns = header.map((cell) => normalizeHeader(cell));
  return { filename, columns, rows: toRecords(columns, body) };
}

function cellToString(cell: ExcelJS.Cell): string {
  const value = cell.value;
  if (value === null || value === undefined) return "";
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "object") {
    if ("text" in value && typeof value.text === "string") return value.text;
    if ("result" in value && value.result !== null && value.result !== undefined) {
      return String(value.result);
    }
    return cell.text ?? "";
  }
  return String(value);
}

export async function parseXlsxFile(filename: string, buffer: Buffer): Promise<ParsedTable> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.load(buffer);
  } catch (error) {
    throw new ValidationError({
      reason: `Could not read ${filename} as XLSX: ${error instanceof Error ? error.message : String(error)}`,
    });
  }

  const sheet = workbook.worksheets[0];
  if (!sheet || !sheet.columnCount) {
    return { filename, columns: [], rows: [] };
  }

  const columnCount = sheet.columnCount;
  const headerRow = sheet.getRow(1);
  const columns: string[] = [];
  for (let col = 1; col <= columnCount; col++) {
    columns.push(normalizeHeader(headerRow.getCell(col).text?.trim() ?? ""));
  }

  const cells: string[][] = [];
  for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber++) {
    const row = sheet.getRow(rowNumber);
    const values: string[] = [];
    for (let col = 1; col <= columnCount; col++) {
      values.push(cellToString(row.getCell(col)));
    }
    if (values.some((value) => value.trim() !== "")) {
      cells.push(values);
    }
  }

  return { filename, columns, rows: toRecords(columns, cells) };
}

export async function parseFile(filename: string, buffer: Buffer): Promise<ParsedTable> {
  const ext = path.extname(filename).toLowerCase();
  if (ext === ".csv") return parseCsvFile(filename, buffer);
  if (ext === ".xlsx") return parseXlsxFile(filename, buffer);
  if (ext === ".xls") {
    throw new ValidationError({ reason: "XLS files are not supported. Please save as .xlsx." });
  }
  throw new ValidationError({ reason: `Unsupported file type: ${ext || "(none)"}` });
}
