import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";

export interface CsvTable {
  columns: string[];
  rows: Record<string, string>[];
}

export interface ParseCsvOptions {
  /** Reject records whose cell count differs from the header. */
  strictColumns?: boolean;
}

export function parseCsv(text: string, options: ParseCsvOptions = {}): CsvTable {
  const parsed: unknown = parse(text, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: !options.strictColumns,
  });
  if (!Array.isArray(parsed) || parsed.length === 0) {
    return { columns: [], rows: [] };
  }
  const matrix = parsed.map((record) => toCells(record));
  const [columns, ...body] = matrix;
  const rows = body.map((cells) => {
    const row: Record<string, string> = {};
    columns.forEach((column, index) => {
      row[column] = cells[index] ?? "";
    });
    return row;
  });
  return { columns, rows };
}

export function formatCsvHeader(columns: readonly string[]): string {
  return stringify([[...columns]]);
}

export function formatCsvRows(columns: readonly string[], rows: Record<string, string>[]): string {
  if (rows.length === 0) {
    return "";
  }
  return stringify(rows.map((row) => columns.map((column) => row[column] ?? "")));
}

export function formatCsv(table: CsvTable): string {
  return formatCsvHeader(table.columns) + formatCsvRows(table.columns, table.rows);
}

function toCells(record: unknown): string[] {
  if (!Array.isArray(record)) {
    return [];
  }
  return record.map((cell) => (typeof cell === "string" ? cell : String(cell ?? "")));
}
