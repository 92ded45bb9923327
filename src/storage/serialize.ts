import type { FieldValue } from "../report/types";

export type SourceFormat = "csv" | "ndjson";

export type FlatRow = Record<string, FieldValue>;

function csvCell(value: FieldValue): string {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/** Header row from `columns`, then one line per row. Missing values are written empty. */
export function recordsToCsv(rows: FlatRow[], columns: string[]): string {
  const lines = [columns.map(csvCell).join(",")];
  for (const row of rows) {
    lines.push(columns.map((column) => csvCell(row[column] ?? "")).join(","));
  }
  return `${lines.join("\n")}\n`;
}

export function recordsToNdjson(rows: FlatRow[]): string {
  if (rows.length === 0) return "";
  return `${rows.map((row) => JSON.stringify(row)).join("\n")}\n`;
}

export function parseCsv(content: string): string[][] {
  const rows: string[][] = [];
  let current: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < content.length; i += 1) {
    const char = content[i];
    if (char === '"') {
      const next = content[i + 1];
      if (inQuotes && next === '"') {
        field += '"';
        i += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (char === "," && !inQuotes) {
      current.push(field);
      field = "";
      continue;
    }

    if ((char === "\n" || char === "\r") && !inQuotes) {
      if (char === "\r" && content[i + 1] === "\n") i += 1;
      current.push(field);
      rows.push(current);
      current = [];
      field = "";
      continue;
    }

    field += char;
  }

  if (field.length > 0 || current.length > 0) {
    current.push(field);
    rows.push(current);
  }

  return rows.filter((row) => row.some((cell) => cell.length > 0));
}

function isFieldValue(value: unknown): value is FieldValue {
  return typeof value === "string" || (typeof value === "number" && Number.isFinite(value));
}

/** Parses newline-delimited JSON objects; nested or null values are rejected. */
export function parseNdjson(content: string): FlatRow[] {
  const rows: FlatRow[] = [];
  const lines = content.split(/\r?\n/);
  lines.forEach((line, index) => {
    if (!line.trim()) return;
    const parsed: unknown = JSON.parse(line);
    if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
      throw new Error(`NDJSON line ${index + 1} is not an object`);
    }
    const row: FlatRow = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (!isFieldValue(value)) {
        throw new Error(`NDJSON line ${index + 1}: field ${key} is not a string or number`);
      }
      row[key] = value;
    }
    rows.push(row);
  });
  return rows;
}
