import type { FieldValue } from "../report/types";
import type { FlatRow } from "../storage/serialize";

export type ColumnType = "DATE" | "STRING" | "INTEGER" | "FLOAT";

export type ColumnSchema = {
  name: string;
  type: ColumnType;
};

export type TableSchema = ColumnSchema[];

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const INTEGER_TEXT = /^-?\d+$/;
const FLOAT_TEXT = /^-?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

function inferColumnType(name: string, value: FieldValue): ColumnType {
  if (typeof value === "number") return Number.isInteger(value) ? "INTEGER" : "FLOAT";
  if (name === "date" && ISO_DATE.test(value)) return "DATE";
  return "STRING";
}

/**
 * Schema autodetect from the first record. A numeric column whose first value
 * is whole is typed INTEGER unless the batch holds a fractional value for it.
 */
export function inferSchema(rows: FlatRow[]): TableSchema {
  const first = rows[0];
  if (!first) return [];
  return Object.entries(first).map(([name, value]) => {
    let type = inferColumnType(name, value);
    if (type === "INTEGER" && rows.some((row) => typeof row[name] === "number" && !Number.isInteger(row[name]))) {
      type = "FLOAT";
    }
    return { name, type };
  });
}

function valueMatches(type: ColumnType, value: FieldValue): boolean {
  switch (type) {
    case "DATE":
      return typeof value === "string" && ISO_DATE.test(value);
    case "STRING":
      return typeof value === "string";
    case "INTEGER":
      return typeof value === "number" && Number.isInteger(value);
    case "FLOAT":
      return typeof value === "number" && Number.isFinite(value);
  }
}

/** Every violation in the batch, one message each; empty when the batch conforms. */
export function validateRows(rows: FlatRow[], schema: TableSchema): string[] {
  const problems: string[] = [];
  const columns = new Map(schema.map((column) => [column.name, column.type]));

  rows.forEach((row, index) => {
    for (const [name, value] of Object.entries(row)) {
      const type = columns.get(name);
      if (!type) {
        problems.push(`row ${index}: unknown field ${name}`);
      } else if (!valueMatches(type, value)) {
        problems.push(`row ${index}: field ${name} expected ${type}, got ${JSON.stringify(value)}`);
      }
    }
    for (const column of schema) {
      if (!(column.name in row)) problems.push(`row ${index}: missing field ${column.name}`);
    }
  });

  return problems;
}

function autodetectCell(text: string): FieldValue {
  if (INTEGER_TEXT.test(text)) return Number(text);
  if (FLOAT_TEXT.test(text)) return Number(text);
  return text;
}

function coerceCell(type: ColumnType, text: string): FieldValue {
  if ((type === "INTEGER" && INTEGER_TEXT.test(text)) || (type === "FLOAT" && FLOAT_TEXT.test(text))) {
    return Number(text);
  }
  // Left as text so validation reports the mismatch instead of a silent zero.
  return text;
}

/**
 * Turns CSV string rows into typed rows. With a schema, columns are typed by
 * the schema; without one, numeric-looking cells become numbers.
 */
export function coerceCsvRows(header: string[], rows: string[][], schema?: TableSchema): FlatRow[] {
  const types = new Map((schema ?? []).map((column) => [column.name, column.type]));
  return rows.map((cells) => {
    const row: FlatRow = {};
    header.forEach((name, i) => {
      const text = cells[i] ?? "";
      const type = types.get(name);
      row[name] = schema ? (type ? coerceCell(type, text) : text) : autodetectCell(text);
    });
    return row;
  });
}
