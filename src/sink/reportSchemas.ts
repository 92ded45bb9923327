import { MICROS_SUFFIX } from "../report/decodeValue";
import { fieldName } from "../report/normalizeRow";
import { metricKindFor } from "../report/reportSpecs";
import type { ReportSpec } from "../report/types";
import type { ColumnType, TableSchema } from "./schema";

const POSTGRES_TYPES: Record<ColumnType, string> = {
  DATE: "date",
  STRING: "text",
  INTEGER: "bigint",
  FLOAT: "double precision",
};

/** Table columns produced by normalizing rows of `spec`, in record order. */
export function reportTableSchema(spec: ReportSpec): TableSchema {
  const schema: TableSchema = [{ name: "date", type: "DATE" }];
  for (const key of spec.dimensions) {
    const name = fieldName(key);
    if (name === "date") continue;
    schema.push({ name, type: "STRING" });
  }
  for (const key of spec.metrics) {
    const kind = metricKindFor(key);
    if (kind === "micros") {
      schema.push({ name: `${fieldName(key)}${MICROS_SUFFIX}`, type: "INTEGER" });
    } else {
      schema.push({ name: fieldName(key), type: kind === "integer" ? "INTEGER" : "FLOAT" });
    }
  }
  return schema;
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function createTableSql(table: string, schema: TableSchema): string {
  const columns = schema.map((column) => {
    const notNull = column.name === "date" ? " not null" : "";
    return `  ${quoteIdent(column.name)} ${POSTGRES_TYPES[column.type]}${notNull}`;
  });
  return [
    `create table if not exists ${quoteIdent(table)} (`,
    columns.join(",\n"),
    `);`,
    `create index if not exists ${quoteIdent(`${table}_date_idx`)} on ${quoteIdent(table)} ("date");`,
  ].join("\n");
}
