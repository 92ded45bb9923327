import { Client } from "pg";
import { config as loadEnv } from "dotenv";
import { buildReportSpec, isReportKind } from "../src/report/reportSpecs";
import { createTableSql, reportTableSchema } from "../src/sink/reportSchemas";

loadEnv({ path: ".env.local" });

type ColumnRow = {
  column_name: string;
  data_type: string;
};

function getArg(flag: string): string | undefined {
  const idx = process.argv.indexOf(flag);
  if (idx === -1) return undefined;
  return process.argv[idx + 1];
}

async function main() {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error("Missing DATABASE_URL. Set it before creating report tables.");
  }

  const kind = getArg("--kind") ?? "network";
  if (!isReportKind(kind)) {
    throw new Error(`--kind must be network or mediation, got ${kind}`);
  }
  const table =
    getArg("--table") ??
    (kind === "network" ? process.env.REPORT_TABLE_NETWORK : process.env.REPORT_TABLE_MEDIATION);
  if (!table) {
    throw new Error(`Missing table name. Pass --table or set the ${kind} report table variable.`);
  }

  // Column set does not depend on the date.
  const schema = reportTableSchema(buildReportSpec(kind, "2000-01-01"));
  const sql = createTableSql(table, schema);

  const client = new Client({ connectionString: databaseUrl });
  await client.connect();

  try {
    await client.query(sql);
    const columnsResult = await client.query<ColumnRow>(
      `
      select column_name, data_type
      from information_schema.columns
      where table_schema='public' and table_name=$1
      order by ordinal_position;
      `,
      [table]
    );

    const expected = new Set(schema.map((column) => column.name));
    const actual = new Set(columnsResult.rows.map((row) => row.column_name));
    const missing = [...expected].filter((name) => !actual.has(name));
    const extra = [...actual].filter((name) => !expected.has(name));

    console.log(`Table ${table}:`);
    for (const row of columnsResult.rows) {
      console.log(`  ${row.column_name} ${row.data_type}`);
    }
    if (missing.length > 0) console.warn(`Missing columns (table predates schema): ${missing.join(", ")}`);
    if (extra.length > 0) console.warn(`Columns not written by the pipeline: ${extra.join(", ")}`);
  } finally {
    await client.end();
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
