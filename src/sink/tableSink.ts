import type { SupabaseClient } from "@supabase/supabase-js";
import { LoadError } from "../lib/errors";
import { chunkArray } from "../lib/utils";
import type { BlobStore } from "../storage/blobStore";
import { parseCsv, parseNdjson, type FlatRow, type SourceFormat } from "../storage/serialize";
import { coerceCsvRows, inferSchema, validateRows, type TableSchema } from "./schema";

const INSERT_CHUNK_SIZE = 500;

export type LoadMode = "replace_date" | "append";

export interface TableBackend {
  /** Deletes every row whose `date` equals `date`; returns the count when the backend reports one. */
  deleteByDate(table: string, date: string): Promise<number | null>;
  appendRows(table: string, rows: FlatRow[]): Promise<void>;
}

export type LoadOptions = {
  /** Authoritative when given; otherwise inferred from the first record. */
  schema?: TableSchema;
};

export type LoadJob = {
  uri: string;
  sourceFormat: SourceFormat;
  schema?: TableSchema;
  /** CSV only: header rows to skip. The first skipped row names the columns. */
  skipLeadingRows?: number;
};

export type LoadResult = {
  table: string;
  reportDate: string;
  mode: LoadMode;
  deletedRows: number | null;
  appendedRows: number;
};

export class SupabaseTableBackend implements TableBackend {
  constructor(private readonly client: SupabaseClient) {}

  async deleteByDate(table: string, date: string): Promise<number | null> {
    const { error, count, status } = await this.client
      .from(table)
      .delete({ count: "exact" })
      .eq("date", date);
    if (error) throw new LoadError(table, "delete", error.message, status);
    return count ?? null;
  }

  async appendRows(table: string, rows: FlatRow[]): Promise<void> {
    for (const chunk of chunkArray(rows, INSERT_CHUNK_SIZE)) {
      const { error, status } = await this.client.from(table).insert(chunk);
      if (error) throw new LoadError(table, "append", error.message, status);
    }
  }
}

/**
 * Writes normalized report rows to one warehouse table.
 *
 * `replace_date` deletes the report date's rows and then appends the new set.
 * The two steps are separate calls: a failed append leaves the delete
 * committed, and rerunning the same date restores the rows without
 * duplicating them. Only one run per date may write at a time.
 */
export class TableSink {
  constructor(
    private readonly backend: TableBackend,
    private readonly table: string,
    private readonly blobs?: BlobStore
  ) {}

  get tableName(): string {
    return this.table;
  }

  async load(
    records: FlatRow[],
    reportDate: string,
    mode: LoadMode,
    options: LoadOptions = {}
  ): Promise<LoadResult> {
    const schema = options.schema ?? inferSchema(records);
    const problems = validateRows(records, schema);
    if (problems.length > 0) {
      const shown = problems.slice(0, 5).join("; ");
      const more = problems.length > 5 ? ` (+${problems.length - 5} more)` : "";
      throw new LoadError(this.table, "validate", `${shown}${more}`);
    }

    let deletedRows: number | null = null;
    if (mode === "replace_date") {
      deletedRows = await this.backend.deleteByDate(this.table, reportDate);
      console.log(`Deleted ${deletedRows ?? "existing"} rows for date = ${reportDate} from ${this.table}`);
    }

    await this.backend.appendRows(this.table, records);
    console.log(`Appended ${records.length} rows into ${this.table} for date ${reportDate}`);

    return { table: this.table, reportDate, mode, deletedRows, appendedRows: records.length };
  }

  /** Loads a payload previously staged in the blob store, referenced by URI. */
  async loadFromBlob(job: LoadJob, reportDate: string, mode: LoadMode): Promise<LoadResult> {
    if (!this.blobs) {
      throw new LoadError(this.table, "read", "no blob store configured for URI loads");
    }
    const content = await this.blobs.get(job.uri);
    const records = decodePayload(content, job);
    return this.load(records, reportDate, mode, { schema: job.schema });
  }
}

export function decodePayload(content: string, job: LoadJob): FlatRow[] {
  if (job.sourceFormat === "ndjson") return parseNdjson(content);

  const rows = parseCsv(content);
  const skip = job.skipLeadingRows ?? 0;
  if (skip === 0) {
    // Without a header row the schema supplies the column order.
    if (!job.schema) throw new Error("CSV without a header row needs an explicit schema");
    return coerceCsvRows(job.schema.map((column) => column.name), rows, job.schema);
  }
  const header = rows[0] ?? [];
  return coerceCsvRows(header, rows.slice(skip), job.schema);
}
