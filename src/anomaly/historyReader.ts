import type { SupabaseClient } from "@supabase/supabase-js";
import { LoadError } from "../lib/errors";
import { formatRetryError, isTransientReadError, retryAsync } from "../lib/retry";

const FETCH_LIMIT = 1000;

export const CTR_HISTORY_COLUMNS = "date,app,ad_unit,clicks,impressions,impression_ctr";

export type CtrHistoryRow = {
  date: string;
  app: string;
  ad_unit: string;
  clicks: number;
  impressions: number;
  impression_ctr: number;
};

export interface HistoryReader {
  /** Rows with `startDate <= date <= endDate`, optionally limited to the given ad units. */
  readCtrHistory(
    table: string,
    startDate: string,
    endDate: string,
    adUnits: string[]
  ): Promise<CtrHistoryRow[]>;
}

function toNumber(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") {
    const num = Number(value);
    return Number.isFinite(num) ? num : 0;
  }
  return 0;
}

// PostgREST returns bigint and numeric columns as strings in some setups.
export function toCtrHistoryRow(raw: Record<string, unknown>): CtrHistoryRow {
  return {
    date: String(raw.date ?? ""),
    app: String(raw.app ?? ""),
    ad_unit: String(raw.ad_unit ?? ""),
    clicks: toNumber(raw.clicks),
    impressions: toNumber(raw.impressions),
    impression_ctr: toNumber(raw.impression_ctr),
  };
}

/**
 * Reads CTR history in pages of 1000. Pages are ordered by `date` and then by
 * `keyColumns`, which must identify a row within a date so offsets stay stable
 * between page queries.
 */
export class SupabaseHistoryReader implements HistoryReader {
  constructor(
    private readonly client: SupabaseClient,
    private readonly keyColumns: readonly string[] = ["app", "ad_unit"]
  ) {}

  async readCtrHistory(
    table: string,
    startDate: string,
    endDate: string,
    adUnits: string[]
  ): Promise<CtrHistoryRow[]> {
    const rows: CtrHistoryRow[] = [];
    let offset = 0;
    while (true) {
      const page = await retryAsync(() => this.fetchPage(table, startDate, endDate, adUnits, offset), {
        retries: 3,
        delaysMs: [1000, 3000, 7000],
        shouldRetry: isTransientReadError,
        onRetry: ({ attempt, error, delayMs }) => {
          console.warn(
            `Retrying ${table} history read (attempt ${attempt}/3, ${delayMs}ms): ${formatRetryError(error)}`
          );
        },
      });
      rows.push(...page);
      if (page.length < FETCH_LIMIT) break;
      offset += FETCH_LIMIT;
    }
    return rows;
  }

  private async fetchPage(
    table: string,
    startDate: string,
    endDate: string,
    adUnits: string[],
    offset: number
  ): Promise<CtrHistoryRow[]> {
    let query = this.client
      .from(table)
      .select(CTR_HISTORY_COLUMNS)
      .gte("date", startDate)
      .lte("date", endDate);
    if (adUnits.length > 0) {
      query = query.in("ad_unit", adUnits);
    }
    query = query.order("date", { ascending: true });
    for (const column of this.keyColumns) {
      query = query.order(column, { ascending: true });
    }
    const { data, error, status } = await query.range(offset, offset + FETCH_LIMIT - 1);
    if (error) throw new LoadError(table, "read", error.message, status);
    const raw: Record<string, unknown>[] = data ?? [];
    return raw.map(toCtrHistoryRow);
  }
}
