import { addDaysUtc } from "../lib/dates";
import type { CtrHistoryRow, HistoryReader } from "./historyReader";

export const DEFAULT_THRESHOLD_PCT = 25;
export const BASELINE_DAYS = 7;

export type AnomalyDirection = "above" | "below";

export type AnomalyResult = {
  app: string;
  adUnit: string;
  baselineCtr: number;
  todayCtr: number;
  pctChange: number;
  direction: AnomalyDirection;
};

export type CheckedKey = {
  /** Null when an allow-listed ad unit had no row on the report date. */
  app: string | null;
  adUnit: string;
};

export type AnomalyReport = {
  reportDate: string;
  threshold: number;
  anomalies: AnomalyResult[];
  checked: CheckedKey[];
};

type Totals = { clicks: number; impressions: number };

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function keyOf(app: string, adUnit: string): string {
  return JSON.stringify([app, adUnit]);
}

export function baselineWindow(reportDate: string): { startDate: string; endDate: string } {
  return {
    startDate: addDaysUtc(reportDate, -BASELINE_DAYS),
    endDate: addDaysUtc(reportDate, -1),
  };
}

/**
 * Compares each (app, ad unit) CTR on `reportDate` against its trailing
 * seven-day baseline.
 *
 * The baseline is sum(clicks) / sum(impressions) over whatever rows exist in
 * the window; keys without baseline impressions are skipped. Today's value is
 * the stored `impression_ctr`, not recomputed from clicks and impressions.
 */
export function evaluateCtrAnomalies(
  rows: CtrHistoryRow[],
  reportDate: string,
  adUnits: string[] = [],
  threshold: number = DEFAULT_THRESHOLD_PCT
): AnomalyReport {
  const allowed = new Set(adUnits);
  const inScope = (row: CtrHistoryRow) => allowed.size === 0 || allowed.has(row.ad_unit);
  const { startDate, endDate } = baselineWindow(reportDate);

  const baseline = new Map<string, Totals>();
  const today: CtrHistoryRow[] = [];
  for (const row of rows) {
    if (!inScope(row)) continue;
    if (row.date === reportDate) {
      today.push(row);
      continue;
    }
    if (row.date < startDate || row.date > endDate) continue;
    const key = keyOf(row.app, row.ad_unit);
    const totals = baseline.get(key) ?? { clicks: 0, impressions: 0 };
    totals.clicks += row.clicks;
    totals.impressions += row.impressions;
    baseline.set(key, totals);
  }

  const anomalies: AnomalyResult[] = [];
  const checked: CheckedKey[] = [];
  const seen = new Set<string>();

  for (const row of today) {
    const key = keyOf(row.app, row.ad_unit);
    if (!seen.has(key)) {
      seen.add(key);
      checked.push({ app: row.app, adUnit: row.ad_unit });
    }

    const totals = baseline.get(key);
    if (!totals || totals.impressions <= 0) continue;

    const baselineCtr = totals.clicks / totals.impressions;
    if (baselineCtr === 0) continue;
    const pctChange = ((row.impression_ctr - baselineCtr) / baselineCtr) * 100;
    if (Math.abs(pctChange) <= threshold) continue;

    anomalies.push({
      app: row.app,
      adUnit: row.ad_unit,
      baselineCtr: round(baselineCtr, 4),
      todayCtr: round(row.impression_ctr, 4),
      pctChange: round(pctChange, 2),
      direction: pctChange > 0 ? "above" : "below",
    });
  }

  const presentAdUnits = new Set(checked.map((entry) => entry.adUnit));
  for (const adUnit of adUnits) {
    if (!presentAdUnits.has(adUnit)) {
      presentAdUnits.add(adUnit);
      checked.push({ app: null, adUnit });
    }
  }

  anomalies.sort((a, b) => b.pctChange - a.pctChange);
  return { reportDate, threshold, anomalies, checked };
}

export async function detectCtrAnomalies(
  reader: HistoryReader,
  table: string,
  reportDate: string,
  adUnits: string[] = [],
  threshold: number = DEFAULT_THRESHOLD_PCT
): Promise<AnomalyReport> {
  const { startDate } = baselineWindow(reportDate);
  const rows = await reader.readCtrHistory(table, startDate, reportDate, adUnits);
  return evaluateCtrAnomalies(rows, reportDate, adUnits, threshold);
}
