import { compactToIsoDate } from "../lib/dates";
import { decodeMetricValue } from "./decodeValue";
import { metricKindFor } from "./reportSpecs";
import type {
  NormalizedRecord,
  RawDimensionCell,
  RawReportRow,
  ReportChunk,
} from "./types";

export type NormalizeOptions = {
  /** Used for `date` when the dimension set has no DATE key or its cell is empty. */
  fallbackDate?: string;
};

export function fieldName(key: string): string {
  return key.trim().toLowerCase();
}

export function dimensionDisplayValue(cell: RawDimensionCell | null | undefined): string {
  if (!cell) return "";
  return cell.displayLabel || cell.value || "";
}

export function normalizeReportRow(
  row: RawReportRow,
  dimensionKeys: string[],
  metricKeys: string[],
  options: NormalizeOptions = {}
): NormalizedRecord {
  const dims = row.dimensionValues ?? {};
  const mets = row.metricValues ?? {};
  const record: NormalizedRecord = { date: options.fallbackDate ?? "" };

  for (const key of dimensionKeys) {
    const field = fieldName(key);
    if (field === "date") {
      // DATE carries no label; the raw value is the compact date.
      record.date = compactToIsoDate(dims[key]?.value ?? "") || record.date;
      continue;
    }
    record[field] = dimensionDisplayValue(dims[key]);
  }

  for (const key of metricKeys) {
    const { suffix, value } = decodeMetricValue(mets[key], metricKindFor(key));
    record[`${fieldName(key)}${suffix}`] = value;
  }

  return record;
}

/**
 * Flattens one response chunk. Chunks without a `row` payload (header, footer)
 * produce no record.
 */
export function normalizeRow(
  chunk: ReportChunk,
  dimensionKeys: string[],
  metricKeys: string[],
  options: NormalizeOptions = {}
): NormalizedRecord | null {
  if (!chunk.row) return null;
  return normalizeReportRow(chunk.row, dimensionKeys, metricKeys, options);
}

export function normalizeRows(
  chunks: ReportChunk[],
  dimensionKeys: string[],
  metricKeys: string[],
  options: NormalizeOptions = {}
): NormalizedRecord[] {
  const records: NormalizedRecord[] = [];
  for (const chunk of chunks) {
    const record = normalizeRow(chunk, dimensionKeys, metricKeys, options);
    if (record) records.push(record);
  }
  return records;
}
