import type { MetricKind, ReportKind, ReportSpec } from "./types";

// Upstream representation of each metric. Unlisted metrics decode as float.
export const METRIC_KINDS: Record<string, MetricKind> = {
  AD_REQUESTS: "integer",
  CLICKS: "integer",
  ESTIMATED_EARNINGS: "micros",
  IMPRESSIONS: "integer",
  IMPRESSION_CTR: "float",
  IMPRESSION_RPM: "float",
  MATCHED_REQUESTS: "integer",
  MATCH_RATE: "float",
  OBSERVED_ECPM: "micros",
  SHOW_RATE: "float",
};

export function metricKindFor(metricKey: string): MetricKind {
  return METRIC_KINDS[metricKey.toUpperCase()] ?? "float";
}

const REPORT_DIMENSIONS: Record<ReportKind, string[]> = {
  network: ["DATE", "APP", "FORMAT", "AD_UNIT"],
  mediation: [
    "DATE",
    "APP",
    "AD_UNIT",
    "AD_SOURCE",
    "AD_SOURCE_INSTANCE",
    "MEDIATION_GROUP",
    "COUNTRY",
  ],
};

const REPORT_METRICS: Record<ReportKind, string[]> = {
  network: [
    "AD_REQUESTS",
    "CLICKS",
    "ESTIMATED_EARNINGS",
    "IMPRESSIONS",
    "IMPRESSION_CTR",
    "MATCHED_REQUESTS",
    "MATCH_RATE",
    "IMPRESSION_RPM",
    "SHOW_RATE",
  ],
  mediation: [
    "AD_REQUESTS",
    "CLICKS",
    "ESTIMATED_EARNINGS",
    "IMPRESSIONS",
    "IMPRESSION_CTR",
    "MATCHED_REQUESTS",
    "MATCH_RATE",
    "OBSERVED_ECPM",
  ],
};

export function isReportKind(value: string): value is ReportKind {
  return value === "network" || value === "mediation";
}

/** Stored columns that, with `date`, identify one row of the kind's table. */
export function reportKeyColumns(kind: ReportKind): string[] {
  return REPORT_DIMENSIONS[kind].filter((key) => key !== "DATE").map((key) => key.toLowerCase());
}

/** Default single-day report for the given kind, sorted by date. */
export function buildReportSpec(kind: ReportKind, reportDate: string): ReportSpec {
  return {
    dateRange: { startDate: reportDate, endDate: reportDate },
    dimensions: [...REPORT_DIMENSIONS[kind]],
    metrics: [...REPORT_METRICS[kind]],
    sort: { dimension: "DATE", order: "ASCENDING" },
  };
}
