export type ReportKind = "network" | "mediation";

export type SortOrder = "ASCENDING" | "DESCENDING";

export type ReportSpec = {
  /** Inclusive range, YYYY-MM-DD. */
  dateRange: { startDate: string; endDate: string };
  /** One time dimension at most: DATE, WEEK and MONTH are mutually exclusive upstream. */
  dimensions: string[];
  metrics: string[];
  sort: { dimension: string; order: SortOrder };
};

// Cells as delivered by the report API. Int64 values are JSON strings.
export type RawMetricCell = {
  integerValue?: string | number | null;
  microsValue?: string | number | null;
  doubleValue?: number | string | null;
  decimalValue?: string | null;
  value?: string | null;
};

export type RawDimensionCell = {
  value?: string | null;
  displayLabel?: string | null;
};

export type RawReportRow = {
  dimensionValues?: Record<string, RawDimensionCell | undefined>;
  metricValues?: Record<string, RawMetricCell | undefined>;
};

/** One element of a generate response: header, data row, or footer. */
export type ReportChunk = {
  header?: Record<string, unknown>;
  row?: RawReportRow;
  footer?: Record<string, unknown>;
};

export type FieldValue = string | number;

export type NormalizedRecord = Record<string, FieldValue> & { date: string };

/** How a metric is represented upstream; micros metrics are stored unscaled with a `_micros` suffix. */
export type MetricKind = "integer" | "float" | "micros";
