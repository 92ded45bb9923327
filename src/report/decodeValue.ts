import type { MetricKind, RawMetricCell } from "./types";

export type MetricCell =
  | { type: "integer"; value: number }
  | { type: "micros"; value: number }
  | { type: "double"; value: number }
  | { type: "decimal"; value: string }
  | { type: "missing" };

export type DecodedMetric = {
  suffix: "" | "_micros";
  value: number;
};

export const MICROS_SUFFIX = "_micros";

function isPresent<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined;
}

function parseNumber(value: string | number): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  const trimmed = value.trim();
  if (!trimmed) return null;
  const num = Number(trimmed);
  return Number.isFinite(num) ? num : null;
}

function parseInteger(value: string | number): number | null {
  const num = parseNumber(value);
  return num === null ? null : Math.trunc(num);
}

export function classifyMetricCell(cell: RawMetricCell | null | undefined): MetricCell {
  if (!cell) return { type: "missing" };
  if (isPresent(cell.integerValue)) {
    const value = parseInteger(cell.integerValue);
    return value === null ? { type: "decimal", value: String(cell.integerValue) } : { type: "integer", value };
  }
  if (isPresent(cell.microsValue)) {
    const value = parseInteger(cell.microsValue);
    return value === null ? { type: "decimal", value: String(cell.microsValue) } : { type: "micros", value };
  }
  if (isPresent(cell.doubleValue)) {
    const value = parseNumber(cell.doubleValue);
    return value === null ? { type: "decimal", value: String(cell.doubleValue) } : { type: "double", value };
  }
  if (isPresent(cell.decimalValue)) return { type: "decimal", value: cell.decimalValue };
  if (isPresent(cell.value)) return { type: "decimal", value: cell.value };
  return { type: "missing" };
}

/**
 * Decodes one metric cell into the stored field suffix and value.
 *
 * The suffix depends only on the catalogued kind. Missing or unparseable cells
 * decode to zero: a metric absent from a row means no activity for that row.
 * Micros metrics are stored unscaled; a micros cell for any other metric is
 * converted to units.
 */
export function decodeMetricValue(
  cell: RawMetricCell | null | undefined,
  kind: MetricKind
): DecodedMetric {
  const classified = classifyMetricCell(cell);
  const microsSuffix = kind === "micros" ? MICROS_SUFFIX : "";

  switch (classified.type) {
    case "integer":
      return { suffix: microsSuffix, value: classified.value };
    case "micros": {
      if (kind === "micros") return { suffix: MICROS_SUFFIX, value: classified.value };
      const units = microsToUnits(classified.value);
      return { suffix: "", value: kind === "float" ? units : Math.trunc(units) };
    }
    case "double":
      return {
        suffix: microsSuffix,
        value: kind === "float" ? classified.value : Math.trunc(classified.value),
      };
    case "decimal": {
      const parsed = kind === "float" ? parseNumber(classified.value) : parseInteger(classified.value);
      return { suffix: microsSuffix, value: parsed ?? 0 };
    }
    case "missing":
      return { suffix: microsSuffix, value: 0 };
  }
}

export function microsToUnits(micros: number): number {
  return micros / 1_000_000;
}
