import type { CredentialProvider } from "../auth/credentials";
import { toDateParts, type DateParts } from "../lib/dates";
import { ReportFetchError } from "../lib/errors";
import type { RawReportRow, ReportChunk, ReportKind, ReportSpec, SortOrder } from "./types";

export const ADMOB_API_BASE = "https://admob.googleapis.com/v1";

export type DimensionFilter = {
  dimension: string;
  matchesAny: { values: string[] };
};

export type ReportRequestBody = {
  reportSpec: {
    dateRange: { startDate: DateParts; endDate: DateParts };
    dimensions: string[];
    metrics: string[];
    sortConditions: Array<{ dimension: string; order: SortOrder }>;
    dimensionFilters?: DimensionFilter[];
  };
};

export interface ReportTransport {
  generate(accountId: string, kind: ReportKind, body: ReportRequestBody): Promise<ReportChunk[]>;
}

export type FetchReportOptions = {
  /** Restricts the report to these APP ids; empty means every app on the account. */
  appIds?: string[];
};

/** Accepts `pub-123` or `accounts/pub-123`. */
export function normalizeAccountId(accountId: string): string {
  const trimmed = accountId.trim();
  const parts = trimmed.split("/").filter(Boolean);
  return parts[parts.length - 1] ?? trimmed;
}

export function buildReportRequest(
  spec: ReportSpec,
  options: FetchReportOptions = {}
): ReportRequestBody {
  const reportSpec: ReportRequestBody["reportSpec"] = {
    dateRange: {
      startDate: toDateParts(spec.dateRange.startDate),
      endDate: toDateParts(spec.dateRange.endDate),
    },
    dimensions: [...spec.dimensions],
    metrics: [...spec.metrics],
    sortConditions: [{ dimension: spec.sort.dimension, order: spec.sort.order }],
  };

  const appIds = options.appIds ?? [];
  if (appIds.length > 0) {
    reportSpec.dimensionFilters = [{ dimension: "APP", matchesAny: { values: [...appIds] } }];
  }

  return { reportSpec };
}

export function extractDataRows(chunks: ReportChunk[]): RawReportRow[] {
  const rows: RawReportRow[] = [];
  for (const chunk of chunks) {
    if (chunk.row) rows.push(chunk.row);
  }
  return rows;
}

export async function fetchReportRows(
  transport: ReportTransport,
  accountId: string,
  kind: ReportKind,
  spec: ReportSpec,
  options: FetchReportOptions = {}
): Promise<RawReportRow[]> {
  const body = buildReportRequest(spec, options);
  const chunks = await transport.generate(normalizeAccountId(accountId), kind, body);
  return extractDataRows(chunks);
}

const REPORT_METHOD: Record<ReportKind, string> = {
  network: "networkReport",
  mediation: "mediationReport",
};

function isChunkArray(value: unknown): value is ReportChunk[] {
  return Array.isArray(value) && value.every((item) => typeof item === "object" && item !== null);
}

export class AdmobReportTransport implements ReportTransport {
  constructor(
    private readonly credentials: CredentialProvider,
    private readonly baseUrl: string = ADMOB_API_BASE
  ) {}

  async generate(accountId: string, kind: ReportKind, body: ReportRequestBody): Promise<ReportChunk[]> {
    const token = await this.credentials.getAccessToken();
    const url = `${this.baseUrl}/accounts/${encodeURIComponent(accountId)}/${REPORT_METHOD[kind]}:generate`;

    const response = await fetch(url, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${token}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new ReportFetchError(
        `${REPORT_METHOD[kind]}.generate failed (status ${response.status})`,
        response.status,
        text
      );
    }

    const payload: unknown = await response.json();
    if (!isChunkArray(payload)) {
      throw new ReportFetchError(
        `${REPORT_METHOD[kind]}.generate returned an unexpected payload`,
        response.status
      );
    }
    return payload;
  }
}
