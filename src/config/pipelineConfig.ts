import { isIsoDate, yesterdayUtc } from "../lib/dates";
import { ConfigError } from "../lib/errors";
import { parseList } from "../lib/utils";
import { DEFAULT_THRESHOLD_PCT } from "../anomaly/detectCtrAnomalies";
import type { ReportKind } from "../report/types";

type Env = Record<string, string | undefined>;

export type PipelineConfig = Readonly<{
  reportKind: ReportKind;
  reportDate: string;
  admob: Readonly<{
    clientId: string;
    clientSecret: string;
    refreshToken: string;
    publisherId: string;
  }>;
  supabase: Readonly<{
    url: string;
    serviceRoleKey: string;
  }>;
  storageBucket: string;
  reportTable: string;
  archiveTable: string | null;
  appIds: readonly string[];
  adUnitIds: readonly string[];
  slackWebhookUrl: string | null;
  ctrThresholdPct: number;
}>;

export type ConfigOverrides = {
  reportKind?: ReportKind;
  reportDate?: string;
  ctrThresholdPct?: number;
};

const REPORT_TABLE_VAR: Record<ReportKind, string> = {
  network: "REPORT_TABLE_NETWORK",
  mediation: "REPORT_TABLE_MEDIATION",
};

function readOptional(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function parseThreshold(raw: string | null): number {
  if (raw === null) return DEFAULT_THRESHOLD_PCT;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`CTR_THRESHOLD_PCT must be a non-negative number, got ${raw}`);
  }
  return value;
}

/**
 * Builds the run configuration once at start-up. All missing variables are
 * reported together, before any network call.
 */
export function loadPipelineConfig(
  env: Env = process.env,
  overrides: ConfigOverrides = {},
  now: Date = new Date()
): PipelineConfig {
  const reportKind = overrides.reportKind ?? "network";
  const tableVar = REPORT_TABLE_VAR[reportKind];
  const required = [
    "ADMOB_CLIENT_ID",
    "ADMOB_CLIENT_SECRET",
    "ADMOB_REFRESH_TOKEN",
    "ADMOB_PUBLISHER_ID",
    "SUPABASE_URL",
    "SUPABASE_SERVICE_ROLE_KEY",
    "STORAGE_BUCKET",
    tableVar,
  ];

  const values = new Map<string, string>();
  const missing: string[] = [];
  for (const name of required) {
    const value = readOptional(env, name);
    if (value === null) missing.push(name);
    else values.set(name, value);
  }
  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(", ")}`, missing);
  }
  const get = (name: string) => values.get(name) ?? "";

  const reportDate = overrides.reportDate ?? readOptional(env, "REPORT_DATE") ?? yesterdayUtc(now);
  if (!isIsoDate(reportDate)) {
    throw new ConfigError(`Report date must be YYYY-MM-DD, got ${reportDate}`);
  }

  return {
    reportKind,
    reportDate,
    admob: {
      clientId: get("ADMOB_CLIENT_ID"),
      clientSecret: get("ADMOB_CLIENT_SECRET"),
      refreshToken: get("ADMOB_REFRESH_TOKEN"),
      publisherId: get("ADMOB_PUBLISHER_ID"),
    },
    supabase: {
      url: get("SUPABASE_URL"),
      serviceRoleKey: get("SUPABASE_SERVICE_ROLE_KEY"),
    },
    storageBucket: get("STORAGE_BUCKET"),
    reportTable: get(tableVar),
    archiveTable: readOptional(env, "ARCHIVE_TABLE"),
    appIds: parseList(env.APP_IDS),
    adUnitIds: parseList(env.AD_UNIT_IDS),
    slackWebhookUrl: readOptional(env, "SLACK_WEBHOOK_URL"),
    ctrThresholdPct: overrides.ctrThresholdPct ?? parseThreshold(readOptional(env, "CTR_THRESHOLD_PCT")),
  };
}
