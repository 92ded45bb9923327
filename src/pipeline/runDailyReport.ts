import { createRefreshTokenProvider } from "../auth/credentials";
import { detectCtrAnomalies, type AnomalyReport } from "../anomaly/detectCtrAnomalies";
import { SupabaseHistoryReader, type HistoryReader } from "../anomaly/historyReader";
import type { PipelineConfig } from "../config/pipelineConfig";
import { getSupabaseClient } from "../db/supabaseClient";
import { toCompactDate } from "../lib/dates";
import { notifyAnomalies, type NotifyResult } from "../notify/notifier";
import { AdmobReportTransport, fetchReportRows, type ReportTransport } from "../report/fetchReport";
import { normalizeReportRow } from "../report/normalizeRow";
import { buildReportSpec, reportKeyColumns } from "../report/reportSpecs";
import { reportTableSchema } from "../sink/reportSchemas";
import { SupabaseTableBackend, TableSink, type LoadResult, type TableBackend } from "../sink/tableSink";
import { SupabaseBlobStore, type BlobStore } from "../storage/blobStore";
import { recordsToCsv, recordsToNdjson } from "../storage/serialize";

export type PipelineDeps = {
  transport: ReportTransport;
  blobs: BlobStore;
  backend: TableBackend;
  history: HistoryReader;
};

export type RunOptions = {
  skipAlerts?: boolean;
};

export type CtrCheckResult = {
  report: AnomalyReport;
  notification: NotifyResult;
};

export type PipelineRunResult =
  | { status: "no data"; reportDate: string }
  | {
      status: "ok";
      reportDate: string;
      rowCount: number;
      blobUri: string;
      load: LoadResult;
      archive: LoadResult | null;
      ctrCheck: CtrCheckResult | null;
    };

export function createPipelineDeps(config: PipelineConfig): PipelineDeps {
  const client = getSupabaseClient(config);
  return {
    transport: new AdmobReportTransport(createRefreshTokenProvider(config.admob)),
    blobs: new SupabaseBlobStore(client, config.storageBucket),
    backend: new SupabaseTableBackend(client),
    history: new SupabaseHistoryReader(client, reportKeyColumns(config.reportKind)),
  };
}

export async function runCtrCheck(
  config: PipelineConfig,
  history: HistoryReader,
  webhookUrl: string
): Promise<CtrCheckResult> {
  const report = await detectCtrAnomalies(
    history,
    config.reportTable,
    config.reportDate,
    [...config.adUnitIds],
    config.ctrThresholdPct
  );
  console.log(
    `CTR check for ${config.reportDate}: ${report.anomalies.length} anomalies across ${report.checked.length} ad units`
  );
  const notification = await notifyAnomalies(webhookUrl, report);
  return { report, notification };
}

/**
 * One report date end to end: fetch, normalize, stage, replace the date's
 * rows, then run the CTR check. An empty report stops before any write.
 */
export async function runDailyReport(
  config: PipelineConfig,
  deps: PipelineDeps,
  options: RunOptions = {}
): Promise<PipelineRunResult> {
  const { reportKind, reportDate } = config;
  const spec = buildReportSpec(reportKind, reportDate);

  console.log(`Fetching ${reportKind} report for ${reportDate}`);
  const rawRows = await fetchReportRows(deps.transport, config.admob.publisherId, reportKind, spec, {
    appIds: [...config.appIds],
  });
  if (rawRows.length === 0) {
    console.warn(`No rows returned for ${reportDate}`);
    return { status: "no data", reportDate };
  }

  const records = rawRows.map((row) =>
    normalizeReportRow(row, spec.dimensions, spec.metrics, { fallbackDate: reportDate })
  );
  const schema = reportTableSchema(spec);
  const columns = schema.map((column) => column.name);
  const baseName = `${reportKind}_${toCompactDate(reportDate)}`;

  const blobUri = await deps.blobs.put(`${baseName}.csv`, recordsToCsv(records, columns), "text/csv");
  const sink = new TableSink(deps.backend, config.reportTable, deps.blobs);
  const load = await sink.loadFromBlob(
    { uri: blobUri, sourceFormat: "csv", schema, skipLeadingRows: 1 },
    reportDate,
    "replace_date"
  );

  let archive: LoadResult | null = null;
  if (config.archiveTable) {
    const archiveUri = await deps.blobs.put(
      `${baseName}.jsonl`,
      recordsToNdjson(records),
      "application/x-ndjson"
    );
    const archiveSink = new TableSink(deps.backend, config.archiveTable, deps.blobs);
    archive = await archiveSink.loadFromBlob({ uri: archiveUri, sourceFormat: "ndjson" }, reportDate, "append");
  }

  let ctrCheck: CtrCheckResult | null = null;
  if (!options.skipAlerts && config.slackWebhookUrl) {
    ctrCheck = await runCtrCheck(config, deps.history, config.slackWebhookUrl);
  }

  return { status: "ok", reportDate, rowCount: records.length, blobUri, load, archive, ctrCheck };
}
