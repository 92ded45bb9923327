import type { AnomalyReport, AnomalyResult } from "../anomaly/detectCtrAnomalies";

export const NOTIFY_TIMEOUT_MS = 10_000;

export type NotifyResult = {
  delivered: boolean;
  status: number | null;
  error?: string;
};

export type NotifyOptions = {
  timeoutMs?: number;
};

function formatCtr(value: number): string {
  return value.toFixed(4);
}

function formatPct(value: number): string {
  const sign = value > 0 ? "+" : "";
  return `${sign}${value.toFixed(2)}%`;
}

function anomalyLine(result: AnomalyResult, threshold: number): string {
  return (
    `• ${result.adUnit} is ${result.direction} ${threshold}% of 7-day avg ` +
    `(avg=${formatCtr(result.baselineCtr)}, today=${formatCtr(result.todayCtr)}, ${formatPct(result.pctChange)})`
  );
}

export function formatAnomalyMessage(report: AnomalyReport): string {
  const lines = [`*CTR Alert for ${report.reportDate}*`];

  if (report.anomalies.length === 0) {
    lines.push("No anomalies detected for the following ad units:");
    for (const key of report.checked) {
      const label = key.app ? `${key.app} / ${key.adUnit}` : key.adUnit;
      lines.push(`• ${label}: no anomaly`);
    }
    return lines.join("\n");
  }

  const byApp = new Map<string, AnomalyResult[]>();
  for (const result of report.anomalies) {
    const group = byApp.get(result.app) ?? [];
    group.push(result);
    byApp.set(result.app, group);
  }

  for (const [app, results] of byApp) {
    lines.push("", `App: ${app}`);
    for (const result of results) lines.push(anomalyLine(result, report.threshold));
  }
  return lines.join("\n");
}

function describeError(err: unknown): string {
  // AbortSignal.timeout rejects with a DOMException named TimeoutError.
  if (err && typeof err === "object" && "name" in err && err.name === "TimeoutError") {
    return "timed out";
  }
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Posts `{ text }` to a Slack-style webhook. Delivery problems are logged and returned, never thrown. */
export async function postWebhookMessage(
  webhookUrl: string,
  text: string,
  options: NotifyOptions = {}
): Promise<NotifyResult> {
  try {
    const response = await fetch(webhookUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ text }),
      signal: AbortSignal.timeout(options.timeoutMs ?? NOTIFY_TIMEOUT_MS),
    });
    if (!response.ok) {
      const body = await response.text();
      console.warn(`Failed to post alert (status ${response.status}): ${body}`);
      return { delivered: false, status: response.status, error: body };
    }
    return { delivered: true, status: response.status };
  } catch (err) {
    const error = describeError(err);
    console.warn(`Failed to post alert: ${error}`);
    return { delivered: false, status: null, error };
  }
}

export async function notifyAnomalies(
  webhookUrl: string,
  report: AnomalyReport,
  options: NotifyOptions = {}
): Promise<NotifyResult> {
  const result = await postWebhookMessage(webhookUrl, formatAnomalyMessage(report), options);
  if (result.delivered) {
    const apps = new Set(report.anomalies.map((anomaly) => anomaly.app)).size;
    console.log(
      report.anomalies.length === 0
        ? `Posted 'no anomalies' message for ${report.checked.length} ad units.`
        : `Posted CTR alerts for ${apps} apps.`
    );
  }
  return result;
}
