import { config as loadEnv } from "dotenv";
import { SupabaseHistoryReader } from "../anomaly/historyReader";
import { loadPipelineConfig } from "../config/pipelineConfig";
import { getSupabaseClient } from "../db/supabaseClient";
import { runCtrCheck } from "../pipeline/runDailyReport";
import { isReportKind, reportKeyColumns } from "../report/reportSpecs";
import { getArg, parseThresholdArg } from "./args";

loadEnv({ path: ".env.local" });

function usage() {
  console.log(
    "Usage: npm run report:ctr-check -- [--kind network|mediation] [--date YYYY-MM-DD] [--threshold PCT]\n" +
      "Runs the CTR check against rows already loaded for the date. Requires SLACK_WEBHOOK_URL."
  );
}

async function main() {
  const kindArg = getArg("--kind") ?? "network";
  if (!isReportKind(kindArg)) {
    usage();
    process.exit(1);
  }

  const config = loadPipelineConfig(process.env, {
    reportKind: kindArg,
    reportDate: getArg("--date"),
    ctrThresholdPct: parseThresholdArg(getArg("--threshold")),
  });
  if (!config.slackWebhookUrl) {
    usage();
    process.exit(1);
  }

  const history = new SupabaseHistoryReader(getSupabaseClient(config), reportKeyColumns(config.reportKind));
  const { report, notification } = await runCtrCheck(config, history, config.slackWebhookUrl);
  console.log({
    reportDate: report.reportDate,
    checked: report.checked.length,
    anomalies: report.anomalies,
    delivered: notification.delivered,
  });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
