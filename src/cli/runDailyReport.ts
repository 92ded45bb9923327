import { config as loadEnv } from "dotenv";
import { loadPipelineConfig } from "../config/pipelineConfig";
import { createPipelineDeps, runDailyReport } from "../pipeline/runDailyReport";
import { isReportKind } from "../report/reportSpecs";
import { getArg, hasFlag, parseThresholdArg } from "./args";

loadEnv({ path: ".env.local" });

function usage() {
  console.log(
    "Usage: npm run report:daily -- [--kind network|mediation] [--date YYYY-MM-DD] [--threshold PCT] [--skip-alerts]\n" +
      "If --date is omitted, REPORT_DATE is used, then yesterday (UTC)."
  );
}

async function main() {
  if (hasFlag("--help")) {
    usage();
    return;
  }

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

  const result = await runDailyReport(config, createPipelineDeps(config), {
    skipAlerts: hasFlag("--skip-alerts"),
  });
  if (result.status === "no data") {
    console.log(`No data for ${result.reportDate}; nothing loaded.`);
    return;
  }

  console.log("Export complete.");
  console.log({
    reportDate: result.reportDate,
    rowCount: result.rowCount,
    blobUri: result.blobUri,
    deletedRows: result.load.deletedRows,
    appendedRows: result.load.appendedRows,
    archivedRows: result.archive?.appendedRows ?? null,
    anomalies: result.ctrCheck?.report.anomalies.length ?? null,
    alertDelivered: result.ctrCheck?.notification.delivered ?? null,
  });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
