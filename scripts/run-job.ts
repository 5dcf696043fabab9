import { closeDbPool } from "../src/db/client";
import { loadConfig } from "../src/lib/config";
import {
  runMaintenanceJob,
  runRecheckReproGatesJob,
  runRecomputeScholarMetricsJob,
  runReevaluateUnderReviewJob,
  type JobContext
} from "../src/lib/jobs";
import { createLogger } from "../src/lib/logger";

const JOBS: Record<string, (ctx: JobContext) => Promise<unknown>> = {
  maintenance: runMaintenanceJob,
  "reevaluate-under-review": runReevaluateUnderReviewJob,
  "recheck-repro-gates": runRecheckReproGatesJob,
  "recompute-scholar-metrics": runRecomputeScholarMetricsJob
};

async function main() {
  const job = process.argv[2];
  const run = job ? JOBS[job] : undefined;
  if (!run) {
    console.error(`Usage: npm run job -- <${Object.keys(JOBS).join("|")}>`);
    process.exit(1);
  }
  const config = loadConfig();
  const logger = createLogger("jobs", config.logLevel);
  try {
    console.log(JSON.stringify(await run({ config, logger }), null, 2));
  } finally {
    await closeDbPool();
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
