/**
 * Run the enrichment pipeline once from the command line.
 *
 * Usage:
 *   npx tsx scripts/run-pipeline.ts --enrich-unenriched [--limit N] [--since ISO_DATE]
 *   npx tsx scripts/run-pipeline.ts --reenrich --last 10
 *   npx tsx scripts/run-pipeline.ts --enrich-id <id>
 *   npx tsx scripts/run-pipeline.ts --stats
 */

import { loadConfig } from "../src/config.js";
import { parsePipelineArgs, PIPELINE_USAGE, type PipelineCommand, type RunReport } from "../src/pipeline/index.js";
import { initServices, initStore } from "../src/services.js";

function printReport(report: RunReport): void {
  console.log("\n" + "=".repeat(60));
  console.log(`Mode: ${report.mode}`);
  console.log(`Processed: ${report.processed}`);
  console.log(`Split: ${report.splitDone} (${report.stories} stories)`);
  console.log(`Single: ${report.enrichedSingle}`);
  console.log(`Failed: ${report.failed}`);
  console.log(`Estimated cost: $${report.costEstimate.toFixed(4)}`);

  for (const outcome of report.outcomes.filter((o) => o.state === "failed")) {
    console.log(`  - ${outcome.id} ${outcome.subject.slice(0, 40)}: ${outcome.error ?? "unknown error"}`);
  }
  console.log("=".repeat(60));
}

async function main() {
  let command: PipelineCommand;
  try {
    command = parsePipelineArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    console.log(PIPELINE_USAGE);
    process.exit(1);
  }

  const config = loadConfig();

  if (command.mode === "stats") {
    const store = await initStore(config);
    const stats = await store.getStats();
    console.log(`Documents: ${stats.documents}`);
    for (const [state, count] of Object.entries(stats.byState)) {
      console.log(`  ${state}: ${count}`);
    }
    console.log(`Stories: ${stats.stories} (${stats.storiesWithLinks} with links)`);
    return;
  }

  const { runner } = await initServices(config);

  const report =
    command.mode === "reenrich"
      ? await runner.reenrichLatest(command.last)
      : command.mode === "enrich-id"
        ? await runner.enrichById(command.id)
        : await runner.run({ limit: command.limit, since: command.since });

  printReport(report);
  if (report.failed > 0 && report.failed === report.processed) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
