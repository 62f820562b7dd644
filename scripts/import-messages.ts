/**
 * Store exported messages as source documents.
 *
 * Usage: npx tsx scripts/import-messages.ts <messages.json>
 *
 * The file holds an array of { from, subject, date, html, text }.
 */

import { readFileSync } from "node:fs";
import { loadConfig, loadPipelineConfig } from "../src/config.js";
import { ingestMessages, rawMessageListSchema, SenderRules } from "../src/ingest/index.js";
import { initStore } from "../src/services.js";

async function main() {
  const file = process.argv[2];
  if (!file) {
    console.error("Usage: import-messages <messages.json>");
    process.exit(1);
  }

  const parsed = rawMessageListSchema.safeParse(JSON.parse(readFileSync(file, "utf8")));
  if (!parsed.success) {
    console.error(`Invalid message file: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`);
    process.exit(1);
  }

  const config = loadConfig();
  const pipeline = loadPipelineConfig(config.configDir);
  const store = await initStore(config);

  console.log(`Importing ${parsed.data.length} messages from ${file}`);
  const report = await ingestMessages(parsed.data, new SenderRules(pipeline.senders), store);

  console.log(
    `\nStored: ${report.stored}, duplicates: ${report.duplicates}, blocked: ${report.blocked}, invalid: ${report.invalid}`
  );
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
