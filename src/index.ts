import { loadConfig, type AppConfig } from "./config.js";
import { createHttpServer } from "./http.js";
import { PipelineScheduler } from "./pipeline/scheduler.js";
import { initServices } from "./services.js";

async function main(): Promise<void> {
  console.log("briefcards - newsletter enrichment pipeline");
  console.log("===========================================\n");

  let config: AppConfig;
  try {
    config = loadConfig();
    console.log("Configuration validated");
  } catch (error) {
    console.error("Configuration error:", error);
    console.log("\nPlease set the required environment variables.");
    process.exit(1);
  }

  console.log(`Model: ${config.model.modelId} (timeout ${config.model.timeoutMs}ms)`);
  console.log(`Concurrency: ${config.pipeline.concurrency}, batch limit: ${config.pipeline.batchLimit}`);
  console.log(`Run times: ${config.pipeline.runTimes.join(", ")}`);

  const { store, runner, pipeline } = await initServices(config);
  console.log(`\nDatabase initialized (${config.database.url})`);
  console.log(`Routing tags: ${pipeline.routing.behaviors.size}, exclusions: ${pipeline.exclusions.exact.size}`);

  const stats = await store.getStats();
  console.log(`Source documents: ${stats.documents}, stories: ${stats.stories}`);

  const scheduler = new PipelineScheduler(
    { run: () => runner.run() },
    { runTimes: config.pipeline.runTimes }
  );
  scheduler.start();

  const server = createHttpServer({
    scheduler,
    store,
    cronSecret: config.server.cronSecret,
  });

  server.listen(config.server.port, () => {
    console.log(`HTTP server listening on port ${config.server.port}`);
  });

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;

    console.log("\nShutting down...");
    scheduler.stop();
    server.close();
    await scheduler.drain();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      console.error("Shutdown failed:", error);
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  console.log("\nbriefcards is running! Press Ctrl+C to stop.\n");
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
