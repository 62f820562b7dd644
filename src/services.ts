import { createDbClient, initializeDatabase, Store } from "./db/index.js";
import { Enricher } from "./enrichment/enricher.js";
import { KeywordExtractor } from "./keywords/extractor.js";
import { AnthropicModel, type LanguageModel } from "./llm/client.js";
import { loadPipelineConfig, modelConfig, type AppConfig, type PipelineConfig } from "./config.js";
import { PipelineRunner } from "./pipeline/runner.js";
import type { Logger } from "./logger.js";

export interface Services {
  store: Store;
  model: LanguageModel;
  runner: PipelineRunner;
  pipeline: PipelineConfig;
}

export async function initStore(config: AppConfig): Promise<Store> {
  const dbClient = createDbClient(config.database);
  await initializeDatabase(dbClient);
  return new Store(dbClient);
}

/**
 * Wire the store, the model and the runner from validated settings. Pipeline
 * files are read once here and shared by every run.
 */
export async function initServices(config: AppConfig, logger?: Logger): Promise<Services> {
  const pipeline = loadPipelineConfig(config.configDir);
  const model = new AnthropicModel(modelConfig(config));
  const store = await initStore(config);

  const runner = new PipelineRunner(store, new Enricher(model), new KeywordExtractor(model), {
    routing: pipeline.routing,
    scores: pipeline.scores,
    exclusions: pipeline.exclusions,
    concurrency: config.pipeline.concurrency,
    batchLimit: config.pipeline.batchLimit,
    logger,
  });

  return { store, model, runner, pipeline };
}
