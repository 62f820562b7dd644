export { createDbClient, initializeDatabase, type DatabaseConfig } from "./schema.js";
export { Store, ENRICHMENT_STATES } from "./store.js";
export type {
  SourceDocument,
  NewSourceDocument,
  StoryRecord,
  EnrichmentState,
  SingleEnrichment,
  DocumentQuery,
  PipelineStats,
} from "./store.js";
