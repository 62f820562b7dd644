import type { SourceDocument, Store } from "../db/index.js";
import { DigestSplitter } from "../digest/splitter.js";
import type { Enricher } from "../enrichment/enricher.js";
import { route, type RoutingTable } from "../enrichment/router.js";
import type { ExclusionSet } from "../keywords/exclusions.js";
import type { KeywordSource } from "../keywords/extractor.js";
import { consoleLogger, type Logger } from "../logger.js";
import type { StoryScores } from "../config.js";

export type RunMode = "enrich-unenriched" | "reenrich" | "enrich-id";

export interface DocumentOutcome {
  id: string;
  subject: string;
  routingTag: string;
  state: "split_done" | "enriched_single" | "failed";
  stories: number;
  costEstimate: number;
  error?: string;
}

export interface RunReport {
  mode: RunMode;
  processed: number;
  splitDone: number;
  enrichedSingle: number;
  failed: number;
  stories: number;
  costEstimate: number;
  outcomes: DocumentOutcome[];
}

export interface RunOptions {
  limit?: number;
  since?: string;
}

export interface PipelineRunnerConfig {
  routing: RoutingTable;
  scores: StoryScores;
  exclusions: ExclusionSet;
  concurrency: number;
  batchLimit: number;
  /** How long a document may sit in enriching or split_pending before a run retries it. */
  staleAfterMs?: number;
  logger?: Logger;
}

export const DEFAULT_STALE_AFTER_MS = 30 * 60 * 1000;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class PipelineRunner {
  private readonly splitter: DigestSplitter;
  private readonly logger: Logger;

  constructor(
    private readonly store: Store,
    private readonly enricher: Enricher,
    private readonly keywords: KeywordSource,
    private readonly config: PipelineRunnerConfig
  ) {
    this.logger = config.logger ?? consoleLogger;
    this.splitter = new DigestSplitter(keywords, store, {
      exclusions: config.exclusions,
      storyScore: config.scores.digestStory,
      logger: this.logger,
    });
  }

  /**
   * Enrich documents that were never processed, failed last time, or were
   * left in progress by a run that never finished.
   */
  async run(options: RunOptions = {}): Promise<RunReport> {
    const staleAfterMs = this.config.staleAfterMs ?? DEFAULT_STALE_AFTER_MS;
    const documents = await this.store.getDocumentsToEnrich({
      since: options.since,
      limit: options.limit ?? this.config.batchLimit,
      staleBefore: new Date(Date.now() - staleAfterMs).toISOString(),
    });

    return this.processAll("enrich-unenriched", documents);
  }

  /** Reset the latest N documents and enrich them again. */
  async reenrichLatest(count: number): Promise<RunReport> {
    const documents = await this.store.getLatestDocuments(count);
    await this.store.resetForReenrichment(documents.map((doc) => doc.id));
    this.logger.log(`Reset ${documents.length} documents for re-enrichment`);

    return this.processAll("reenrich", documents);
  }

  async enrichById(id: string): Promise<RunReport> {
    const document = await this.store.getSourceDocument(id);
    if (!document) {
      throw new Error(`Source document not found: ${id}`);
    }

    return this.processAll("enrich-id", [document]);
  }

  private async processAll(mode: RunMode, documents: SourceDocument[]): Promise<RunReport> {
    this.logger.log(`Pipeline ${mode}: ${documents.length} documents`);

    const outcomes: DocumentOutcome[] = [];
    const concurrency = Math.max(1, this.config.concurrency);

    // Documents run in parallel batches; stories of one digest never do
    for (let i = 0; i < documents.length; i += concurrency) {
      const batch = documents.slice(i, i + concurrency);
      const results = await Promise.all(batch.map((doc) => this.processDocument(doc)));
      outcomes.push(...results);
    }

    const report: RunReport = {
      mode,
      processed: outcomes.length,
      splitDone: outcomes.filter((o) => o.state === "split_done").length,
      enrichedSingle: outcomes.filter((o) => o.state === "enriched_single").length,
      failed: outcomes.filter((o) => o.state === "failed").length,
      stories: outcomes.reduce((sum, o) => sum + o.stories, 0),
      costEstimate: outcomes.reduce((sum, o) => sum + o.costEstimate, 0),
      outcomes,
    };

    this.logger.log(
      `Pipeline ${mode} done: ${report.splitDone} split, ${report.enrichedSingle} single, ` +
        `${report.failed} failed, ${report.stories} stories, $${report.costEstimate.toFixed(4)}`
    );

    return report;
  }

  private async processDocument(doc: SourceDocument): Promise<DocumentOutcome> {
    const base = { id: doc.id, subject: doc.subject, routingTag: doc.routingTag };
    let costEstimate = 0;

    this.logger.log(`\n[${doc.routingTag}] ${doc.subject.slice(0, 60)}`);

    try {
      await this.store.markEnriching(doc.id);

      const decision = route(doc, this.config.routing);
      if (decision.kind === "skip") {
        await this.store.markFailed(doc.id, decision.reason);
        this.logger.warn(`   Skipped: ${decision.reason}`);
        return { ...base, state: "failed", stories: 0, costEstimate, error: decision.reason };
      }

      const enrichment = await this.enricher.enrich(doc, decision);
      costEstimate += enrichment.costEstimate;

      if (decision.kind === "digest") {
        await this.store.markSplitPending(doc.id);
        const outcome = await this.splitter.split(doc, enrichment);
        costEstimate += outcome.costEstimate;

        if (outcome.state === "failed") {
          return {
            ...base,
            state: "failed",
            stories: 0,
            costEstimate,
            error: "No stories survived splitting",
          };
        }

        const pruned = await this.store.pruneStories(
          doc.id,
          outcome.records.map((record) => record.id)
        );
        if (pruned > 0) {
          this.logger.log(`   Removed ${pruned} stale stories`);
        }

        return { ...base, state: "split_done", stories: outcome.records.length, costEstimate };
      }

      const keywords = await this.keywords.extract(
        doc.subject,
        enrichment.rawText,
        this.config.exclusions
      );
      if (keywords.status === "failed") {
        this.logger.warn(`   Keyword extraction failed, using fallback: ${describeError(keywords.error)}`);
      } else {
        costEstimate += keywords.costEstimate;
      }

      await this.store.markEnrichedSingle(doc.id, {
        enrichedContent: enrichment.rawText,
        keywords: keywords.keywords,
        score: this.config.scores.single,
      });
      this.logger.log(`   Enriched: ${keywords.keywords.join(" • ")}`);

      return { ...base, state: "enriched_single", stories: 0, costEstimate };
    } catch (error) {
      this.logger.error(`   Failed to enrich ${doc.id}:`, error);
      const reason = describeError(error);

      try {
        await this.store.markFailed(doc.id, reason);
      } catch (markError) {
        this.logger.error(`   Could not mark ${doc.id} as failed:`, markError);
      }

      return { ...base, state: "failed", stories: 0, costEstimate, error: reason };
    }
  }
}
