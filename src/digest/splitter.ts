import type { SourceDocument, StoryRecord } from "../db/index.js";
import type { EnrichmentResult } from "../enrichment/enricher.js";
import type { ExclusionSet } from "../keywords/exclusions.js";
import type { KeywordSource } from "../keywords/extractor.js";
import { consoleLogger, type Logger } from "../logger.js";
import { extractAnchors } from "./link-extractor.js";
import { findBestAnchor } from "./link-matcher.js";
import { parseDigest, type StoryFragment } from "./parser.js";

export const DIGEST_TAG_SUFFIX = "-digest";

export function storyRecordId(sourceId: string, ordinal: number): string {
  return `${sourceId}_story_${ordinal}`;
}

/**
 * Where split output goes. Upserts are keyed by record id; the two marks are
 * the parent's final state transition.
 */
export interface SplitSink {
  upsertStory(record: StoryRecord): Promise<void>;
  markSplitDone(sourceId: string, summary: string): Promise<void>;
  markFailed(sourceId: string, reason: string): Promise<void>;
}

export interface SplitterOptions {
  exclusions: ExclusionSet;
  storyScore: number;
  logger?: Logger;
}

export interface SkippedFragment {
  ordinal: number;
  reason: string;
}

export interface SplitOutcome {
  state: "split_done" | "failed";
  records: StoryRecord[];
  skipped: SkippedFragment[];
  costEstimate: number;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class DigestSplitter {
  private readonly logger: Logger;

  constructor(
    private readonly keywords: KeywordSource,
    private readonly sink: SplitSink,
    private readonly options: SplitterOptions
  ) {
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Fan one enriched digest out into story records.
   *
   * Fragments run one at a time in ordinal order. A fragment whose keyword
   * call or upsert fails is logged and skipped; the parent is marked
   * split_done if at least one story was written, failed otherwise.
   */
  async split(source: SourceDocument, enrichment: EnrichmentResult): Promise<SplitOutcome> {
    let fragments: StoryFragment[];
    try {
      fragments = [...parseDigest(enrichment.rawText)].sort((a, b) => a.ordinal - b.ordinal);
    } catch (error) {
      const reason = `Digest parsing failed: ${describeError(error)}`;
      this.logger.error(`   ${reason}`);
      await this.sink.markFailed(source.id, reason);
      return { state: "failed", records: [], skipped: [], costEstimate: 0 };
    }

    this.logger.log(`   Stories found: ${fragments.length}`);

    const anchors = extractAnchors(source.contentHtml);
    const records: StoryRecord[] = [];
    const skipped: SkippedFragment[] = [];
    let costEstimate = 0;

    for (const fragment of fragments) {
      try {
        const result = await this.keywords.extract(
          fragment.title,
          fragment.body,
          this.options.exclusions
        );

        if (result.status === "failed") {
          const reason = `keyword extraction failed: ${describeError(result.error)}`;
          this.logger.error(`   Story ${fragment.ordinal} skipped, ${reason}`);
          skipped.push({ ordinal: fragment.ordinal, reason });
          continue;
        }
        costEstimate += result.costEstimate;

        const match = findBestAnchor(fragment.title, anchors);
        const record = this.buildRecord(source, fragment, result.keywords, match?.url ?? null);

        await this.sink.upsertStory(record);
        records.push(record);

        const linkStatus = match ? `link ${Math.round(match.score * 100)}%` : "no link";
        this.logger.log(
          `   ${fragment.ordinal}. ${record.title.slice(0, 50)} [${linkStatus}] ${record.keywords.join(" • ")}`
        );
      } catch (error) {
        this.logger.error(`   Story ${fragment.ordinal} skipped:`, error);
        skipped.push({ ordinal: fragment.ordinal, reason: describeError(error) });
      }
    }

    if (records.length === 0) {
      await this.sink.markFailed(
        source.id,
        `No stories survived splitting (${fragments.length} parsed, ${skipped.length} skipped)`
      );
      return { state: "failed", records, skipped, costEstimate };
    }

    await this.sink.markSplitDone(source.id, `Split into ${records.length} stories`);
    return { state: "split_done", records, skipped, costEstimate };
  }

  private buildRecord(
    source: SourceDocument,
    fragment: StoryFragment,
    keywords: string[],
    sourceLink: string | null
  ): StoryRecord {
    return {
      id: storyRecordId(source.id, fragment.ordinal),
      sourceId: source.id,
      ordinal: fragment.ordinal,
      routingTagSuffixed: `${source.routingTag}${DIGEST_TAG_SUFFIX}`,
      title: fragment.title || `${source.subject} (${fragment.ordinal})`,
      enrichedBody: fragment.body,
      keywords,
      sourceLink,
      score: this.options.storyScore,
      originalHtmlRef: source.id,
      createdAt: source.createdAt,
    };
  }
}
