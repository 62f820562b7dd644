import type { Client, Row } from "@libsql/client";

// Types

export const ENRICHMENT_STATES = [
  "empty",
  "enriching",
  "split_pending",
  "split_done",
  "enriched_single",
  "failed",
] as const;

export type EnrichmentState = (typeof ENRICHMENT_STATES)[number];

export interface SourceDocument {
  id: string;
  routingTag: string;
  subject: string;
  sender: string;
  contentHtml: string;
  contentText: string;
  createdAt: string;
  enrichmentState: EnrichmentState;
  enrichedContent: string | null;
  keywords: string[];
  score: number | null;
  splitSummary: string | null;
  lastError: string | null;
  updatedAt: string;
}

export type NewSourceDocument = Pick<
  SourceDocument,
  "id" | "routingTag" | "subject" | "sender" | "contentHtml" | "contentText" | "createdAt"
>;

export interface StoryRecord {
  id: string;
  sourceId: string;
  ordinal: number;
  routingTagSuffixed: string;
  title: string;
  enrichedBody: string;
  keywords: string[];
  sourceLink: string | null;
  score: number;
  // Parent document id; its HTML is looked up, never copied
  originalHtmlRef: string;
  createdAt: string;
}

export interface SingleEnrichment {
  enrichedContent: string;
  keywords: string[];
  score: number;
}

export interface DocumentQuery {
  since?: string;
  limit: number;
  /** Documents left in enriching or split_pending before this instant are picked up again. */
  staleBefore?: string;
}

export interface PipelineStats {
  documents: number;
  byState: Partial<Record<EnrichmentState, number>>;
  stories: number;
  storiesWithLinks: number;
}

// Row readers

function readString(row: Row, column: string): string {
  const value = row[column];
  if (typeof value === "string") return value;
  if (value === null || value === undefined) return "";
  return String(value);
}

function readNullableString(row: Row, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  return typeof value === "string" ? value : String(value);
}

function readNumber(row: Row, column: string): number {
  const value = row[column];
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  if (typeof value === "string") return Number(value);
  return 0;
}

function readNullableNumber(row: Row, column: string): number | null {
  return row[column] === null || row[column] === undefined ? null : readNumber(row, column);
}

function readKeywords(row: Row, column: string): string[] {
  try {
    const parsed: unknown = JSON.parse(readString(row, column) || "[]");
    return Array.isArray(parsed)
      ? parsed.filter((k): k is string => typeof k === "string")
      : [];
  } catch {
    return [];
  }
}

function isEnrichmentState(value: string): value is EnrichmentState {
  return (ENRICHMENT_STATES as readonly string[]).includes(value);
}

function rowToSourceDocument(row: Row): SourceDocument {
  const state = readString(row, "enrichment_state");
  return {
    id: readString(row, "id"),
    routingTag: readString(row, "routing_tag"),
    subject: readString(row, "subject"),
    sender: readString(row, "sender"),
    contentHtml: readString(row, "content_html"),
    contentText: readString(row, "content_text"),
    createdAt: readString(row, "created_at"),
    enrichmentState: isEnrichmentState(state) ? state : "failed",
    enrichedContent: readNullableString(row, "enriched_content"),
    keywords: readKeywords(row, "keywords"),
    score: readNullableNumber(row, "score"),
    splitSummary: readNullableString(row, "split_summary"),
    lastError: readNullableString(row, "last_error"),
    updatedAt: readString(row, "updated_at"),
  };
}

function rowToStoryRecord(row: Row): StoryRecord {
  return {
    id: readString(row, "id"),
    sourceId: readString(row, "source_id"),
    ordinal: readNumber(row, "ordinal"),
    routingTagSuffixed: readString(row, "routing_tag"),
    title: readString(row, "title"),
    enrichedBody: readString(row, "enriched_body"),
    keywords: readKeywords(row, "keywords"),
    sourceLink: readNullableString(row, "source_link"),
    score: readNumber(row, "score"),
    originalHtmlRef: readString(row, "original_html_ref"),
    createdAt: readString(row, "created_at"),
  };
}

// Store class

export class Store {
  constructor(private readonly db: Client) {}

  // ============ Source Documents ============

  /**
   * Insert a newly ingested document. Returns false when the id already
   * exists; stored content is never overwritten.
   */
  async saveSourceDocument(doc: NewSourceDocument): Promise<boolean> {
    const result = await this.db.execute({
      sql: `INSERT OR IGNORE INTO source_documents
            (id, routing_tag, subject, sender, content_html, content_text,
             created_at, enrichment_state, updated_at)
            VALUES (?, ?, ?, ?, ?, ?, ?, 'empty', ?)`,
      args: [
        doc.id,
        doc.routingTag,
        doc.subject,
        doc.sender,
        doc.contentHtml,
        doc.contentText,
        doc.createdAt,
        new Date().toISOString(),
      ],
    });
    return result.rowsAffected > 0;
  }

  async getSourceDocument(id: string): Promise<SourceDocument | null> {
    const result = await this.db.execute({
      sql: "SELECT * FROM source_documents WHERE id = ?",
      args: [id],
    });

    if (result.rows.length === 0) return null;
    return rowToSourceDocument(result.rows[0]);
  }

  /**
   * Documents waiting for enrichment: never processed, failed last time, or
   * abandoned mid-run (still in progress and untouched since `staleBefore`).
   * Newest first.
   */
  async getDocumentsToEnrich(query: DocumentQuery): Promise<SourceDocument[]> {
    const result = await this.db.execute({
      sql: `SELECT * FROM source_documents
            WHERE (enrichment_state IN ('empty', 'failed')
                   OR (enrichment_state IN ('enriching', 'split_pending') AND updated_at < ?))
              AND created_at >= ?
            ORDER BY created_at DESC
            LIMIT ?`,
      args: [query.staleBefore ?? "", query.since ?? "", query.limit],
    });

    return result.rows.map(rowToSourceDocument);
  }

  async getLatestDocuments(limit: number): Promise<SourceDocument[]> {
    const result = await this.db.execute({
      sql: "SELECT * FROM source_documents ORDER BY created_at DESC LIMIT ?",
      args: [limit],
    });

    return result.rows.map(rowToSourceDocument);
  }

  async getSourceHtml(ref: string): Promise<string | null> {
    const result = await this.db.execute({
      sql: "SELECT content_html FROM source_documents WHERE id = ?",
      args: [ref],
    });

    if (result.rows.length === 0) return null;
    return readString(result.rows[0], "content_html");
  }

  // ============ State Transitions ============

  private async setState(
    id: string,
    state: EnrichmentState,
    fields: { splitSummary?: string | null; lastError?: string | null } = {}
  ): Promise<void> {
    // undefined keeps the stored summary, null clears it
    const keepSummary = fields.splitSummary === undefined;
    await this.db.execute({
      sql: `UPDATE source_documents
            SET enrichment_state = ?,
                split_summary = ${keepSummary ? "split_summary" : "?"},
                last_error = ?,
                updated_at = ?
            WHERE id = ?`,
      args: [
        state,
        ...(keepSummary ? [] : [fields.splitSummary ?? null]),
        fields.lastError ?? null,
        new Date().toISOString(),
        id,
      ],
    });
  }

  async markEnriching(id: string): Promise<void> {
    await this.setState(id, "enriching");
  }

  async markSplitPending(id: string): Promise<void> {
    await this.setState(id, "split_pending");
  }

  async markSplitDone(id: string, summary: string): Promise<void> {
    await this.setState(id, "split_done", { splitSummary: summary });
  }

  async markFailed(id: string, reason: string): Promise<void> {
    await this.setState(id, "failed", { splitSummary: null, lastError: reason });
  }

  async markEnrichedSingle(id: string, enrichment: SingleEnrichment): Promise<void> {
    await this.db.execute({
      sql: `UPDATE source_documents
            SET enrichment_state = 'enriched_single',
                enriched_content = ?,
                keywords = ?,
                score = ?,
                last_error = NULL,
                updated_at = ?
            WHERE id = ?`,
      args: [
        enrichment.enrichedContent,
        JSON.stringify(enrichment.keywords),
        enrichment.score,
        new Date().toISOString(),
        id,
      ],
    });
  }

  /**
   * Put documents back in the queue. Their stories stay until the next split
   * overwrites or prunes them.
   */
  async resetForReenrichment(ids: readonly string[]): Promise<void> {
    for (const id of ids) {
      await this.db.execute({
        sql: `UPDATE source_documents
              SET enrichment_state = 'empty',
                  enriched_content = NULL,
                  keywords = '[]',
                  score = NULL,
                  split_summary = NULL,
                  last_error = NULL,
                  updated_at = ?
              WHERE id = ?`,
        args: [new Date().toISOString(), id],
      });
    }
  }

  // ============ Story Records ============

  async upsertStory(record: StoryRecord): Promise<void> {
    await this.db.execute({
      sql: `INSERT OR REPLACE INTO story_records
            (id, source_id, ordinal, routing_tag, title, enriched_body, keywords,
             source_link, score, original_html_ref, created_at, updated_at)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      args: [
        record.id,
        record.sourceId,
        record.ordinal,
        record.routingTagSuffixed,
        record.title,
        record.enrichedBody,
        JSON.stringify(record.keywords),
        record.sourceLink,
        record.score,
        record.originalHtmlRef,
        record.createdAt,
        new Date().toISOString(),
      ],
    });
  }

  async getStory(id: string): Promise<StoryRecord | null> {
    const result = await this.db.execute({
      sql: "SELECT * FROM story_records WHERE id = ?",
      args: [id],
    });

    if (result.rows.length === 0) return null;
    return rowToStoryRecord(result.rows[0]);
  }

  async getStoriesForSource(sourceId: string): Promise<StoryRecord[]> {
    const result = await this.db.execute({
      sql: "SELECT * FROM story_records WHERE source_id = ? ORDER BY ordinal ASC",
      args: [sourceId],
    });

    return result.rows.map(rowToStoryRecord);
  }

  /**
   * Delete stories of a source that the latest split did not produce.
   * Returns the number of rows removed.
   */
  async pruneStories(sourceId: string, keepIds: readonly string[]): Promise<number> {
    const existing = await this.getStoriesForSource(sourceId);
    const keep = new Set(keepIds);
    let removed = 0;

    for (const story of existing) {
      if (keep.has(story.id)) continue;
      await this.db.execute({
        sql: "DELETE FROM story_records WHERE id = ?",
        args: [story.id],
      });
      removed++;
    }

    return removed;
  }

  // ============ Stats ============

  async getStats(): Promise<PipelineStats> {
    const byState: Partial<Record<EnrichmentState, number>> = {};
    let documents = 0;

    const stateResult = await this.db.execute(
      `SELECT enrichment_state, COUNT(*) as count
       FROM source_documents
       GROUP BY enrichment_state`
    );

    for (const row of stateResult.rows) {
      const state = readString(row, "enrichment_state");
      const count = readNumber(row, "count");
      documents += count;
      if (isEnrichmentState(state)) {
        byState[state] = count;
      }
    }

    const storyResult = await this.db.execute(
      `SELECT COUNT(*) as count, COUNT(source_link) as linked FROM story_records`
    );
    const storyRow = storyResult.rows[0];

    return {
      documents,
      byState,
      stories: readNumber(storyRow, "count"),
      storiesWithLinks: readNumber(storyRow, "linked"),
    };
  }
}
