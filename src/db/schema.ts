import { createClient, type Client } from "@libsql/client";

export interface DatabaseConfig {
  url: string;
  authToken?: string;
}

export function createDbClient(config: DatabaseConfig): Client {
  return createClient({
    url: config.url,
    authToken: config.authToken,
  });
}

export async function initializeDatabase(client: Client): Promise<void> {
  await client.executeMultiple(`
    -- One row per ingested newsletter
    CREATE TABLE IF NOT EXISTS source_documents (
      id TEXT PRIMARY KEY,
      routing_tag TEXT NOT NULL,
      subject TEXT NOT NULL,
      sender TEXT NOT NULL,
      content_html TEXT NOT NULL DEFAULT '',
      content_text TEXT NOT NULL DEFAULT '',
      created_at TEXT NOT NULL,
      enrichment_state TEXT NOT NULL DEFAULT 'empty',
      enriched_content TEXT,
      keywords TEXT NOT NULL DEFAULT '[]',
      score REAL,
      split_summary TEXT,
      last_error TEXT,
      updated_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_source_documents_state ON source_documents(enrichment_state);
    CREATE INDEX IF NOT EXISTS idx_source_documents_created ON source_documents(created_at);

    -- Story cards fanned out from digest newsletters
    CREATE TABLE IF NOT EXISTS story_records (
      id TEXT PRIMARY KEY,
      source_id TEXT NOT NULL,
      ordinal INTEGER NOT NULL,
      routing_tag TEXT NOT NULL,
      title TEXT NOT NULL,
      enriched_body TEXT NOT NULL,
      keywords TEXT NOT NULL DEFAULT '[]',
      source_link TEXT,
      score REAL NOT NULL,
      original_html_ref TEXT NOT NULL,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_story_records_source ON story_records(source_id);
    CREATE INDEX IF NOT EXISTS idx_story_records_created ON story_records(created_at);
  `);
}
