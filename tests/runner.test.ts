import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createDbClient, initializeDatabase, Store, type NewSourceDocument } from "../src/db/index.js";
import { Enricher } from "../src/enrichment/enricher.js";
import { createRoutingTable } from "../src/enrichment/router.js";
import { buildExclusionSet } from "../src/keywords/exclusions.js";
import { KeywordExtractor } from "../src/keywords/extractor.js";
import type { LanguageModel, ModelCall } from "../src/llm/client.js";
import { PipelineRunner } from "../src/pipeline/runner.js";
import { DIGEST_ENRICHMENT, DIGEST_HTML, fakeLogger } from "./helpers.js";

const LONG_TEXT =
  "The dollar rose against major currencies after the Fed said it will keep rates on hold. " +
  "Petrobras raised its quarterly dividend and shares climbed in Sao Paulo trading.";

// Answers by prompt kind, so results do not depend on call order
class PromptModel implements LanguageModel {
  calls = 0;

  constructor(private readonly failing: RegExp | null = null) {}

  async generate(prompt: string): Promise<ModelCall> {
    this.calls++;
    if (this.failing?.test(prompt)) {
      throw new Error("overloaded");
    }

    let text: string;
    if (prompt.includes("Extract the individual news stories")) {
      text = DIGEST_ENRICHMENT;
    } else if (prompt.includes("SPECIFIC KEYWORDS")) {
      if (prompt.includes("Title: Dollar")) text = "Federal Reserve • US Dollar";
      else if (prompt.includes("Title: China")) text = "China • Trade Talks";
      else text = "Petrobras • Dividends";
    } else {
      text = "• Petrobras raised its dividend";
    }

    return { text, modelId: "fake-model", costEstimate: 0.001 };
  }
}

function doc(id: string, overrides: Partial<NewSourceDocument>): NewSourceDocument {
  return {
    id,
    routingTag: "WSJ",
    subject: "Markets Briefing",
    sender: "newsletters@wsj.com",
    contentHtml: DIGEST_HTML,
    contentText: LONG_TEXT,
    createdAt: "2026-03-01T11:00:00.000Z",
    ...overrides,
  };
}

const routing = createRoutingTable(
  { WSJ: { kind: "digest", language: "en" }, Folha: { kind: "digest", language: "pt" } },
  { kind: "single", language: "auto" }
);

describe("PipelineRunner", () => {
  let store: Store;
  let logger: ReturnType<typeof fakeLogger>;

  function runner(model: LanguageModel, concurrency = 1): PipelineRunner {
    return new PipelineRunner(store, new Enricher(model), new KeywordExtractor(model), {
      routing,
      scores: { digestStory: 8, single: 7.5 },
      exclusions: buildExclusionSet(["Breaking News"]),
      concurrency,
      batchLimit: 10,
      logger,
    });
  }

  beforeEach(async () => {
    const client = createDbClient({ url: ":memory:" });
    await initializeDatabase(client);
    store = new Store(client);
    logger = fakeLogger();

    await store.saveSourceDocument(doc("digest", { createdAt: "2026-03-04T11:00:00.000Z" }));
    await store.saveSourceDocument(
      doc("single", {
        routingTag: "Goldman Sachs",
        subject: "Petrobras Raises Dividend",
        createdAt: "2026-03-03T11:00:00.000Z",
      })
    );
    await store.saveSourceDocument(
      doc("resplit", { routingTag: "WSJ-digest", createdAt: "2026-03-02T11:00:00.000Z" })
    );
    await store.saveSourceDocument(
      doc("empty-body", {
        routingTag: "Folha",
        contentText: "Ver no navegador",
        contentHtml: "",
        createdAt: "2026-03-01T11:00:00.000Z",
      })
    );
  });

  it("routes each document and reports per-document outcomes", async () => {
    const report = await runner(new PromptModel()).run();

    expect(report.outcomes.map((o) => [o.id, o.state, o.stories])).toEqual([
      ["digest", "split_done", 2],
      ["single", "enriched_single", 0],
      ["resplit", "failed", 0],
      ["empty-body", "failed", 0],
    ]);
    expect(report).toMatchObject({
      mode: "enrich-unenriched",
      processed: 4,
      splitDone: 1,
      enrichedSingle: 1,
      failed: 2,
      stories: 2,
    });
    expect(report.costEstimate).toBeCloseTo(0.005);
  });

  it("persists the result of each path", async () => {
    await runner(new PromptModel()).run();

    expect(await store.getSourceDocument("digest")).toMatchObject({
      enrichmentState: "split_done",
      splitSummary: "Split into 2 stories",
    });
    const stories = await store.getStoriesForSource("digest");
    expect(stories.map((s) => [s.id, s.keywords, s.sourceLink])).toEqual([
      ["digest_story_1", ["Federal Reserve", "US Dollar"], "https://news.example.com/markets/dollar-gains-fed"],
      ["digest_story_2", ["China", "Trade Talks"], "https://news.example.com/world/china-trade-talks"],
    ]);

    expect(await store.getSourceDocument("single")).toMatchObject({
      enrichmentState: "enriched_single",
      enrichedContent: "• Petrobras raised its dividend",
      keywords: ["Petrobras", "Dividends"],
      score: 7.5,
    });
    expect(await store.getSourceDocument("resplit")).toMatchObject({
      enrichmentState: "failed",
      lastError: 'Routing tag "WSJ-digest" already carries the digest marker',
    });
    expect(await store.getSourceDocument("empty-body")).toMatchObject({
      enrichmentState: "failed",
      lastError: "Cannot enrich: only 16 characters of content",
    });
  });

  it("gives the same outcomes with several documents in flight", async () => {
    const report = await runner(new PromptModel(), 3).run();

    expect(report.outcomes.map((o) => o.state)).toEqual([
      "split_done",
      "enriched_single",
      "failed",
      "failed",
    ]);
  });

  describe("documents abandoned mid-run", () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it("retries them once they have been in progress longer than the stale window", async () => {
      vi.useFakeTimers({ toFake: ["Date"] });
      vi.setSystemTime(new Date("2026-03-05T08:00:00.000Z"));
      await store.markSplitPending("digest");
      await store.markEnriching("single");
      await store.markSplitDone("resplit", "Split into 1 stories");
      await store.markSplitDone("empty-body", "Split into 1 stories");

      vi.setSystemTime(new Date("2026-03-05T08:10:00.000Z"));
      const early = await runner(new PromptModel()).run();
      expect(early.processed).toBe(0);

      vi.setSystemTime(new Date("2026-03-05T08:31:00.000Z"));
      const late = await runner(new PromptModel()).run();
      expect(late.outcomes.map((o) => [o.id, o.state])).toEqual([
        ["digest", "split_done"],
        ["single", "enriched_single"],
      ]);
      expect((await store.getSourceDocument("digest"))?.splitSummary).toBe("Split into 2 stories");
    });
  });

  it("marks a document failed when the model call fails and keeps going", async () => {
    const report = await runner(new PromptModel(/Summarize/)).run();

    expect(report.outcomes.find((o) => o.id === "single")).toMatchObject({
      state: "failed",
      error: "Model call failed: overloaded",
    });
    expect(report.splitDone).toBe(1);
    expect(logger.error).toHaveBeenCalled();
    expect((await store.getSourceDocument("single"))?.lastError).toBe("Model call failed: overloaded");
  });

  it("respects the limit and the since filter", async () => {
    const limited = await runner(new PromptModel()).run({ limit: 1 });
    expect(limited.outcomes.map((o) => o.id)).toEqual(["digest"]);

    const recent = await runner(new PromptModel()).run({ since: "2026-03-02T12:00:00.000Z" });
    expect(recent.outcomes.map((o) => o.id)).toEqual(["single"]);
  });

  it("removes stale stories when a digest is enriched again", async () => {
    await runner(new PromptModel()).run();
    const [first] = await store.getStoriesForSource("digest");
    await store.upsertStory({ ...first, id: "digest_story_7", ordinal: 7 });

    const report = await runner(new PromptModel()).reenrichLatest(1);

    expect(report.mode).toBe("reenrich");
    expect(report.outcomes.map((o) => [o.id, o.state])).toEqual([["digest", "split_done"]]);
    expect((await store.getStoriesForSource("digest")).map((s) => s.id)).toEqual([
      "digest_story_1",
      "digest_story_2",
    ]);
  });

  it("enriches one document by id", async () => {
    const report = await runner(new PromptModel()).enrichById("single");

    expect(report.outcomes.map((o) => [o.id, o.state])).toEqual([["single", "enriched_single"]]);
    await expect(runner(new PromptModel()).enrichById("missing")).rejects.toThrow(
      "Source document not found: missing"
    );
  });
});
