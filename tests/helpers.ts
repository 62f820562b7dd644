import { vi } from "vitest";
import type { SourceDocument } from "../src/db/index.js";
import type { LanguageModel, ModelCall } from "../src/llm/client.js";
import type { Logger } from "../src/logger.js";

export type FakeAnswer = string | Error | ((prompt: string) => string);

/** Replays answers in order; an Error answer rejects that call. */
export class FakeModel implements LanguageModel {
  readonly prompts: string[] = [];
  readonly maxTokens: number[] = [];

  constructor(
    private readonly answers: FakeAnswer[],
    private readonly costPerCall = 0.001
  ) {}

  async generate(prompt: string, maxTokens: number): Promise<ModelCall> {
    this.prompts.push(prompt);
    this.maxTokens.push(maxTokens);

    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error("FakeModel has no answer left");
    }
    if (answer instanceof Error) {
      throw answer;
    }

    return {
      text: typeof answer === "function" ? answer(prompt) : answer,
      modelId: "fake-model",
      costEstimate: this.costPerCall,
    };
  }
}

export function fakeLogger() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

export function makeSource(overrides: Partial<SourceDocument> = {}): SourceDocument {
  return {
    id: "src1",
    routingTag: "WSJ",
    subject: "Markets Briefing",
    sender: "newsletters@wsj.com",
    contentHtml: "",
    contentText: "",
    createdAt: "2026-03-02T11:00:00.000Z",
    enrichmentState: "enriching",
    enrichedContent: null,
    keywords: [],
    score: null,
    splitSummary: null,
    lastError: null,
    updatedAt: "2026-03-02T11:00:00.000Z",
    ...overrides,
  };
}

export const DIGEST_HTML = `
<html><body>
<p><a href="https://news.example.com/markets/dollar-gains-fed">Dollar Gains on Fed Comments</a></p>
<p>The dollar climbed after remarks from Federal Reserve officials.</p>
<p><a href="https://news.example.com/world/china-trade-talks">China Trade Talks Resume in Geneva</a></p>
<p>Negotiators met for a second day.</p>
<p><a href="https://news.example.com/email/unsubscribe?u=42">Unsubscribe</a></p>
</body></html>`;

export const DIGEST_ENRICHMENT = `1. Dollar Gains on Fed Comments
• The dollar index rose 0.6% after Fed remarks
• Treasury yields climbed

2. China Trade Talks Resume
• Negotiators met in Geneva for a second day
• Tariff relief is on the table`;
