import type { SourceDocument } from "../db/index.js";
import { detectLanguage, type Language } from "../keywords/language.js";
import type { LanguageModel } from "../llm/client.js";
import {
  buildDigestPrompt,
  buildSummaryPrompt,
  documentContent,
  DIGEST_CONTENT_CHARS,
  MIN_CONTENT_CHARS,
  SINGLE_CONTENT_CHARS,
} from "./prompts.js";
import type { HandlerBehavior } from "./router.js";

const DIGEST_MAX_TOKENS = 2500;
const SINGLE_MAX_TOKENS = 1000;

export interface EnrichmentResult {
  rawText: string;
  costEstimate: number;
  modelId: string;
}

export class EnrichmentError extends Error {
  constructor(
    message: string,
    readonly sourceId: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "EnrichmentError";
  }
}

export class Enricher {
  constructor(private readonly model: LanguageModel) {}

  async enrich(doc: SourceDocument, behavior: HandlerBehavior): Promise<EnrichmentResult> {
    const maxChars = behavior.kind === "digest" ? DIGEST_CONTENT_CHARS : SINGLE_CONTENT_CHARS;
    const content = documentContent(doc, maxChars);

    // Summarizing an empty body only produces invented text
    if (content.length < MIN_CONTENT_CHARS) {
      throw new EnrichmentError(
        `Cannot enrich: only ${content.length} characters of content`,
        doc.id
      );
    }

    const language: Language =
      behavior.language === "auto" ? detectLanguage(`${doc.subject}\n${content}`) : behavior.language;

    const prompt =
      behavior.kind === "digest"
        ? buildDigestPrompt(doc.subject, content, language)
        : buildSummaryPrompt(doc.subject, content, language);

    try {
      const call = await this.model.generate(
        prompt,
        behavior.kind === "digest" ? DIGEST_MAX_TOKENS : SINGLE_MAX_TOKENS
      );

      if (!call.text.trim()) {
        throw new Error("Model returned an empty completion");
      }

      return {
        rawText: call.text.replace(/\n{3,}/g, "\n\n").trim(),
        costEstimate: call.costEstimate,
        modelId: call.modelId,
      };
    } catch (error) {
      throw new EnrichmentError(
        `Model call failed: ${error instanceof Error ? error.message : String(error)}`,
        doc.id,
        { cause: error }
      );
    }
  }
}
