import type { LanguageModel } from "../llm/client.js";
import { filterExclusions, type ExclusionSet } from "./exclusions.js";
import { detectLanguage, type Language } from "./language.js";

export const MAX_KEYWORDS = 6;
const BODY_SAMPLE_CHARS = 2000;
const KEYWORD_MAX_TOKENS = 150;

export const FALLBACK_KEYWORD: Record<Language, string> = {
  en: "Financial News",
  pt: "Notícias Financeiras",
};

// Meta phrases the model tends to echo back as keywords
const BOILERPLATE_PATTERNS = [
  /\b(breaking|latest|top|key)\s+(news|updates?|headlines?)\b/gi,
  /\bmarket\s+(updates?|news|highlights?|roundup)\b/gi,
  /\b(daily|weekly|monthly)\s+(brief|report|summary)\b/gi,
  /\b(today'?s?|this\s+week'?s?)\s+\w+/gi,
];

export type KeywordResult =
  | { status: "extracted"; language: Language; keywords: string[]; costEstimate: number }
  | { status: "filtered"; language: Language; keywords: string[]; costEstimate: number }
  | { status: "failed"; language: Language; keywords: string[]; error: unknown };

export interface KeywordSource {
  extract(title: string, body: string, exclusions: ExclusionSet): Promise<KeywordResult>;
}

export function precleanText(text: string): string {
  let cleaned = text;
  for (const pattern of BOILERPLATE_PATTERNS) {
    cleaned = cleaned.replace(pattern, "");
  }
  return cleaned.replace(/[ \t]{2,}/g, " ").trim();
}

/**
 * Split a model answer ("Apple • AI Chips • China") into candidate terms,
 * de-duplicated case-insensitively in answer order.
 */
export function parseKeywordAnswer(answer: string): string[] {
  const seen = new Set<string>();
  const terms: string[] = [];

  const body = answer.replace(/^\s*(keywords|palavras-chave)\s*:/i, "");

  for (const raw of body.split(/[•\n,;|]/)) {
    const term = raw
      .replace(/^\s*(?:[-*]|\d+[.)])\s*/, "")
      .replace(/^["'“”]+|["'“”]+$/g, "")
      .trim();

    if (!term) continue;

    const key = term.toLowerCase();
    if (seen.has(key)) continue;

    seen.add(key);
    terms.push(term);
  }

  return terms;
}

export class KeywordExtractor implements KeywordSource {
  constructor(private readonly model: LanguageModel) {}

  /**
   * Pre-clean, ask the model, then drop generic terms. Never rejects: a model
   * failure comes back as status "failed" carrying the fallback keyword.
   */
  async extract(title: string, body: string, exclusions: ExclusionSet): Promise<KeywordResult> {
    const language = detectLanguage(`${title}\n${body}`);
    const prompt = this.buildPrompt(
      precleanText(title),
      precleanText(body.slice(0, BODY_SAMPLE_CHARS)),
      language
    );

    let answer: string;
    let costEstimate: number;
    try {
      const call = await this.model.generate(prompt, KEYWORD_MAX_TOKENS);
      answer = call.text;
      costEstimate = call.costEstimate;
    } catch (error) {
      return { status: "failed", language, keywords: [FALLBACK_KEYWORD[language]], error };
    }

    const keywords = filterExclusions(parseKeywordAnswer(answer), exclusions).slice(
      0,
      MAX_KEYWORDS
    );

    if (keywords.length === 0) {
      return { status: "filtered", language, keywords: [FALLBACK_KEYWORD[language]], costEstimate };
    }

    return { status: "extracted", language, keywords, costEstimate };
  }

  private buildPrompt(title: string, body: string, language: Language): string {
    const languageInstruction =
      language === "pt"
        ? "\nThis is Portuguese content. Write the keywords in Portuguese.\n"
        : "";

    return `Extract 4-6 SPECIFIC KEYWORDS from this financial story.

GOOD KEYWORDS (concrete and specific):
- Company names: "Apple", "Tesla", "Boston Scientific", "Petrobras"
- Specific topics: "AI Chips", "Trade War", "Nuclear Energy", "Interest Rate Cut"
- People: "Jerome Powell", "Elon Musk", named executives
- Places and institutions: "China", "Brazil", "Federal Reserve", "Silicon Valley"
- Specific concepts: "Rare Earth Metals", "Tariffs", "Inflation Target"

BAD KEYWORDS (too generic, AVOID):
- "Breaking News", "Market Updates", "Analysis", "Report"
- "Notícias", "Análise", "Mercado", "Resumo"
- "Markets", "Trading", "Investors", "Today"
- "Updates", "Highlights", "Coverage", "Outlook"

Focus on what the story is ABOUT (entities, events, concepts), not how it is presented.
${languageInstruction}
Return ONLY the keywords separated by " • ". Maximum 6 keywords.

Title: ${title}

Content: ${body}

Keywords:`;
  }
}
