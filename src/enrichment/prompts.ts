import type { SourceDocument } from "../db/index.js";
import type { Language } from "../keywords/language.js";
import { htmlToText } from "../utils/html.js";

export const DIGEST_CONTENT_CHARS = 12000;
export const SINGLE_CONTENT_CHARS = 15000;
export const MIN_CONTENT_CHARS = 100;

/**
 * Plain-text body to send to the model. Falls back to the HTML body when the
 * text part is missing or too short to be the real content.
 */
export function documentContent(
  doc: Pick<SourceDocument, "contentText" | "contentHtml">,
  maxChars: number
): string {
  let content = doc.contentText.trim();

  if (content.length < MIN_CONTENT_CHARS && doc.contentHtml.length > MIN_CONTENT_CHARS) {
    const extracted = htmlToText(doc.contentHtml);
    if (extracted.length > content.length) {
      content = extracted;
    }
  }

  return content.replace(/\s+/g, " ").trim().slice(0, maxChars);
}

export function buildDigestPrompt(subject: string, content: string, language: Language): string {
  if (language === "pt") {
    return `Extraia as notícias individuais deste briefing.

REGRAS:
1. Extraia SOMENTE notícias reais (sem quadros de mercado ou conteúdo institucional)
2. Numere cada notícia (1, 2, 3...)
3. Use as manchetes EXATAS do newsletter
4. Adicione 2-4 bullets por notícia com detalhes específicos (nomes, números, dados)

Formate cada notícia EXATAMENTE assim, com o número e a manchete sozinhos na linha:

1. [Manchete exata]
• [Detalhe específico do texto]
• [Outro ponto com números/nomes]

Responda em português. Extraia entre 6 e 12 notícias.

Título do newsletter: ${subject}
Conteúdo do newsletter:
${content}`;
  }

  return `Extract the individual news stories from this newsletter briefing.

RULES:
1. Extract ONLY actual news stories (no market snapshots or meta content)
2. Number each story clearly (1, 2, 3...)
3. Use the EXACT headlines from the newsletter
4. Add 2-4 bullet points per story with specific details (names, numbers, data)

Format each story EXACTLY like this, with the number and headline alone on their line:

1. [Exact Story Headline]
• [Specific fact or detail from the story]
• [Another key point with numbers/names if available]

Extract between 6 and 12 stories. Focus on the main news items.

Newsletter title: ${subject}
Newsletter content:
${content}`;
}

export function buildSummaryPrompt(subject: string, content: string, language: Language): string {
  const languageInstruction =
    language === "pt" ? "\nResponda em português.\n" : "";

  return `Summarize this financial newsletter for a busy reader.

Write 4-8 bullet points starting with "• ". Follow the author's argument, keep
their specific numbers, names and data, and do not add facts that are not in
the text.
${languageInstruction}
Newsletter title: ${subject}
Newsletter content:
${content}`;
}
