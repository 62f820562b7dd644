export type Language = "en" | "pt";

const PORTUGUESE_WORDS = new Set([
  "não",
  "para",
  "com",
  "uma",
  "mais",
  "pelo",
  "pela",
  "dos",
  "das",
  "também",
  "após",
  "notícias",
  "hoje",
  "brasil",
  "semana",
  "governo",
  "mercado",
]);

const ENGLISH_WORDS = new Set([
  "the",
  "and",
  "with",
  "for",
  "from",
  "that",
  "this",
  "after",
  "will",
  "said",
  "today",
  "week",
]);

/**
 * Guess whether text is Portuguese or English by counting stopwords.
 * English wins ties.
 */
export function detectLanguage(text: string): Language {
  const words = text.toLowerCase().match(/\p{L}+/gu) ?? [];

  let portuguese = 0;
  let english = 0;
  for (const word of words) {
    if (PORTUGUESE_WORDS.has(word)) portuguese++;
    else if (ENGLISH_WORDS.has(word)) english++;
  }

  return portuguese > english ? "pt" : "en";
}
