import type { Anchor } from "./link-extractor.js";

export const SIMILARITY_WEIGHT = 0.6;
export const OVERLAP_WEIGHT = 0.4;

// A wrong link is worse than none: below this the card falls back to the email HTML
export const CONFIDENCE_FLOOR = 0.4;

export interface AnchorScore {
  similarity: number;
  overlap: number;
  score: number;
}

export interface LinkMatch {
  url: string;
  anchorText: string;
  score: number;
}

/**
 * Lower-case a headline and drop decoration the model or the newsletter put
 * in front of it: emoji, bullets and a "3." ordinal prefix.
 */
export function normalizeTitle(title: string): string {
  return title
    .toLowerCase()
    .replace(/^[\s\p{Extended_Pictographic}\u{FE0F}•*·-]+/u, "")
    .replace(/^\d+\.\s*/, "")
    .replace(/\s+/g, " ")
    .trim();
}

function longestCommonSubsequence(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;

  let previous = new Array<number>(b.length + 1).fill(0);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      current[j] =
        a[i - 1] === b[j - 1]
          ? previous[j - 1] + 1
          : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length];
}

/**
 * Sequence similarity in [0, 1]: 2 * LCS / (|a| + |b|).
 */
export function sequenceRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * longestCommonSubsequence(a, b)) / total;
}

// English and Portuguese function words, left out of the overlap
const COMMON_WORDS = new Set([
  "the", "a", "an", "and", "or", "in", "on", "at", "to", "for", "of", "is",
  "o", "os", "as", "de", "da", "do", "das", "dos", "e", "em", "para",
]);

function wordSet(text: string): Set<string> {
  const words = text.match(/[\p{L}\p{N}]+/gu) ?? [];
  return new Set(words.filter((word) => !COMMON_WORDS.has(word)));
}

/**
 * Share of the title's content words that also appear in the anchor text.
 * Common words count on neither side.
 */
export function wordOverlap(title: string, anchorText: string): number {
  const titleWords = wordSet(title);
  if (titleWords.size === 0) return 0;

  const anchorWords = wordSet(anchorText);
  let shared = 0;
  for (const word of titleWords) {
    if (anchorWords.has(word)) shared++;
  }
  return shared / titleWords.size;
}

export function scoreAnchor(title: string, anchorText: string): AnchorScore {
  const normalizedTitle = normalizeTitle(title);
  const normalizedAnchor = normalizeTitle(anchorText);

  const similarity = sequenceRatio(normalizedTitle, normalizedAnchor);
  const overlap = wordOverlap(normalizedTitle, normalizedAnchor);

  return {
    similarity,
    overlap,
    score: similarity * SIMILARITY_WEIGHT + overlap * OVERLAP_WEIGHT,
  };
}

/**
 * Best-scoring anchor for a story title, or null when nothing clears the
 * confidence floor. Ties keep the anchor seen first.
 */
export function findBestAnchor(
  title: string,
  anchors: readonly Anchor[],
  floor: number = CONFIDENCE_FLOOR
): LinkMatch | null {
  if (normalizeTitle(title).length === 0) return null;

  let best: LinkMatch | null = null;

  for (const anchor of anchors) {
    const { score } = scoreAnchor(title, anchor.text);
    if (best === null || score > best.score) {
      best = { url: anchor.url, anchorText: anchor.text, score };
    }
  }

  return best !== null && best.score > floor ? best : null;
}

export function matchLink(title: string, anchors: readonly Anchor[]): string | null {
  return findBestAnchor(title, anchors)?.url ?? null;
}
