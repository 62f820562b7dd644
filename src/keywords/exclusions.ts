/** Category name to excluded phrases, as stored in exclusions.json. */
export type ExclusionCatalog = Readonly<Record<string, readonly string[]>>;

export interface ExclusionSet {
  // every entry, lower-cased
  readonly exact: ReadonlySet<string>;
  // multi-word entries, lower-cased; these also exclude by substring
  readonly phrases: readonly string[];
}

function normalize(term: string): string {
  return term.trim().replace(/\s+/g, " ").toLowerCase();
}

export function buildExclusionSet(terms: Iterable<string>): ExclusionSet {
  const exact = new Set<string>();
  const phrases: string[] = [];

  for (const term of terms) {
    const normalized = normalize(term);
    if (!normalized || exact.has(normalized)) continue;

    exact.add(normalized);
    if (normalized.includes(" ")) {
      phrases.push(normalized);
    }
  }

  return Object.freeze({ exact, phrases: Object.freeze(phrases) });
}

export function exclusionSetFromCatalog(catalog: ExclusionCatalog): ExclusionSet {
  return buildExclusionSet(Object.values(catalog).flat());
}

export function isExcluded(term: string, exclusions: ExclusionSet): boolean {
  const normalized = normalize(term);
  if (!normalized) return true;
  if (exclusions.exact.has(normalized)) return true;

  // Substring either way, on whole words: "AI" is not part of "daily brief"
  const padded = ` ${normalized} `;
  return exclusions.phrases.some((phrase) => {
    const paddedPhrase = ` ${phrase} `;
    return padded.includes(paddedPhrase) || paddedPhrase.includes(padded);
  });
}

/**
 * Drop generic terms from a keyword list, keeping the original order.
 */
export function filterExclusions(
  candidates: readonly string[],
  exclusions: ExclusionSet
): string[] {
  return candidates.filter((candidate) => !isExcluded(candidate, exclusions));
}
