export {
  KeywordExtractor,
  FALLBACK_KEYWORD,
  MAX_KEYWORDS,
  parseKeywordAnswer,
  precleanText,
  type KeywordResult,
  type KeywordSource,
} from "./extractor.js";
export {
  buildExclusionSet,
  exclusionSetFromCatalog,
  filterExclusions,
  isExcluded,
  type ExclusionCatalog,
  type ExclusionSet,
} from "./exclusions.js";
export { detectLanguage, type Language } from "./language.js";
