export { parseDigest, type StoryFragment } from "./parser.js";
export { extractAnchors, type Anchor } from "./link-extractor.js";
export {
  matchLink,
  findBestAnchor,
  scoreAnchor,
  normalizeTitle,
  sequenceRatio,
  wordOverlap,
  type LinkMatch,
} from "./link-matcher.js";
export {
  DigestSplitter,
  DIGEST_TAG_SUFFIX,
  storyRecordId,
  type SplitSink,
  type SplitterOptions,
  type SplitOutcome,
  type SkippedFragment,
} from "./splitter.js";
