export { ingestMessages, type DocumentSink } from "./ingest.js";
export { sourceDocumentId, parseFrom, normalizeReceivedAt } from "./ids.js";
export {
  SenderRules,
  evaluateCondition,
  ruleToCondition,
  isBlocked,
  type RuleCondition,
  type MessageFacts,
} from "./senders.js";
export { rawMessageSchema, rawMessageListSchema } from "./types.js";
export type {
  RawMessage,
  SenderGroup,
  TagRule,
  BlockList,
  SenderConfig,
  IngestReport,
} from "./types.js";
