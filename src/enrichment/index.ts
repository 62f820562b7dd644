export { Enricher, EnrichmentError, type EnrichmentResult } from "./enricher.js";
export {
  route,
  createRoutingTable,
  type HandlerBehavior,
  type BehaviorLanguage,
  type RouteDecision,
  type RoutingTable,
} from "./router.js";
export { buildDigestPrompt, buildSummaryPrompt, documentContent } from "./prompts.js";
