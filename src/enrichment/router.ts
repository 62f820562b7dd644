import type { SourceDocument } from "../db/index.js";
import { DIGEST_TAG_SUFFIX } from "../digest/splitter.js";
import type { Language } from "../keywords/language.js";

export type BehaviorLanguage = Language | "auto";

export interface HandlerBehavior {
  kind: "digest" | "single";
  language: BehaviorLanguage;
}

export type RouteDecision = HandlerBehavior | { kind: "skip"; reason: string };

export interface RoutingTable {
  readonly behaviors: ReadonlyMap<string, HandlerBehavior>;
  readonly fallback: HandlerBehavior;
}

export function createRoutingTable(
  behaviors: Record<string, HandlerBehavior>,
  fallback: HandlerBehavior
): RoutingTable {
  return Object.freeze({
    behaviors: new Map(Object.entries(behaviors)),
    fallback,
  });
}

/**
 * Decide how a document is enriched. Split output carries the digest
 * suffix and is never routed into a second split.
 */
export function route(doc: Pick<SourceDocument, "routingTag">, table: RoutingTable): RouteDecision {
  if (doc.routingTag.endsWith(DIGEST_TAG_SUFFIX)) {
    return {
      kind: "skip",
      reason: `Routing tag "${doc.routingTag}" already carries the digest marker`,
    };
  }

  return table.behaviors.get(doc.routingTag) ?? table.fallback;
}
