import type { BlockList, SenderConfig, TagRule } from "./types.js";

const BODY_SAMPLE_CHARS = 1000;

/** The parts of a message that sender rules look at. */
export interface MessageFacts {
  from: string;
  subject: string;
  body: string;
}

export type RuleCondition =
  | { type: "from"; pattern: string }
  | { type: "subject"; pattern: string }
  | { type: "body"; pattern: string }
  | { type: "and"; conditions: RuleCondition[] }
  | { type: "or"; conditions: RuleCondition[] };

export function evaluateCondition(condition: RuleCondition, message: MessageFacts): boolean {
  switch (condition.type) {
    case "from":
      return message.from.toLowerCase().includes(condition.pattern.toLowerCase());
    case "subject":
      return message.subject.toLowerCase().includes(condition.pattern.toLowerCase());
    case "body":
      return message.body
        .slice(0, BODY_SAMPLE_CHARS)
        .toLowerCase()
        .includes(condition.pattern.toLowerCase());
    case "and":
      return condition.conditions.every((c) => evaluateCondition(c, message));
    case "or":
      return condition.conditions.some((c) => evaluateCondition(c, message));
  }
}

/**
 * Turn a configured tag rule into a condition tree. A rule without any
 * field never matches.
 */
export function ruleToCondition(rule: TagRule): RuleCondition {
  const conditions: RuleCondition[] = [];
  if (rule.sender) conditions.push({ type: "from", pattern: rule.sender });
  if (rule.subjectContains) conditions.push({ type: "subject", pattern: rule.subjectContains });
  if (rule.bodyContains) conditions.push({ type: "body", pattern: rule.bodyContains });

  if (conditions.length === 0) {
    return { type: "or", conditions: [] };
  }
  return { type: rule.logic === "AND" ? "and" : "or", conditions };
}

export function isBlocked(message: MessageFacts, blocked: BlockList): boolean {
  const from = message.from.toLowerCase();

  if (from.includes("noreply") || from.includes("no-reply")) {
    return true;
  }
  if (blocked.emails.some((email) => from.includes(email.toLowerCase()))) {
    return true;
  }

  const combined = `${from} ${message.subject.toLowerCase()}`;
  return blocked.patterns.some((pattern) => combined.includes(pattern.toLowerCase()));
}

export class SenderRules {
  private readonly compiled: Array<{ rule: TagRule; condition: RuleCondition }>;

  constructor(private readonly config: SenderConfig) {
    this.compiled = config.rules.map((rule) => ({ rule, condition: ruleToCondition(rule) }));
  }

  /**
   * Routing tag for an allowed message, or null when the message is blocked
   * or comes from no active sender group. The first matching group gives the
   * base tag; the first matching rule in order overrides it.
   */
  detectTag(message: MessageFacts): string | null {
    if (isBlocked(message, this.config.blocked)) {
      return null;
    }

    const from = message.from.toLowerCase();
    const group = this.config.groups.find(
      (g) => g.active && g.emailPatterns.some((pattern) => from.includes(pattern.toLowerCase()))
    );
    if (!group) {
      return null;
    }

    for (const { rule, condition } of this.compiled) {
      if (rule.group && rule.group !== group.senderTag) continue;
      if (evaluateCondition(condition, message)) {
        return rule.tag;
      }
    }

    return group.senderTag;
  }
}
