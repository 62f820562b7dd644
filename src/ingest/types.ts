import { z } from "zod";

/** One exported email, as produced by a mailbox export or forwarding hook. */
export const rawMessageSchema = z.object({
  // "Name <address@host>" or a bare address
  from: z.string().min(1),
  subject: z.string().default(""),
  // Receipt time; anything Date can parse
  date: z.string().min(1),
  html: z.string().default(""),
  text: z.string().default(""),
});

export const rawMessageListSchema = z.array(rawMessageSchema);

export type RawMessage = z.infer<typeof rawMessageSchema>;

export interface SenderGroup {
  senderTag: string;
  // Lower-cased substrings matched against the From header
  emailPatterns: string[];
  active: boolean;
}

export interface TagRule {
  tag: string;
  // Only messages already allowed by this group's tag are considered
  group?: string;
  sender?: string;
  subjectContains?: string;
  bodyContains?: string;
  logic: "AND" | "OR";
}

export interface BlockList {
  emails: string[];
  patterns: string[];
}

export interface SenderConfig {
  groups: SenderGroup[];
  rules: TagRule[];
  blocked: BlockList;
}

export interface IngestReport {
  stored: number;
  duplicates: number;
  blocked: number;
  invalid: number;
}
