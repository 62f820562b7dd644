import { createHash } from "node:crypto";

export function sourceDocumentId(subject: string, sender: string, receivedAt: string): string {
  return createHash("md5").update(`${subject}${sender}${receivedAt}`).digest("hex");
}

/**
 * Split a From header into display name and address. A header without
 * angle brackets is taken to be the address itself.
 */
export function parseFrom(from: string): { name: string; address: string } {
  const match = from.match(/<([^>]+)>/);
  if (!match) {
    const address = from.trim().toLowerCase();
    return { name: address, address };
  }

  const name = from
    .slice(0, match.index)
    .trim()
    .replace(/^"|"$/g, "");
  const address = match[1].trim().toLowerCase();
  return { name: name || address, address };
}

/** ISO-8601 UTC receipt time, or null when the date cannot be parsed. */
export function normalizeReceivedAt(date: string): string | null {
  const parsed = new Date(date);
  return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
}
