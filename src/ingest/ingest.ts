import type { NewSourceDocument } from "../db/index.js";
import { consoleLogger, type Logger } from "../logger.js";
import { normalizeReceivedAt, parseFrom, sourceDocumentId } from "./ids.js";
import type { SenderRules } from "./senders.js";
import type { IngestReport, RawMessage } from "./types.js";

export interface DocumentSink {
  saveSourceDocument(doc: NewSourceDocument): Promise<boolean>;
}

/**
 * Allow-list, tag and store a batch of messages. Stored documents start in
 * the "empty" state; a message already stored is counted as a duplicate and
 * left untouched.
 */
export async function ingestMessages(
  messages: readonly RawMessage[],
  rules: SenderRules,
  sink: DocumentSink,
  logger: Logger = consoleLogger
): Promise<IngestReport> {
  const report: IngestReport = { stored: 0, duplicates: 0, blocked: 0, invalid: 0 };

  for (const message of messages) {
    const receivedAt = normalizeReceivedAt(message.date);
    if (!receivedAt) {
      logger.warn(`  Invalid date "${message.date}": ${message.subject.slice(0, 40)}`);
      report.invalid++;
      continue;
    }

    const tag = rules.detectTag({
      from: message.from,
      subject: message.subject,
      body: message.text,
    });
    if (!tag) {
      logger.log(`  Blocked: ${message.from.slice(0, 30)} - ${message.subject.slice(0, 30)}`);
      report.blocked++;
      continue;
    }

    const sender = parseFrom(message.from).address;
    const stored = await sink.saveSourceDocument({
      id: sourceDocumentId(message.subject, sender, receivedAt),
      routingTag: tag,
      subject: message.subject,
      sender,
      contentHtml: message.html,
      contentText: message.text,
      createdAt: receivedAt,
    });

    if (stored) {
      logger.log(`  Stored [${tag}] ${message.subject.slice(0, 50)}`);
      report.stored++;
    } else {
      report.duplicates++;
    }
  }

  return report;
}
