/**
 * Transcript normalizer
 * Converts raw export records into canonical conversation documents
 */

import { readExportFile } from '../ingest/export/index.js';
import { RawRecordSchema, type RawMessage, type RawRecord } from '../ingest/export/index.js';
import { createLogger, writeJsonFileAtomic, type Logger } from '../utils/index.js';
import { cleanText } from './text.js';

/**
 * Sender ID the chat platform uses for the assistant bot
 */
export const BOT_SENDER_ID = 'bf17272dc3f0';

export type Sender = 'Bot' | 'User';

/**
 * Cleaned message in a canonical transcript
 */
export interface CanonicalMessage {
  message_id: string;
  sender: Sender;
  text: string;
  timestamp: string;
}

/**
 * Canonical conversation document
 */
export interface Conversation {
  metadata: {
    conversation_id: string;
    start_time_utc: string;
    total_messages: number;
  };
  transcript_full_text: string;
  transcript_list_of_messages: CanonicalMessage[];
}

/**
 * Normalization progress
 */
export interface NormalizeProgress {
  scanned: number;
  normalized: number;
  total: number;
}

/**
 * Batch normalization options
 */
export interface NormalizeOptions {
  maxConversations?: number;
  progressInterval?: number;
  onProgress?: (progress: NormalizeProgress) => void;
  logger?: Logger;
}

/**
 * Batch normalization result
 */
export interface NormalizeResult {
  conversations: Conversation[];
  scanned: number;
  skipped: number;
  invalid: number;
}

/**
 * Result of normalizing an export file
 */
export interface ProcessFileResult extends NormalizeResult {
  inputPath: string;
  outputPath: string;
  totalRecords: number;
  bytesWritten: number;
}

export const DEFAULT_MAX_CONVERSATIONS = 100;
const DEFAULT_PROGRESS_INTERVAL = 10;

/**
 * Resolve the transcript label for a sender ID
 */
export function resolveSender(senderId: string): Sender {
  return senderId === BOT_SENDER_ID ? 'Bot' : 'User';
}

/**
 * Whether a raw message belongs in the transcript
 */
export function isTranscriptMessage(msg: RawMessage): boolean {
  return (
    msg.type === 'TEXT' &&
    (msg.is_internal === false || msg.is_internal === undefined) &&
    !!msg.content?.text &&
    msg.sender_id != null
  );
}

function toCanonicalMessage(msg: RawMessage): CanonicalMessage | null {
  if (msg.sender_id == null) return null;

  const text = cleanText(msg.content?.text);
  if (!text) return null;

  return {
    message_id: msg.id ?? '',
    sender: resolveSender(msg.sender_id),
    text,
    timestamp: msg.created_at ?? '',
  };
}

/**
 * Render "Sender: text" lines
 */
export function formatTranscriptLines(messages: CanonicalMessage[]): string[] {
  return messages.map(msg => `${msg.sender}: ${msg.text}`);
}

/**
 * Normalize one export record.
 * Returns null when no message survives filtering and cleaning.
 */
export function normalizeRecord(record: RawRecord): Conversation | null {
  const messages: CanonicalMessage[] = [];

  for (const msg of record.messages ?? []) {
    if (!isTranscriptMessage(msg)) continue;

    const canonical = toCanonicalMessage(msg);
    if (canonical) {
      messages.push(canonical);
    }
  }

  if (messages.length === 0) {
    return null;
  }

  return {
    metadata: {
      conversation_id: record.conversation_id ?? '',
      start_time_utc: messages[0].timestamp,
      total_messages: messages.length,
    },
    transcript_full_text: formatTranscriptLines(messages).join('\n'),
    transcript_list_of_messages: messages,
  };
}

/**
 * Normalize records in order until maxConversations have been produced
 */
export function normalizeExport(records: unknown[], options: NormalizeOptions = {}): NormalizeResult {
  const maxConversations = options.maxConversations ?? DEFAULT_MAX_CONVERSATIONS;
  const interval = options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
  const progress = options.onProgress || (() => {});
  const log = options.logger ?? createLogger({ module: 'normalize' });

  const result: NormalizeResult = {
    conversations: [],
    scanned: 0,
    skipped: 0,
    invalid: 0,
  };

  for (let i = 0; i < records.length; i++) {
    if (result.conversations.length >= maxConversations) break;

    result.scanned++;
    const parsed = RawRecordSchema.safeParse(records[i]);

    if (!parsed.success) {
      result.invalid++;
      log.warn({ index: i, issue: parsed.error.issues[0]?.message }, 'Skipping malformed export record');
    } else {
      const conversation = normalizeRecord(parsed.data);
      if (conversation) {
        result.conversations.push(conversation);
      } else {
        result.skipped++;
        log.debug({ conversationId: parsed.data.conversation_id }, 'No transcript messages, skipping');
      }
    }

    if ((i + 1) % interval === 0) {
      progress({
        scanned: i + 1,
        normalized: result.conversations.length,
        total: records.length,
      });
    }
  }

  return result;
}

/**
 * Normalize an export file and write the canonical conversations
 */
export async function processExportFile(
  inputPath: string,
  outputPath: string,
  options: NormalizeOptions = {}
): Promise<ProcessFileResult> {
  const records = await readExportFile(inputPath);
  const result = normalizeExport(records, options);
  const bytesWritten = await writeJsonFileAtomic(outputPath, result.conversations);

  return {
    ...result,
    inputPath,
    outputPath,
    totalRecords: records.length,
    bytesWritten,
  };
}
