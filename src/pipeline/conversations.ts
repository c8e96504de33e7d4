/**
 * Canonical conversations file loader
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { Conversation } from '../normalize/index.js';

/**
 * Fatal problem with the conversations file
 */
export class ConversationsFileError extends Error {
  constructor(message: string, public readonly filePath: string) {
    super(message);
    this.name = 'ConversationsFileError';
  }
}

export const CanonicalMessageSchema = z.object({
  message_id: z.string(),
  sender: z.enum(['Bot', 'User']),
  text: z.string(),
  timestamp: z.string(),
});

export const ConversationSchema = z.object({
  metadata: z.object({
    conversation_id: z.string(),
    start_time_utc: z.string(),
    total_messages: z.number().int().nonnegative(),
  }),
  transcript_full_text: z.string(),
  transcript_list_of_messages: z.array(CanonicalMessageSchema),
});

export const ConversationsFileSchema = z.array(ConversationSchema);

/**
 * Parse canonical conversations from JSON text
 * @throws ConversationsFileError
 */
export function parseConversations(jsonContent: string, filePath: string): Conversation[] {
  let rawData: unknown;
  try {
    rawData = JSON.parse(jsonContent);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConversationsFileError(`Invalid JSON in '${filePath}': ${detail}`, filePath);
  }

  if (!Array.isArray(rawData)) {
    throw new ConversationsFileError(`Expected a JSON array in '${filePath}'`, filePath);
  }

  const result = ConversationsFileSchema.safeParse(rawData);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join('.') : '';
    throw new ConversationsFileError(
      `Malformed conversation in '${filePath}' at ${where}: ${issue?.message ?? 'unknown'}`,
      filePath
    );
  }

  return result.data;
}

/**
 * Load canonical conversations from a file
 * @throws ConversationsFileError
 */
export async function loadConversations(filePath: string): Promise<Conversation[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    const notFound = err instanceof Error && 'code' in err && err.code === 'ENOENT';
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConversationsFileError(
      notFound ? `File '${filePath}' not found.` : `Error loading conversations: ${detail}`,
      filePath
    );
  }

  return parseConversations(content, filePath);
}
