/**
 * Classification pipeline
 * Sequential batch over canonical conversations
 */

import type {
  AnalysisRecord,
  ClassificationFailure,
  Classifier,
} from '../classify/index.js';
import type { Conversation } from '../normalize/index.js';
import { createLogger, sleep, type Logger } from '../utils/index.js';

/**
 * Half-open, 0-based index range [start, end)
 */
export interface IndexRange {
  start: number;
  end: number;
}

/**
 * Batch progress
 */
export interface ClassifyProgress {
  current: number;
  total: number;
  conversationId: string;
  succeeded: number;
  failed: number;
}

/**
 * Batch options
 */
export interface ClassifyManyOptions {
  range?: IndexRange;
  delayMs?: number;
  onProgress?: (progress: ClassifyProgress) => void;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/**
 * Batch result
 */
export interface ClassifyManyResult {
  records: AnalysisRecord[];
  failures: ClassificationFailure[];
  failedCount: number;
  attempted: number;
  duration: number;
}

export const DEFAULT_REQUEST_DELAY_MS = 100;

/**
 * Select the conversations a range covers
 */
export function selectRange<T>(items: T[], range?: IndexRange): T[] {
  if (!range) return items;
  return items.slice(range.start, range.end);
}

/**
 * Classify conversations one at a time, pausing between requests.
 * Failed conversations are counted and left out of the records.
 */
export async function classifyMany(
  classifier: Classifier,
  conversations: Conversation[],
  options: ClassifyManyOptions = {}
): Promise<ClassifyManyResult> {
  const startTime = Date.now();
  const delayMs = options.delayMs ?? DEFAULT_REQUEST_DELAY_MS;
  const wait = options.sleep ?? sleep;
  const progress = options.onProgress || (() => {});
  const log = options.logger ?? createLogger({ module: 'pipeline' });

  const selected = selectRange(conversations, options.range);
  const result: ClassifyManyResult = {
    records: [],
    failures: [],
    failedCount: 0,
    attempted: 0,
    duration: 0,
  };

  log.info(
    { start: options.range?.start ?? 0, end: options.range?.end ?? conversations.length, count: selected.length },
    'Starting classification batch'
  );

  for (let i = 0; i < selected.length; i++) {
    const conversation = selected[i];
    const outcome = await classifier.classify(conversation);
    result.attempted++;

    if (outcome.ok) {
      result.records.push(outcome.record);
    } else {
      result.failures.push(outcome.failure);
      result.failedCount++;
    }

    progress({
      current: i + 1,
      total: selected.length,
      conversationId: conversation.metadata.conversation_id,
      succeeded: result.records.length,
      failed: result.failedCount,
    });

    if (delayMs > 0) {
      await wait(delayMs);
    }
  }

  result.duration = Date.now() - startTime;
  log.info(
    { succeeded: result.records.length, failed: result.failedCount, duration: result.duration },
    'Classification batch finished'
  );

  return result;
}
