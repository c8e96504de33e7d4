/**
 * Classification pipeline tests
 */

import { describe, it, expect, vi } from 'vitest';
import type { ClassificationOutcome } from '../classify/index.js';
import type { Conversation } from '../normalize/index.js';
import { createSilentLogger } from '../utils/index.js';
import { classifyMany, selectRange } from './classify.js';

const logger = createSilentLogger();

function conversation(id: string): Conversation {
  return {
    metadata: { conversation_id: id, start_time_utc: 't', total_messages: 1 },
    transcript_full_text: 'User: Merhaba',
    transcript_list_of_messages: [{ message_id: 'm', sender: 'User', text: 'Merhaba', timestamp: 't' }],
  };
}

const conversations = ['c1', 'c2', 'c3', 'c4', 'c5'].map(conversation);

function success(id: string): ClassificationOutcome {
  return {
    ok: true,
    issues: [],
    record: {
      conversation_id: id,
      llm_classification: {
        overall_sentiment: 'positive',
        bot_understanding: 'good',
        bot_performance: 'good',
        categories: ['Pasta'],
        to_improve_understanding: null,
        to_improve_performance: null,
      },
    },
  };
}

function fakeClassifier(failIds: string[] = []) {
  return {
    classify: vi.fn(async (conv: Conversation): Promise<ClassificationOutcome> => {
      const id = conv.metadata.conversation_id;
      if (failIds.includes(id)) {
        return { ok: false, failure: { conversation_id: id, kind: 'provider_error', message: 'down' } };
      }
      return success(id);
    }),
  };
}

describe('selectRange', () => {
  it('should return everything without a range', () => {
    expect(selectRange([1, 2, 3])).toEqual([1, 2, 3]);
  });

  it('should slice a half-open range', () => {
    expect(selectRange([1, 2, 3, 4], { start: 1, end: 3 })).toEqual([2, 3]);
  });

  it('should clamp ranges past the end', () => {
    expect(selectRange([1, 2, 3], { start: 1, end: 50 })).toEqual([2, 3]);
    expect(selectRange([1, 2, 3], { start: 10, end: 50 })).toEqual([]);
  });
});

describe('classifyMany', () => {
  it('should classify every conversation in order', async () => {
    const classifier = fakeClassifier();

    const result = await classifyMany(classifier, conversations, { delayMs: 0, logger });

    expect(result.records.map(r => r.conversation_id)).toEqual(['c1', 'c2', 'c3', 'c4', 'c5']);
    expect(result.failedCount).toBe(0);
    expect(result.attempted).toBe(5);
  });

  it('should only classify the requested range', async () => {
    const classifier = fakeClassifier();

    const result = await classifyMany(classifier, conversations, {
      range: { start: 1, end: 3 },
      delayMs: 0,
      logger,
    });

    expect(classifier.classify).toHaveBeenCalledTimes(2);
    expect(result.records.map(r => r.conversation_id)).toEqual(['c2', 'c3']);
  });

  it('should skip failures without placeholders and keep going', async () => {
    const result = await classifyMany(fakeClassifier(['c2', 'c4']), conversations, { delayMs: 0, logger });

    expect(result.records.map(r => r.conversation_id)).toEqual(['c1', 'c3', 'c5']);
    expect(result.failedCount).toBe(2);
    expect(result.failures.map(f => f.conversation_id)).toEqual(['c2', 'c4']);
  });

  it('should pause between requests', async () => {
    const sleep = vi.fn(async () => {});

    await classifyMany(fakeClassifier(), conversations.slice(0, 3), { delayMs: 100, sleep, logger });

    expect(sleep).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledWith(100);
  });

  it('should not pause when the delay is zero', async () => {
    const sleep = vi.fn(async () => {});

    await classifyMany(fakeClassifier(), conversations, { delayMs: 0, sleep, logger });

    expect(sleep).not.toHaveBeenCalled();
  });

  it('should report progress after each conversation', async () => {
    const onProgress = vi.fn();

    await classifyMany(fakeClassifier(['c2']), conversations.slice(0, 2), { delayMs: 0, onProgress, logger });

    expect(onProgress).toHaveBeenNthCalledWith(1, {
      current: 1, total: 2, conversationId: 'c1', succeeded: 1, failed: 0,
    });
    expect(onProgress).toHaveBeenNthCalledWith(2, {
      current: 2, total: 2, conversationId: 'c2', succeeded: 1, failed: 1,
    });
  });
});
