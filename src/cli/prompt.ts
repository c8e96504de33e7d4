/**
 * Interactive prompts for the classify command
 */

import { createInterface } from 'readline';
import type { IndexRange } from '../pipeline/index.js';

export const RANGE_QUESTION = "\nEnter conversations to analyze (examples: '10', 'all', '11-50'): ";
export const CONFIRM_QUESTION = 'Continue? (y/n): ';

/**
 * What the user chose to classify
 */
export type RangeChoice =
  | { kind: 'all' }
  | { kind: 'range'; range: IndexRange };

export type RangeParseResult =
  | { ok: true; choice: RangeChoice }
  | { ok: false; message: string };

/**
 * Ask one question, resolve with the raw answer
 */
export type Ask = (question: string) => Promise<string>;

const INTEGER = /^\d+$/;

/**
 * Parse a range answer.
 * "all" or "a" selects everything, "N" the first N, "a-b" the 1-based inclusive span.
 */
export function parseRangeInput(input: string): RangeParseResult {
  const answer = input.trim();

  if (['all', 'a'].includes(answer.toLowerCase())) {
    return { ok: true, choice: { kind: 'all' } };
  }

  if (answer.includes('-')) {
    const parts = answer.split('-').map(p => p.trim());
    if (parts.length !== 2 || !parts.every(p => INTEGER.test(p))) {
      return { ok: false, message: "Invalid range format. Use format like '11-50'." };
    }

    const [start, end] = parts.map(Number);
    if (start <= 0 || end <= 0 || start > end) {
      return { ok: false, message: "Please enter a valid range (e.g., '11-50')." };
    }

    return { ok: true, choice: { kind: 'range', range: { start: start - 1, end } } };
  }

  if (!INTEGER.test(answer)) {
    return { ok: false, message: "Please enter a valid number, range, or 'all'." };
  }

  const limit = Number(answer);
  if (limit <= 0) {
    return { ok: false, message: 'Please enter a positive number.' };
  }

  return { ok: true, choice: { kind: 'range', range: { start: 0, end: limit } } };
}

/**
 * Ask for a range until the answer parses
 */
export async function promptForRange(
  ask: Ask,
  print: (message: string) => void = console.log
): Promise<RangeChoice> {
  for (;;) {
    const parsed = parseRangeInput(await ask(RANGE_QUESTION));
    if (parsed.ok) {
      return parsed.choice;
    }
    print(parsed.message);
  }
}

export function isAffirmative(answer: string): boolean {
  return ['y', 'yes'].includes(answer.trim().toLowerCase());
}

/**
 * Ask the y/n confirmation
 */
export async function confirm(ask: Ask, question: string = CONFIRM_QUESTION): Promise<boolean> {
  return isAffirmative(await ask(question));
}

/**
 * A readline session on the terminal
 */
export interface PromptSession {
  ask: Ask;
  close(): void;
}

/**
 * Input ended or was interrupted while an answer was pending
 */
export class PromptCancelledError extends Error {
  constructor() {
    super('Operation cancelled by user.');
    this.name = 'PromptCancelledError';
  }
}

function cancelAndExit(): void {
  console.log('\nOperation cancelled by user.');
  process.exit(0);
}

interface PendingAnswer {
  resolve: (answer: string) => void;
  reject: (error: Error) => void;
}

/**
 * Open a prompt session. Lines are queued as they arrive, so answers
 * piped in ahead of their questions are not lost. Ctrl-C, or end of
 * input while a question waits, calls `onCancel`.
 */
export function createPromptSession(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
  onCancel: () => void = cancelAndExit
): PromptSession {
  const rl = createInterface({ input, output });
  const lines: string[] = [];
  const pending: PendingAnswer[] = [];
  let ended = false;
  let closedByUs = false;

  const cancel = () => {
    onCancel();
    for (const waiter of pending.splice(0)) {
      waiter.reject(new PromptCancelledError());
    }
  };

  rl.on('line', line => {
    const waiter = pending.shift();
    if (waiter) {
      waiter.resolve(line.trim());
    } else {
      lines.push(line.trim());
    }
  });

  rl.on('SIGINT', () => {
    closedByUs = true;
    rl.close();
    cancel();
  });

  rl.on('close', () => {
    ended = true;
    if (!closedByUs && pending.length > 0) {
      cancel();
    }
  });

  return {
    ask: (question) => {
      output.write(question);

      const buffered = lines.shift();
      if (buffered !== undefined) {
        return Promise.resolve(buffered);
      }

      if (ended) {
        onCancel();
        return Promise.reject(new PromptCancelledError());
      }

      return new Promise((resolve, reject) => {
        pending.push({ resolve, reject });
      });
    },
    close: () => {
      closedByUs = true;
      rl.close();
    },
  };
}
