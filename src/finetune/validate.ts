/**
 * Fine-tuning corpus validator
 * Checks that every JSONL line is a system/user/assistant example whose
 * assistant turn is a JSON verdict.
 */

import { readFile } from 'fs/promises';

export const DEFAULT_FINETUNE_PATH = 'fine_tuning_data.jsonl';

export const EXPECTED_ROLES = ['system', 'user', 'assistant'] as const;

export const REQUIRED_ASSISTANT_FIELDS = [
  'overall_sentiment',
  'bot_understanding',
  'bot_performance',
  'bot_answered',
] as const;

export type LineIssueReason =
  | 'empty_line'
  | 'invalid_json'
  | 'not_object'
  | 'missing_messages'
  | 'messages_not_list'
  | 'wrong_length'
  | 'wrong_roles'
  | 'missing_assistant_content'
  | 'assistant_content_not_json'
  | 'missing_assistant_fields';

/**
 * Result for one line (1-based)
 */
export interface FineTuningLineDiagnostic {
  line: number;
  valid: boolean;
  reason?: LineIssueReason;
  message: string;
}

export interface FineTuningReport {
  valid: boolean;
  validCount: number;
  totalLines: number;
  diagnostics: FineTuningLineDiagnostic[];
}

/**
 * The corpus file could not be read
 */
export class FineTuningFileError extends Error {
  constructor(message: string, public readonly filePath: string) {
    super(message);
    this.name = 'FineTuningFileError';
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false; message: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    return { ok: false, message: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Check a single line
 */
export function validateFineTuningLine(text: string, line: number): FineTuningLineDiagnostic {
  const fail = (reason: LineIssueReason, message: string): FineTuningLineDiagnostic =>
    ({ line, valid: false, reason, message });

  const trimmed = text.trim();
  if (!trimmed) {
    return fail('empty_line', 'Empty line');
  }

  const parsed = tryParse(trimmed);
  if (!parsed.ok) {
    return fail('invalid_json', `Invalid JSON - ${parsed.message}`);
  }

  const example = parsed.value;
  if (!isObject(example)) {
    return fail('not_object', 'Line is not a JSON object');
  }

  if (!('messages' in example)) {
    return fail('missing_messages', 'Missing "messages" field');
  }

  const messages = example.messages;
  if (!Array.isArray(messages)) {
    return fail('messages_not_list', '"messages" is not a list');
  }

  if (messages.length !== EXPECTED_ROLES.length) {
    return fail('wrong_length', `Expected ${EXPECTED_ROLES.length} messages, got ${messages.length}`);
  }

  const roles = messages.map(msg => (isObject(msg) ? msg.role : undefined));
  if (!EXPECTED_ROLES.every((role, i) => roles[i] === role)) {
    return fail(
      'wrong_roles',
      `Expected roles ${JSON.stringify(EXPECTED_ROLES)}, got ${JSON.stringify(roles.map(r => r ?? null))}`
    );
  }

  const assistant: unknown = messages[2];
  const content = isObject(assistant) ? assistant.content : undefined;
  if (!content) {
    return fail('missing_assistant_content', 'Assistant message missing content');
  }

  const payload = typeof content === 'string' ? tryParse(content) : undefined;
  if (payload === undefined || !payload.ok) {
    return fail('assistant_content_not_json', 'Assistant content is not valid JSON');
  }

  const verdict = payload.value;
  const missing = REQUIRED_ASSISTANT_FIELDS.filter(field => !isObject(verdict) || !(field in verdict));
  if (missing.length > 0) {
    return fail('missing_assistant_fields', `Missing fields in assistant response: ${missing.join(', ')}`);
  }

  return { line, valid: true, message: `Valid JSON with ${messages.length} messages` };
}

/**
 * Split JSONL content into lines. A final newline does not start a new line.
 */
export function splitJsonlContent(content: string): string[] {
  if (content === '') return [];
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Validate every line of a corpus
 */
export function validateFineTuningLines(lines: string[]): FineTuningReport {
  const diagnostics = lines.map((text, i) => validateFineTuningLine(text, i + 1));
  const validCount = diagnostics.filter(d => d.valid).length;

  return {
    valid: validCount === lines.length,
    validCount,
    totalLines: lines.length,
    diagnostics,
  };
}

/**
 * Read and validate a corpus file
 * @throws FineTuningFileError
 */
export async function validateFineTuningFile(path: string = DEFAULT_FINETUNE_PATH): Promise<FineTuningReport> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new FineTuningFileError(`Error reading file: ${detail}`, path);
  }

  return validateFineTuningLines(splitJsonlContent(content));
}
