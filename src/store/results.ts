/**
 * Classification result store
 * Flat JSON array of analysis records, rewritten whole on every save
 */

import { readFile } from 'fs/promises';
import { AnalysisRecordSchema, type AnalysisRecord } from '../classify/index.js';
import type { StorePolicy } from '../config/index.js';
import { createLogger, errorMessage, writeJsonFileAtomic, type Logger } from '../utils/index.js';

export const DEFAULT_RESULTS_PATH = 'classification_results.json';

/**
 * State of the store file when it was read
 */
export type StoreStatus = 'missing' | 'loaded' | 'corrupt';

/**
 * Raw store contents. Existing entries are kept as-is so a save
 * never drops data it does not understand.
 */
export interface LoadedStore {
  entries: unknown[];
  status: StoreStatus;
}

/**
 * Save options
 */
export interface SaveResultsOptions {
  path?: string;
  policy?: StorePolicy;
  logger?: Logger;
}

/**
 * Save summary
 */
export interface SaveResultsSummary {
  path: string;
  existing: number;
  added: AnalysisRecord[];
  skipped: number;
  total: number;
  previousStatus: StoreStatus;
}

/**
 * Read the store. Missing, unreadable or unparsable content is an empty store.
 */
export async function loadResults(path: string = DEFAULT_RESULTS_PATH, logger?: Logger): Promise<LoadedStore> {
  const log = logger ?? createLogger({ module: 'store' });

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
    if (!missing) {
      log.warn({ path, error: errorMessage(error) }, 'Result store unreadable, starting fresh');
    }
    return { entries: [], status: missing ? 'missing' : 'corrupt' };
  }

  try {
    const data: unknown = JSON.parse(content);
    if (Array.isArray(data)) {
      return { entries: data, status: 'loaded' };
    }
    log.warn({ path }, 'Result store is not a JSON array, starting fresh');
  } catch (error) {
    log.warn({ path, error: errorMessage(error) }, 'Result store corrupted, starting fresh');
  }

  return { entries: [], status: 'corrupt' };
}

function storedConversationId(entry: unknown): string | undefined {
  if (typeof entry === 'object' && entry !== null && 'conversation_id' in entry) {
    const id = entry.conversation_id;
    return typeof id === 'string' ? id : undefined;
  }
  return undefined;
}

/**
 * Pick the records to write under a merge policy
 */
export function selectNewRecords(
  existing: unknown[],
  records: AnalysisRecord[],
  policy: StorePolicy
): AnalysisRecord[] {
  if (policy === 'append') {
    return records;
  }

  const seen = new Set<string>();
  for (const entry of existing) {
    const id = storedConversationId(entry);
    if (id !== undefined) seen.add(id);
  }

  const selected: AnalysisRecord[] = [];
  for (const record of records) {
    if (seen.has(record.conversation_id)) continue;
    seen.add(record.conversation_id);
    selected.push(record);
  }
  return selected;
}

/**
 * Append records to the store and rewrite it
 */
export async function saveResults(
  records: AnalysisRecord[],
  options: SaveResultsOptions = {}
): Promise<SaveResultsSummary> {
  const path = options.path ?? DEFAULT_RESULTS_PATH;
  const policy = options.policy ?? 'append';
  const log = options.logger ?? createLogger({ module: 'store' });

  const store = await loadResults(path, log);
  const added = selectNewRecords(store.entries, records, policy);
  const all = [...store.entries, ...added];

  await writeJsonFileAtomic(path, all);

  const summary: SaveResultsSummary = {
    path,
    existing: store.entries.length,
    added,
    skipped: records.length - added.length,
    total: all.length,
    previousStatus: store.status,
  };

  log.info(
    { path, existing: summary.existing, added: added.length, skipped: summary.skipped, total: summary.total },
    'Results saved'
  );

  return summary;
}

/**
 * Read the store as analysis records, ignoring entries that do not parse
 */
export async function readAnalysisRecords(
  path: string = DEFAULT_RESULTS_PATH,
  logger?: Logger
): Promise<{ records: AnalysisRecord[]; ignored: number; status: StoreStatus }> {
  const store = await loadResults(path, logger);
  const records: AnalysisRecord[] = [];

  for (const entry of store.entries) {
    const parsed = AnalysisRecordSchema.safeParse(entry);
    if (parsed.success) {
      records.push(parsed.data);
    }
  }

  return { records, ignored: store.entries.length - records.length, status: store.status };
}
