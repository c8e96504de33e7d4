/**
 * Result store tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readdir, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import type { AnalysisRecord } from '../classify/index.js';
import { createSilentLogger } from '../utils/index.js';
import { loadResults, readAnalysisRecords, saveResults, selectNewRecords } from './results.js';

const logger = createSilentLogger();

function record(id: string): AnalysisRecord {
  return {
    conversation_id: id,
    llm_classification: {
      overall_sentiment: 'neutral',
      bot_understanding: 'good',
      bot_performance: 'acceptable',
      categories: ['Düğün Organizasyon'],
      to_improve_understanding: null,
      to_improve_performance: 'Fiyat bilgisi verilmeli.',
    },
  };
}

describe('selectNewRecords', () => {
  it('should keep everything when appending', () => {
    expect(selectNewRecords([record('c1')], [record('c1'), record('c2')], 'append')).toHaveLength(2);
  });

  it('should skip stored and repeated conversation IDs', () => {
    const selected = selectNewRecords(
      [record('c1'), { unrelated: true }],
      [record('c1'), record('c2'), record('c2')],
      'skip-existing'
    );

    expect(selected.map(r => r.conversation_id)).toEqual(['c2']);
  });
});

describe('result store', () => {
  let testDir: string;
  let path: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `convo-store-test-${Date.now()}`);
    await mkdir(testDir, { recursive: true });
    path = join(testDir, 'classification_results.json');
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should treat a missing file as an empty store', async () => {
    expect(await loadResults(path, logger)).toEqual({ entries: [], status: 'missing' });
  });

  it('should treat corrupt content as an empty store', async () => {
    await writeFile(path, '[{"conversation_id": ');

    expect(await loadResults(path, logger)).toEqual({ entries: [], status: 'corrupt' });
  });

  it('should treat a non-array root as an empty store', async () => {
    await writeFile(path, '{"conversation_id": "c1"}');

    expect(await loadResults(path, logger)).toEqual({ entries: [], status: 'corrupt' });
  });

  it('should save one record into an empty file', async () => {
    await writeFile(path, '');

    const summary = await saveResults([record('c1')], { path, logger });

    expect(summary.added).toHaveLength(1);
    expect(summary.total).toBe(1);
    expect(summary.existing).toBe(0);

    const stored = JSON.parse(await readFile(path, 'utf-8'));
    expect(stored).toEqual([record('c1')]);
  });

  it('should append after existing records without deduplication', async () => {
    await saveResults([record('c1'), record('c2')], { path, logger });

    const summary = await saveResults([record('c2'), record('c3')], { path, logger });

    expect(summary.existing).toBe(2);
    expect(summary.total).toBe(4);
    const stored: AnalysisRecord[] = JSON.parse(await readFile(path, 'utf-8'));
    expect(stored.map(r => r.conversation_id)).toEqual(['c1', 'c2', 'c2', 'c3']);
  });

  it('should skip known conversations under skip-existing', async () => {
    await saveResults([record('c1')], { path, logger });

    const summary = await saveResults([record('c1'), record('c2')], { path, policy: 'skip-existing', logger });

    expect(summary.added.map(r => r.conversation_id)).toEqual(['c2']);
    expect(summary.skipped).toBe(1);
    expect(summary.total).toBe(2);
  });

  it('should preserve entries it does not understand', async () => {
    await writeFile(path, JSON.stringify([{ legacy: 'kayıt' }]));

    await saveResults([record('c1')], { path, logger });

    const stored = JSON.parse(await readFile(path, 'utf-8'));
    expect(stored[0]).toEqual({ legacy: 'kayıt' });
    expect(stored).toHaveLength(2);
  });

  it('should write indented JSON with non-ASCII preserved and leave no temp files', async () => {
    await saveResults([record('c1')], { path, logger });

    const content = await readFile(path, 'utf-8');
    expect(content).toContain('\n  {\n    "conversation_id": "c1"');
    expect(content).toContain('"Düğün Organizasyon"');
    expect(await readdir(testDir)).toEqual(['classification_results.json']);
  });

  it('should read only well-formed analysis records', async () => {
    await writeFile(path, JSON.stringify([record('c1'), { conversation_id: 'c2' }]));

    const result = await readAnalysisRecords(path, logger);

    expect(result.records.map(r => r.conversation_id)).toEqual(['c1']);
    expect(result.ignored).toBe(1);
    expect(result.status).toBe('loaded');
  });
});
