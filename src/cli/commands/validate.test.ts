/**
 * validate command tests
 */

import { describe, it, expect } from 'vitest';
import { validateFineTuningLines } from '../../finetune/index.js';
import { formatReport } from './validate.js';

describe('formatReport', () => {
  it('should list failures and the summary', () => {
    const report = validateFineTuningLines(['', '{"messages": "x"}']);

    expect(formatReport(report)).toEqual([
      'Total lines: 2',
      '  ✗ Line 1: Empty line',
      '  ✗ Line 2: "messages" is not a list',
      'Summary: 0/2 lines are valid JSONL',
      'Some lines have issues. Fix the file before upload.',
    ]);
  });

  it('should report an empty file as valid', () => {
    expect(formatReport(validateFineTuningLines([]))).toEqual([
      'Total lines: 0',
      'Summary: 0/0 lines are valid JSONL',
      'All lines are valid. The file is ready for fine-tuning upload.',
    ]);
  });
});
