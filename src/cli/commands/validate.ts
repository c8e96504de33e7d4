/**
 * validate command
 * Checks a fine-tuning JSONL corpus line by line
 */

import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { validateFineTuningFile, type FineTuningReport } from '../../finetune/index.js';
import { errorMessage } from '../../utils/index.js';

/**
 * Lines describing a report, in file order
 */
export function formatReport(report: FineTuningReport, detailLimit = 3): string[] {
  const lines = [`Total lines: ${report.totalLines}`];

  for (const diagnostic of report.diagnostics) {
    if (!diagnostic.valid) {
      lines.push(`  ✗ Line ${diagnostic.line}: ${diagnostic.message}`);
    } else if (diagnostic.line <= detailLimit) {
      lines.push(`  ✓ Line ${diagnostic.line}: ${diagnostic.message}`);
    }
  }

  lines.push(`Summary: ${report.validCount}/${report.totalLines} lines are valid JSONL`);
  lines.push(
    report.valid
      ? 'All lines are valid. The file is ready for fine-tuning upload.'
      : 'Some lines have issues. Fix the file before upload.'
  );
  return lines;
}

/**
 * Register the validate command
 */
export function registerValidateCommand(program: Command): void {
  program
    .command('validate [file]')
    .description('Validate a fine-tuning JSONL file')
    .action(async (file: string | undefined) => {
      const path = file ?? getConfig().finetunePath;
      console.log(`Validating JSONL file: ${path}`);

      try {
        const report = await validateFineTuningFile(path);
        for (const line of formatReport(report)) {
          console.log(line);
        }
        if (!report.valid) {
          process.exitCode = 1;
        }
      } catch (err) {
        console.error(errorMessage(err));
        process.exitCode = 1;
      }
    });
}
