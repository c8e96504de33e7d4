/**
 * normalize command
 * Raw chat export -> canonical conversations
 */

import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { processExportFile } from '../../normalize/index.js';
import { errorMessage } from '../../utils/index.js';
import { parsePositiveInt } from './options.js';

/** Options for the normalize command */
export interface NormalizeCommandOptions {
  input?: string;
  output?: string;
  max?: number;
}

/**
 * Register the normalize command
 */
export function registerNormalizeCommand(program: Command): void {
  program
    .command('normalize')
    .description('Convert a raw chat export into cleaned conversation transcripts')
    .option('--input <path>', 'Raw export file')
    .option('--output <path>', 'Cleaned conversations file')
    .option('--max <n>', 'Maximum conversations to keep', parsePositiveInt)
    .action(async (options: NormalizeCommandOptions) => {
      const config = getConfig();
      const input = options.input ?? config.exportPath;
      const output = options.output ?? config.conversationsPath;

      try {
        console.log(`Processing ${input}...`);

        const result = await processExportFile(input, output, {
          maxConversations: options.max ?? config.maxConversations,
          onProgress: ({ scanned, total }) => {
            console.log(`Processed ${scanned}/${total} records...`);
          },
        });

        console.log(`Loaded ${result.totalRecords} records`);
        console.log(`Successfully processed ${result.conversations.length} conversations`);
        if (result.invalid > 0) {
          console.log(`Skipped ${result.invalid} malformed records`);
        }
        console.log(`Output saved to: ${result.outputPath}`);
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exitCode = 1;
      }
    });
}
