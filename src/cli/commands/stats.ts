/**
 * stats command
 * Summary over the whole result store
 */

import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { formatSummary, summarize } from '../../stats/index.js';
import { readAnalysisRecords } from '../../store/index.js';
import { errorMessage } from '../../utils/index.js';

/**
 * Register the stats command
 */
export function registerStatsCommand(program: Command): void {
  program
    .command('stats')
    .description('Print verdict statistics for stored classifications')
    .option('--input <path>', 'Classification results file')
    .action(async (options: { input?: string }) => {
      const path = options.input ?? getConfig().resultsPath;

      try {
        const { records, ignored, status } = await readAnalysisRecords(path);

        if (status === 'missing') {
          console.log(`No results found at '${path}'.`);
          return;
        }
        if (ignored > 0) {
          console.log(`Ignored ${ignored} unreadable entries`);
        }
        if (records.length === 0) {
          console.log('No classifications to summarize.');
          return;
        }

        console.log(`Classifications: ${records.length}\n`);
        console.log(formatSummary(summarize(records)));
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exitCode = 1;
      }
    });
}
