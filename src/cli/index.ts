#!/usr/bin/env node
/**
 * convo-grader CLI - Main entry point
 */

import { Command } from 'commander';
import { version } from '../version.js';
import {
  registerNormalizeCommand,
  registerClassifyCommand,
  registerStatsCommand,
  registerValidateCommand,
} from './commands/index.js';

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('convo-grader')
    .description('Normalize chat exports, grade conversations with an LLM and check fine-tuning data')
    .version(version);

  registerNormalizeCommand(program);
  registerClassifyCommand(program);
  registerStatsCommand(program);
  registerValidateCommand(program);

  return program;
}

// Run CLI when executed directly (not when imported as module)
if (process.argv[1]?.includes('cli/index') || process.argv[1]?.includes('cli\\index')) {
  const program = createProgram();
  program.parseAsync().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
}
