/**
 * classify command
 * Grades canonical conversations and appends verdicts to the result store
 */

import { Command, Option } from 'commander';
import {
  ContractPolicySchema,
  StorePolicySchema,
  getConfig,
  type Config,
} from '../../config/index.js';
import { ConversationClassifier } from '../../classify/index.js';
import { createOpenAIProvider, type LLMProvider } from '../../llm/index.js';
import { classifyMany, loadConversations } from '../../pipeline/index.js';
import { formatSummary, summarize } from '../../stats/index.js';
import { saveResults } from '../../store/index.js';
import { errorMessage } from '../../utils/index.js';
import {
  confirm,
  createPromptSession,
  parseRangeInput,
  promptForRange,
  type PromptSession,
  type RangeChoice,
} from '../prompt.js';
import { parseNonNegativeInt } from './options.js';

/** Options for the classify command */
export interface ClassifyCommandOptions {
  input?: string;
  output?: string;
  range?: string;
  yes?: boolean;
  delay?: number;
  model?: string;
  policy?: string;
  contract?: string;
}

/**
 * Collaborators the command can be given instead of the real ones
 */
export interface ClassifyCommandDeps {
  config?: Config;
  provider?: LLMProvider;
  session?: PromptSession;
  print?: (message: string) => void;
  write?: (text: string) => void;
}

function describeChoice(choice: RangeChoice, total: number): string {
  return choice.kind === 'all'
    ? `all ${total} conversations`
    : `conversations ${choice.range.start + 1}-${choice.range.end}`;
}

/**
 * Run a classification batch.
 * Resolves false when the user cancels or nothing was classified.
 */
export async function runClassifyCommand(
  options: ClassifyCommandOptions,
  deps: ClassifyCommandDeps = {}
): Promise<boolean> {
  const config = deps.config ?? getConfig();
  const print = deps.print ?? console.log;
  const write = deps.write ?? ((text: string) => process.stdout.write(text));

  const storePolicy = StorePolicySchema.parse(options.policy ?? config.storePolicy);
  const contractPolicy = ContractPolicySchema.parse(options.contract ?? config.contractPolicy);
  const input = options.input ?? config.conversationsPath;
  const output = options.output ?? config.resultsPath;

  // Fail on a missing key before asking anything
  const provider = deps.provider ?? createOpenAIProvider(config.openaiApiKey, {
    baseUrl: config.openaiBaseUrl,
    defaultModel: config.model,
    timeout: config.requestTimeoutMs,
  });

  let choice: RangeChoice | undefined;
  if (options.range !== undefined) {
    const parsed = parseRangeInput(options.range);
    if (!parsed.ok) {
      throw new Error(parsed.message);
    }
    choice = parsed.choice;
  }

  const conversations = await loadConversations(input);
  print(`Loaded ${conversations.length} conversations from ${input}`);

  let session = deps.session;
  const needsPrompt = choice === undefined || !options.yes;
  if (needsPrompt && !session) {
    session = createPromptSession();
  }

  try {
    if (choice === undefined && session) {
      choice = await promptForRange(session.ask, print);
    }
    const selected: RangeChoice = choice ?? { kind: 'all' };

    print(`\nStarting analysis of ${describeChoice(selected, conversations.length)}...`);

    if (!options.yes && session && !(await confirm(session.ask))) {
      print('Operation cancelled.');
      return false;
    }
  } finally {
    if (session && !deps.session) {
      session.close();
    }
  }

  const classifier = new ConversationClassifier({
    provider,
    model: options.model ?? config.model,
    contractPolicy,
  });

  const result = await classifyMany(classifier, conversations, {
    range: choice?.kind === 'range' ? choice.range : undefined,
    delayMs: options.delay ?? config.requestDelayMs,
    onProgress: ({ current, total }) => {
      write(`\rAnalyzing conversations: ${current}/${total}`);
      if (current === total) write('\n');
    },
  });

  print(`Successfully analyzed: ${result.records.length} conversations`);
  if (result.failedCount > 0) {
    print(`Failed to analyze: ${result.failedCount} conversations`);
  }

  if (result.records.length === 0) {
    print('No conversations were successfully analyzed.');
    return false;
  }

  const saved = await saveResults(result.records, { path: output, policy: storePolicy });

  if (saved.previousStatus === 'corrupt') {
    print('Existing file corrupted, starting fresh');
  } else if (saved.existing > 0) {
    print(`Loaded ${saved.existing} existing results`);
  }
  print(`Results appended to '${saved.path}'`);
  print(`New classifications: ${saved.added.length}`);
  if (saved.skipped > 0) {
    print(`Skipped already classified: ${saved.skipped}`);
  }
  print(`Total classifications: ${saved.total}`);

  if (saved.added.length > 0) {
    print('');
    print(formatSummary(summarize(saved.added)));
  }

  print('\nAnalysis completed successfully!');
  return true;
}

/**
 * Register the classify command
 */
export function registerClassifyCommand(program: Command): void {
  program
    .command('classify')
    .description('Classify conversations with the LLM and store the verdicts')
    .option('--input <path>', 'Cleaned conversations file')
    .option('--output <path>', 'Classification results file')
    .option('--range <spec>', "Conversations to classify: 'all', 'N' or 'start-end'")
    .option('-y, --yes', 'Skip the confirmation prompt')
    .option('--delay <ms>', 'Pause between requests in milliseconds', parseNonNegativeInt)
    .option('--model <id>', 'Model to use')
    .addOption(new Option('--policy <policy>', 'Result store merge policy').choices(StorePolicySchema.options))
    .addOption(new Option('--contract <policy>', 'Explanation null-rule handling').choices(ContractPolicySchema.options))
    .action(async (options: ClassifyCommandOptions) => {
      try {
        await runClassifyCommand(options);
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exitCode = 1;
      }
    });
}
