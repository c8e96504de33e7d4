/**
 * Configuration module
 * Handles loading and validating configuration from environment
 */

import { z, ZodError } from 'zod';
import dotenv from 'dotenv';
import { resolve } from 'path';

/**
 * How newly classified records are merged into the result store
 */
export const StorePolicySchema = z.enum(['append', 'skip-existing']);
export type StorePolicy = z.infer<typeof StorePolicySchema>;

/**
 * What to do when a verdict breaks the rating/explanation null rule
 */
export const ContractPolicySchema = z.enum(['coerce', 'reject']);
export type ContractPolicy = z.infer<typeof ContractPolicySchema>;

/**
 * Configuration schema with zod validation
 * All options except the API key have defaults
 */
export const ConfigSchema = z.object({
  // LLM Provider Configuration
  openaiApiKey: z
    .string()
    .optional()
    .describe('OpenAI API key'),
  openaiBaseUrl: z
    .string()
    .url()
    .default('https://api.openai.com')
    .describe('Base URL of the Chat Completions API'),
  model: z
    .string()
    .default('gpt-4.1')
    .describe('Model used for classification'),
  requestTimeoutMs: z
    .coerce
    .number()
    .int()
    .min(1000)
    .default(60000)
    .describe('Timeout for a single classification request'),
  requestDelayMs: z
    .coerce
    .number()
    .int()
    .min(0)
    .default(100)
    .describe('Pause between successive classification requests'),

  // File locations
  exportPath: z
    .string()
    .default('conversations_export.json')
    .describe('Raw chat export read by the normalizer'),
  conversationsPath: z
    .string()
    .default('cleaned_conversations.json')
    .describe('Normalized conversations file'),
  resultsPath: z
    .string()
    .default('classification_results.json')
    .describe('Classification result store'),
  finetunePath: z
    .string()
    .default('fine_tuning_data.jsonl')
    .describe('Fine-tuning corpus checked by the validator'),

  // Pipeline behaviour
  maxConversations: z
    .coerce
    .number()
    .int()
    .min(1)
    .default(100)
    .describe('Maximum normalized conversations written per run'),
  storePolicy: StorePolicySchema
    .default('append')
    .describe('Result store merge policy'),
  contractPolicy: ContractPolicySchema
    .default('coerce')
    .describe('Verdict null-rule enforcement'),

  // Logging Configuration
  logLevel: z
    .enum(['debug', 'info', 'warn', 'error', 'silent'])
    .default('info')
    .describe('Logging verbosity level'),
  logFormat: z
    .enum(['json', 'pretty'])
    .default('pretty')
    .describe('Log output format'),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Configuration error with helpful messages
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  static fromZodError(error: ZodError): ConfigError {
    const messages = error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );
    return new ConfigError(
      `Configuration validation failed:\n${messages.join('\n')}`,
      error.issues
    );
  }
}

/**
 * Load .env file from specified path or default locations
 */
export function loadEnvFile(envPath?: string): void {
  if (envPath) {
    dotenv.config({ path: resolve(envPath) });
  } else {
    dotenv.config({ path: resolve(process.cwd(), '.env') });
    dotenv.config({ path: resolve(process.cwd(), '.env.local') });
    dotenv.config({ path: resolve(process.cwd(), 'secrets.env') });
  }
}

/**
 * Build raw config object from environment variables
 */
function buildRawConfig(): Record<string, unknown> {
  return {
    openaiApiKey: process.env.OPENAI_API_KEY || undefined,
    openaiBaseUrl: process.env.OPENAI_BASE_URL,
    model: process.env.CONVO_MODEL,
    requestTimeoutMs: process.env.CONVO_REQUEST_TIMEOUT_MS,
    requestDelayMs: process.env.CONVO_REQUEST_DELAY_MS,
    exportPath: process.env.CONVO_EXPORT_PATH,
    conversationsPath: process.env.CONVO_CONVERSATIONS_PATH,
    resultsPath: process.env.CONVO_RESULTS_PATH,
    finetunePath: process.env.CONVO_FINETUNE_PATH,
    maxConversations: process.env.CONVO_MAX_CONVERSATIONS,
    storePolicy: process.env.CONVO_STORE_POLICY,
    contractPolicy: process.env.CONVO_CONTRACT_POLICY,
    logLevel: process.env.CONVO_LOG_LEVEL,
    logFormat: process.env.CONVO_LOG_FORMAT,
  };
}

/**
 * Load and validate configuration from environment
 * @param envPath Optional path to .env file
 * @throws ConfigError if validation fails
 */
export function loadConfig(envPath?: string): Config {
  loadEnvFile(envPath);

  const rawConfig = buildRawConfig();
  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    throw ConfigError.fromZodError(result.error);
  }

  return result.data;
}

/**
 * Validate a partial config object
 */
export function validateConfig(config: unknown): Config {
  const result = ConfigSchema.safeParse(config);

  if (!result.success) {
    throw ConfigError.fromZodError(result.error);
  }

  return result.data;
}

/**
 * Get default configuration values
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

// Singleton config instance
let _config: Config | null = null;

/**
 * Get the global configuration instance (singleton)
 * Loads from environment on first access
 */
export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

/**
 * Set the global configuration instance
 * Useful for testing or programmatic configuration
 */
export function setConfig(config: unknown): void {
  _config = validateConfig(config);
}

/**
 * Reset the global configuration instance
 * Forces reload on next getConfig() call
 */
export function resetConfig(): void {
  _config = null;
}
