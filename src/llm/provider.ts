/**
 * LLM Provider abstraction
 * Defines interface for language model providers
 */

/**
 * Message role in conversation
 */
export type MessageRole = 'system' | 'user' | 'assistant';

/**
 * Chat message
 */
export interface ChatMessage {
  role: MessageRole;
  content: string;
}

/**
 * JSON schema response format for structured output
 */
export interface JsonSchemaFormat {
  name: string;
  schema: Record<string, unknown>;
  strict?: boolean;
}

/**
 * Completion options
 */
export interface CompletionOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  systemPrompt?: string;
  responseFormat?: JsonSchemaFormat;
}

/**
 * Completion result
 */
export interface CompletionResult {
  content: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  stopReason: 'end_turn' | 'max_tokens' | 'content_filter' | 'other';
  finishReason?: string;
}

/**
 * Provider configuration
 */
export interface ProviderConfig {
  apiKey: string;
  baseUrl?: string;
  defaultModel?: string;
  timeout?: number;
}

/**
 * LLM Provider interface
 */
export interface LLMProvider {
  name: string;

  /**
   * Complete a chat conversation
   */
  chat(messages: ChatMessage[], options?: CompletionOptions): Promise<CompletionResult>;
}

/**
 * Provider error types
 */
export type ProviderErrorType =
  | 'auth_error'
  | 'rate_limit'
  | 'invalid_request'
  | 'model_not_found'
  | 'context_length'
  | 'network_error'
  | 'timeout'
  | 'refusal'
  | 'invalid_response'
  | 'unknown';

/**
 * Provider error
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly type: ProviderErrorType,
    public readonly provider: string,
    public readonly statusCode?: number,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

/**
 * No API key available for the provider
 */
export class MissingCredentialError extends Error {
  constructor(public readonly variable: string) {
    super(`${variable} is not set. Add it to the environment, .env or secrets.env.`);
    this.name = 'MissingCredentialError';
  }
}

/**
 * Validate provider config
 */
export function validateProviderConfig(config: ProviderConfig): void {
  if (!config.apiKey) {
    throw new Error('API key is required');
  }
}
