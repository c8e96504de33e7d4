/**
 * OpenAI LLM Provider
 * Implementation of LLMProvider over the Chat Completions API
 */

import { z } from 'zod';
import type {
  LLMProvider,
  ChatMessage,
  CompletionOptions,
  CompletionResult,
  ProviderConfig,
} from './provider.js';
import {
  ProviderError,
  MissingCredentialError,
  validateProviderConfig,
} from './provider.js';

/**
 * Chat Completions request
 */
interface OpenAIRequest {
  model: string;
  messages: ChatMessage[];
  max_completion_tokens?: number;
  temperature?: number;
  response_format?: {
    type: 'json_schema';
    json_schema: {
      name: string;
      schema: Record<string, unknown>;
      strict: boolean;
    };
  };
}

/**
 * Chat Completions response (fields we read)
 */
const OpenAIResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string(),
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullable().optional(),
      refusal: z.string().nullable().optional(),
    }),
    finish_reason: z.string().nullable().optional(),
  })).min(1),
  usage: z.object({
    prompt_tokens: z.number(),
    completion_tokens: z.number(),
  }).optional(),
});

/**
 * Error body returned with non-2xx statuses
 */
const OpenAIErrorResponseSchema = z.object({
  error: z.object({
    message: z.string().optional(),
    type: z.string().nullable().optional(),
    code: z.string().nullable().optional(),
  }),
});

/**
 * Default OpenAI configuration
 */
const OPENAI_DEFAULTS = {
  baseUrl: 'https://api.openai.com',
  defaultModel: 'gpt-4.1',
  timeout: 60000,
};

/**
 * OpenAI Provider implementation
 */
export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai';
  private readonly config: Required<ProviderConfig>;

  constructor(config: ProviderConfig) {
    validateProviderConfig(config);

    this.config = {
      apiKey: config.apiKey,
      baseUrl: (config.baseUrl ?? OPENAI_DEFAULTS.baseUrl).replace(/\/+$/, ''),
      defaultModel: config.defaultModel ?? OPENAI_DEFAULTS.defaultModel,
      timeout: config.timeout ?? OPENAI_DEFAULTS.timeout,
    };
  }

  /**
   * Complete a chat conversation
   */
  async chat(messages: ChatMessage[], options?: CompletionOptions): Promise<CompletionResult> {
    const request: OpenAIRequest = {
      model: options?.model ?? this.config.defaultModel,
      messages: options?.systemPrompt
        ? [{ role: 'system', content: options.systemPrompt }, ...messages]
        : messages,
    };

    if (options?.maxTokens !== undefined) {
      request.max_completion_tokens = options.maxTokens;
    }

    if (options?.temperature !== undefined) {
      request.temperature = options.temperature;
    }

    if (options?.responseFormat) {
      request.response_format = {
        type: 'json_schema',
        json_schema: {
          name: options.responseFormat.name,
          schema: options.responseFormat.schema,
          strict: options.responseFormat.strict ?? true,
        },
      };
    }

    const data = await this.makeRequest('/v1/chat/completions', request);
    const parsed = OpenAIResponseSchema.safeParse(data);

    if (!parsed.success) {
      throw new ProviderError(
        `Unexpected response shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`,
        'invalid_response',
        this.name
      );
    }

    const response = parsed.data;
    const choice = response.choices[0];

    if (choice.message.refusal) {
      throw new ProviderError(choice.message.refusal, 'refusal', this.name);
    }

    if (choice.message.content == null) {
      throw new ProviderError('Response has no content', 'invalid_response', this.name);
    }

    return {
      content: choice.message.content,
      model: response.model,
      inputTokens: response.usage?.prompt_tokens ?? 0,
      outputTokens: response.usage?.completion_tokens ?? 0,
      stopReason: toStopReason(choice.finish_reason),
      finishReason: choice.finish_reason ?? undefined,
    };
  }

  /**
   * Get request headers
   */
  private getHeaders(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${this.config.apiKey}`,
    };
  }

  /**
   * Make API request
   */
  private async makeRequest(endpoint: string, body: unknown): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(`${this.config.baseUrl}${endpoint}`, {
        method: 'POST',
        headers: this.getHeaders(),
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.config.timeout),
      });
    } catch (error) {
      if (error instanceof Error) {
        if (error.name === 'TimeoutError') {
          throw new ProviderError(
            'Request timed out',
            'timeout',
            this.name,
            undefined,
            true
          );
        }

        throw new ProviderError(
          error.message,
          'network_error',
          this.name,
          undefined,
          true
        );
      }

      throw new ProviderError(
        'Unknown error',
        'unknown',
        this.name
      );
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch {
      throw new ProviderError(
        `Response body is not JSON (status ${response.status})`,
        response.ok ? 'invalid_response' : 'unknown',
        this.name,
        response.status,
        response.status >= 500
      );
    }

    if (!response.ok) {
      throw this.handleApiError(data, response.status);
    }

    return data;
  }

  /**
   * Handle API error response
   */
  private handleApiError(body: unknown, statusCode: number): ProviderError {
    const parsed = OpenAIErrorResponseSchema.safeParse(body);
    const message = (parsed.success && parsed.data.error.message) || 'Unknown API error';
    const code = (parsed.success && parsed.data.error.code) || '';

    switch (statusCode) {
      case 401:
        return new ProviderError(message, 'auth_error', this.name, statusCode);
      case 429:
        return new ProviderError(message, 'rate_limit', this.name, statusCode, true);
      case 400:
        if (code.includes('context_length')) {
          return new ProviderError(message, 'context_length', this.name, statusCode);
        }
        return new ProviderError(message, 'invalid_request', this.name, statusCode);
      case 404:
        return new ProviderError(message, 'model_not_found', this.name, statusCode);
      default:
        return new ProviderError(message, 'unknown', this.name, statusCode, statusCode >= 500);
    }
  }
}

function toStopReason(finishReason: string | null | undefined): CompletionResult['stopReason'] {
  switch (finishReason) {
    case 'stop':
      return 'end_turn';
    case 'length':
      return 'max_tokens';
    case 'content_filter':
      return 'content_filter';
    default:
      return 'other';
  }
}

/**
 * Create OpenAI provider from an injected key
 * @throws MissingCredentialError when the key is absent
 */
export function createOpenAIProvider(
  apiKey: string | undefined,
  config: Omit<ProviderConfig, 'apiKey'> = {}
): OpenAIProvider {
  if (!apiKey) {
    throw new MissingCredentialError('OPENAI_API_KEY');
  }

  return new OpenAIProvider({ ...config, apiKey });
}
