/**
 * LLM provider module
 */

export {
  ProviderError,
  MissingCredentialError,
  validateProviderConfig,
  type ChatMessage,
  type MessageRole,
  type CompletionOptions,
  type CompletionResult,
  type JsonSchemaFormat,
  type LLMProvider,
  type ProviderConfig,
  type ProviderErrorType,
} from './provider.js';

export { OpenAIProvider, createOpenAIProvider } from './openai.js';
