/**
 * LLM Provider tests
 */

import { describe, it, expect } from 'vitest';
import {
  validateProviderConfig,
  ProviderError,
  MissingCredentialError,
} from './provider.js';

describe('validateProviderConfig', () => {
  it('should pass for valid config', () => {
    expect(() => validateProviderConfig({ apiKey: 'test-secret' })).not.toThrow();
  });

  it('should throw for missing API key', () => {
    expect(() => validateProviderConfig({ apiKey: '' })).toThrow('API key is required');
  });
});

describe('ProviderError', () => {
  it('should carry type, provider and status', () => {
    const error = new ProviderError('Too many requests', 'rate_limit', 'openai', 429, true);

    expect(error.name).toBe('ProviderError');
    expect(error.type).toBe('rate_limit');
    expect(error.provider).toBe('openai');
    expect(error.statusCode).toBe(429);
    expect(error.retryable).toBe(true);
  });

  it('should default to not retryable', () => {
    expect(new ProviderError('bad', 'invalid_request', 'openai').retryable).toBe(false);
  });
});

describe('MissingCredentialError', () => {
  it('should name the missing variable', () => {
    const error = new MissingCredentialError('OPENAI_API_KEY');

    expect(error.name).toBe('MissingCredentialError');
    expect(error.variable).toBe('OPENAI_API_KEY');
    expect(error.message).toContain('OPENAI_API_KEY is not set');
  });
});
