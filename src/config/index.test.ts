/**
 * Config module tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  ConfigSchema,
  ConfigError,
  validateConfig,
  getDefaultConfig,
  getConfig,
  setConfig,
  resetConfig,
} from './index.js';

describe('ConfigSchema', () => {
  it('should parse empty config with defaults', () => {
    const config = ConfigSchema.parse({});

    expect(config.openaiBaseUrl).toBe('https://api.openai.com');
    expect(config.model).toBe('gpt-4.1');
    expect(config.requestDelayMs).toBe(100);
    expect(config.requestTimeoutMs).toBe(60000);
    expect(config.conversationsPath).toBe('cleaned_conversations.json');
    expect(config.resultsPath).toBe('classification_results.json');
    expect(config.finetunePath).toBe('fine_tuning_data.jsonl');
    expect(config.maxConversations).toBe(100);
    expect(config.storePolicy).toBe('append');
    expect(config.contractPolicy).toBe('coerce');
    expect(config.logLevel).toBe('info');
    expect(config.logFormat).toBe('pretty');
  });

  it('should parse valid config values', () => {
    const config = ConfigSchema.parse({
      openaiApiKey: 'test-secret',
      model: 'gpt-4o-mini',
      storePolicy: 'skip-existing',
      contractPolicy: 'reject',
      logLevel: 'debug',
      logFormat: 'json',
    });

    expect(config.openaiApiKey).toBe('test-secret');
    expect(config.model).toBe('gpt-4o-mini');
    expect(config.storePolicy).toBe('skip-existing');
    expect(config.contractPolicy).toBe('reject');
    expect(config.logLevel).toBe('debug');
    expect(config.logFormat).toBe('json');
  });

  it('should coerce string numbers to numbers', () => {
    const config = ConfigSchema.parse({
      requestDelayMs: '250',
      maxConversations: '20',
    });

    expect(config.requestDelayMs).toBe(250);
    expect(config.maxConversations).toBe(20);
  });

  it('should reject invalid log level', () => {
    expect(() => ConfigSchema.parse({ logLevel: 'invalid' })).toThrow();
  });

  it('should reject a negative delay and a zero conversation cap', () => {
    expect(() => ConfigSchema.parse({ requestDelayMs: -1 })).toThrow();
    expect(() => ConfigSchema.parse({ maxConversations: 0 })).toThrow();
  });

  it('should reject unknown policies', () => {
    expect(() => ConfigSchema.parse({ storePolicy: 'dedupe' })).toThrow();
    expect(() => ConfigSchema.parse({ contractPolicy: 'ignore' })).toThrow();
  });
});

describe('ConfigError', () => {
  it('should format zod errors nicely', () => {
    const result = ConfigSchema.safeParse({ logLevel: 'invalid' });

    expect(result.success).toBe(false);
    if (!result.success) {
      const error = ConfigError.fromZodError(result.error);
      expect(error.message).toContain('Configuration validation failed');
      expect(error.message).toContain('logLevel');
      expect(error.issues.length).toBeGreaterThan(0);
    }
  });
});

describe('validateConfig', () => {
  it('should validate valid config', () => {
    const config = validateConfig({
      resultsPath: '/tmp/results.json',
      logLevel: 'warn',
    });

    expect(config.resultsPath).toBe('/tmp/results.json');
    expect(config.logLevel).toBe('warn');
  });

  it('should throw ConfigError for invalid config', () => {
    expect(() => validateConfig({ logLevel: 'invalid' })).toThrow(ConfigError);
  });
});

describe('getDefaultConfig', () => {
  it('should return config with all defaults and no key', () => {
    const config = getDefaultConfig();

    expect(config.model).toBe('gpt-4.1');
    expect(config.openaiApiKey).toBeUndefined();
  });
});

describe('Config singleton', () => {
  beforeEach(() => {
    resetConfig();
  });

  afterEach(() => {
    resetConfig();
  });

  it('should return same instance on multiple calls', () => {
    const config1 = getConfig();
    const config2 = getConfig();

    expect(config1).toBe(config2);
  });

  it('should allow setting config programmatically', () => {
    setConfig({
      model: 'gpt-4o',
      requestDelayMs: 0,
      logLevel: 'error',
      logFormat: 'json',
    });

    const config = getConfig();
    expect(config.model).toBe('gpt-4o');
    expect(config.requestDelayMs).toBe(0);
    expect(config.resultsPath).toBe('classification_results.json');
  });

  it('should reload on next access after resetConfig', () => {
    setConfig({ model: 'gpt-4o' });
    const before = getConfig();

    resetConfig();

    expect(getConfig()).not.toBe(before);
  });
});
