import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@pyloop/shared/Types/errors.js';
import { loadConfig } from '../../src/config.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.llmProvider).toBe('google');
    expect(config.geminiModel).toBe('gemini-2.5-flash');
    expect(config.geminiApiKey).toBeUndefined();
    expect(config.temperature).toBe(0.7);
    expect(config.topP).toBe(0.95);
    expect(config.maxRetries).toBe(2);
    expect(config.requestTimeoutMs).toBe(120_000);
    expect(config.maxFixAttempts).toBe(3);
    expect(config.systemPromptPath).toBeUndefined();
  });

  it('reads provider settings and numbers from the environment', () => {
    const config = loadConfig({
      PYLOOP_LLM_PROVIDER: 'groq',
      GROQ_API_KEY: 'test-secret',
      GROQ_MODEL: 'llama-3.1-8b-instant',
      PYLOOP_TEMPERATURE: '0.2',
      PYLOOP_MAX_FIX_ATTEMPTS: '0',
    });

    expect(config.llmProvider).toBe('groq');
    expect(config.groqApiKey).toBe('test-secret');
    expect(config.groqModel).toBe('llama-3.1-8b-instant');
    expect(config.temperature).toBe(0.2);
    expect(config.maxFixAttempts).toBe(0);
  });

  it('treats empty variables as unset', () => {
    const config = loadConfig({ GEMINI_API_KEY: '', PYLOOP_MAX_RETRIES: '' });

    expect(config.geminiApiKey).toBeUndefined();
    expect(config.maxRetries).toBe(2);
  });

  it('rejects an unknown provider', () => {
    expect(() => loadConfig({ PYLOOP_LLM_PROVIDER: 'acme' })).toThrow(ConfigurationError);
  });

  it('lists every invalid setting', () => {
    try {
      loadConfig({ PYLOOP_TEMPERATURE: 'warm', PYLOOP_MAX_RETRIES: '-1' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      const message = error instanceof Error ? error.message : '';
      expect(message).toContain('temperature: ');
      expect(message).toContain('maxRetries: ');
    }
  });
});
