import { describe, it, expect, vi } from 'vitest';
import { AuthError } from '@pyloop/shared/Types/errors.js';
import { loadConfig } from '../../src/config.js';
import { ensureCredential, validateProviderConfig } from '../../src/llm/credentials.js';

describe('validateProviderConfig', () => {
  it('requires a key for hosted providers', () => {
    expect(() => validateProviderConfig(loadConfig({}))).toThrow(
      new AuthError('GEMINI_API_KEY is required when using Gemini'),
    );
    expect(() => validateProviderConfig(loadConfig({ PYLOOP_LLM_PROVIDER: 'groq' }))).toThrow(
      'GROQ_API_KEY is required when using Groq',
    );
  });

  it('accepts local providers without a key', () => {
    expect(() => validateProviderConfig(loadConfig({ PYLOOP_LLM_PROVIDER: 'ollama' }))).not.toThrow();
  });
});

describe('ensureCredential', () => {
  it('does not ask when the key is configured', async () => {
    const ask = vi.fn();
    const config = loadConfig({ GEMINI_API_KEY: 'test-secret' });

    expect(await ensureCredential(config, ask)).toBe(config);
    expect(ask).not.toHaveBeenCalled();
  });

  it('does not ask for local providers', async () => {
    const ask = vi.fn();

    await ensureCredential(loadConfig({ PYLOOP_LLM_PROVIDER: 'lmstudio' }), ask);

    expect(ask).not.toHaveBeenCalled();
  });

  it('asks once and stores the trimmed answer', async () => {
    const ask = vi.fn().mockResolvedValue('  test-secret  ');

    const config = await ensureCredential(loadConfig({}), ask);

    expect(ask).toHaveBeenCalledTimes(1);
    expect(ask).toHaveBeenCalledWith('Please enter your Gemini API key: ');
    expect(config.geminiApiKey).toBe('test-secret');
  });

  it('fails with AuthError on an empty answer or closed input', async () => {
    await expect(ensureCredential(loadConfig({}), async () => '')).rejects.toThrow(
      new AuthError('No Gemini API key provided (set GEMINI_API_KEY)'),
    );
    await expect(ensureCredential(loadConfig({ PYLOOP_LLM_PROVIDER: 'groq' }), async () => null)).rejects.toThrow(
      AuthError,
    );
  });
});
