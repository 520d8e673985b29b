import type { LLMProvider } from '../config.js';

/**
 * Supported LLM provider names
 */
export type ProviderName = LLMProvider;

/**
 * Environment variable holding each hosted provider's credential.
 * Local providers (LM Studio, Ollama) need none.
 */
export const API_KEY_VARIABLES: Record<ProviderName, string | null> = {
  google: 'GEMINI_API_KEY',
  groq: 'GROQ_API_KEY',
  lmstudio: null,
  ollama: null,
};
