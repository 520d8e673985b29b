import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import { createGroq } from '@ai-sdk/groq';
import type { Config } from '../config.js';
import type { ProviderName } from './types.js';

/**
 * Create the Gemini provider. The key comes from config, never from the SDK's
 * own GOOGLE_GENERATIVE_AI_API_KEY lookup, so the prompt-for-key path works.
 */
export function createGoogleProvider(config: Config) {
  return createGoogleGenerativeAI({
    apiKey: config.geminiApiKey ?? '',
  });
}

/**
 * Create Groq provider using the dedicated @ai-sdk/groq package.
 */
export function createGroqProvider(config: Config) {
  return createGroq({
    apiKey: config.groqApiKey ?? '',
  });
}

/**
 * Create LM Studio provider using OpenAI-compatible API
 */
export function createLMStudioProvider(config: Config) {
  return createOpenAI({
    baseURL: config.lmstudioBaseUrl,
    apiKey: 'lm-studio', // LM Studio ignores API key
  });
}

/**
 * Create Ollama provider using OpenAI-compatible API
 */
export function createOllamaProvider(config: Config) {
  // Ollama's OpenAI-compatible endpoint is at /v1
  const baseUrl = config.ollamaBaseUrl.endsWith('/v1')
    ? config.ollamaBaseUrl
    : `${config.ollamaBaseUrl}/v1`;

  return createOpenAI({
    baseURL: baseUrl,
    apiKey: 'ollama', // Ollama ignores API key
  });
}

/**
 * Get the model ID for the selected provider
 */
export function getModelId(config: Config): string {
  switch (config.llmProvider) {
    case 'google':
      return config.geminiModel;
    case 'groq':
      return config.groqModel;
    case 'lmstudio':
      return config.lmstudioModel;
    case 'ollama':
      return config.ollamaModel;
  }
}

/**
 * Get provider name for display and logging
 */
export function getProviderDisplayName(provider: ProviderName): string {
  switch (provider) {
    case 'google':
      return 'Gemini';
    case 'groq':
      return 'Groq';
    case 'lmstudio':
      return 'LM Studio';
    case 'ollama':
      return 'Ollama';
  }
}
