import type { LanguageModel } from 'ai';
import type { Config } from '../config.js';
import { Logger } from '@pyloop/shared/Utils/logger.js';
import {
  createGoogleProvider,
  createGroqProvider,
  createLMStudioProvider,
  createOllamaProvider,
  getModelId,
  getProviderDisplayName,
} from './providers.js';
import { validateProviderConfig } from './credentials.js';

const logger = new Logger('pyloop:llm');

/**
 * Create a language model instance based on configuration
 *
 * @throws AuthError when the selected provider has no key
 */
export function createLanguageModel(config: Config): LanguageModel {
  validateProviderConfig(config);

  const modelId = getModelId(config);
  logger.info(`Initializing ${getProviderDisplayName(config.llmProvider)} with model: ${modelId}`);

  switch (config.llmProvider) {
    case 'google':
      return createGoogleProvider(config)(modelId);
    case 'groq':
      return createGroqProvider(config)(modelId);
    case 'lmstudio':
      return createLMStudioProvider(config)(modelId);
    case 'ollama':
      return createOllamaProvider(config)(modelId);
  }
}

/**
 * Model factory that caches the model instance
 */
export class ModelFactory {
  private model: LanguageModel | null = null;
  private readonly config: Config;

  constructor(config: Config) {
    this.config = config;
  }

  getModel(): LanguageModel {
    if (!this.model) {
      this.model = createLanguageModel(this.config);
    }
    return this.model;
  }

  getProviderInfo(): { provider: string; model: string } {
    return {
      provider: getProviderDisplayName(this.config.llmProvider),
      model: getModelId(this.config),
    };
  }
}
