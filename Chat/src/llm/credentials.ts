import { AuthError } from '@pyloop/shared/Types/errors.js';
import type { Config } from '../config.js';
import { API_KEY_VARIABLES } from './types.js';
import { getProviderDisplayName } from './providers.js';

/**
 * The configured key for the selected provider, if it needs one
 */
export function getApiKey(config: Config): string | undefined {
  switch (config.llmProvider) {
    case 'google':
      return config.geminiApiKey;
    case 'groq':
      return config.groqApiKey;
    default:
      return undefined;
  }
}

export function requiresApiKey(config: Config): boolean {
  return API_KEY_VARIABLES[config.llmProvider] !== null;
}

export function withApiKey(config: Config, apiKey: string): Config {
  switch (config.llmProvider) {
    case 'google':
      return { ...config, geminiApiKey: apiKey };
    case 'groq':
      return { ...config, groqApiKey: apiKey };
    default:
      return config;
  }
}

/**
 * Validate that the credential for the selected provider is present
 *
 * @throws AuthError when a hosted provider has no key
 */
export function validateProviderConfig(config: Config): void {
  const variable = API_KEY_VARIABLES[config.llmProvider];
  if (variable && !getApiKey(config)) {
    throw new AuthError(`${variable} is required when using ${getProviderDisplayName(config.llmProvider)}`);
  }
}

/**
 * Fill in a missing key by asking the user once.
 *
 * @param ask - resolves the user's answer, or null when input has ended
 * @throws AuthError when the user gives no key
 */
export async function ensureCredential(
  config: Config,
  ask: (question: string) => Promise<string | null>,
): Promise<Config> {
  if (!requiresApiKey(config) || getApiKey(config)) {
    return config;
  }

  const provider = getProviderDisplayName(config.llmProvider);
  const answer = (await ask(`Please enter your ${provider} API key: `))?.trim();
  if (!answer) {
    throw new AuthError(`No ${provider} API key provided (set ${API_KEY_VARIABLES[config.llmProvider]})`);
  }
  return withApiKey(config, answer);
}
