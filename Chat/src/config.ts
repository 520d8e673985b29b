import { z } from 'zod';
import { ConfigurationError } from '@pyloop/shared/Types/errors.js';

/**
 * LLM providers supported by pyloop
 */
export const LLMProviderSchema = z.enum(['google', 'groq', 'lmstudio', 'ollama']);
export type LLMProvider = z.infer<typeof LLMProviderSchema>;

/**
 * Configuration schema with Zod validation
 */
export const ConfigSchema = z.object({
  llmProvider: LLMProviderSchema.default('google'),

  // Google Gemini settings
  geminiApiKey: z.string().optional(),
  geminiModel: z.string().default('gemini-2.5-flash'),

  // Groq settings
  groqApiKey: z.string().optional(),
  groqModel: z.string().default('llama-3.3-70b-versatile'),

  // LM Studio settings
  lmstudioBaseUrl: z.string().url().default('http://localhost:1234/v1'),
  lmstudioModel: z.string().default('local-model'),

  // Ollama settings
  ollamaBaseUrl: z.string().url().default('http://localhost:11434'),
  ollamaModel: z.string().default('llama3.2'),

  // Sampling
  temperature: z.number().min(0).max(2).default(0.7),
  topP: z.number().gt(0).max(1).default(0.95),

  // Request handling; retries use the SDK's exponential backoff
  maxRetries: z.number().int().min(0).max(10).default(2),
  requestTimeoutMs: z.number().int().min(1000).default(120_000),

  // How often the model may try to repair code that failed
  maxFixAttempts: z.number().int().min(0).max(10).default(3),

  // Path to a file containing the system prompt (overrides the built-in one)
  systemPromptPath: z.string().optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse integer from environment variable
 */
function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  return Number.parseInt(value, 10);
}

/**
 * Parse float from environment variable
 */
function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  return Number(value);
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    llmProvider: env.PYLOOP_LLM_PROVIDER || undefined,
    geminiApiKey: env.GEMINI_API_KEY || undefined,
    geminiModel: env.GEMINI_MODEL || undefined,
    groqApiKey: env.GROQ_API_KEY || undefined,
    groqModel: env.GROQ_MODEL || undefined,
    lmstudioBaseUrl: env.LMSTUDIO_BASE_URL || undefined,
    lmstudioModel: env.LMSTUDIO_MODEL || undefined,
    ollamaBaseUrl: env.OLLAMA_BASE_URL || undefined,
    ollamaModel: env.OLLAMA_MODEL || undefined,
    temperature: parseNumber(env.PYLOOP_TEMPERATURE),
    topP: parseNumber(env.PYLOOP_TOP_P),
    maxRetries: parseInteger(env.PYLOOP_MAX_RETRIES),
    requestTimeoutMs: parseInteger(env.PYLOOP_REQUEST_TIMEOUT_MS),
    maxFixAttempts: parseInteger(env.PYLOOP_MAX_FIX_ATTEMPTS),
    systemPromptPath: env.PYLOOP_SYSTEM_PROMPT_PATH || undefined,
  };

  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('\n');
    throw new ConfigurationError(`Configuration validation failed:\n${errors}`, result.error.flatten());
  }

  return result.data;
}
