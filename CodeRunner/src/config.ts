/**
 * CodeRunner configuration
 *
 * Zod-validated environment config and environment stripping for the
 * child processes that run generated code.
 */

import { z } from 'zod';
import { ConfigurationError } from '@pyloop/shared/Types/errors.js';

// ── Schema ───────────────────────────────────────────────────────────────────

const defaultPython = process.platform === 'win32' ? 'python' : 'python3';

const configSchema = z.object({
  python: z.string().min(1).default(defaultPython),
  useVenv: z.boolean().default(true),
  venvDir: z.string().min(1).default('.code_exec_venv'),
  autoInstall: z.boolean().default(true),
  timeoutMs: z.coerce.number().int().positive().default(60_000),
  killGraceMs: z.coerce.number().int().nonnegative().default(2_000),
  maxOutputChars: z.coerce.number().int().positive().default(10_000),
  truncationHead: z.coerce.number().int().positive().default(4_000),
  truncationTail: z.coerce.number().int().positive().default(4_000),
  executionLogDir: z.string().min(1).optional(),
});

export type RunnerConfig = z.infer<typeof configSchema>;

// ── Helpers ──────────────────────────────────────────────────────────────────

export function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  const normalized = value.trim().toLowerCase();
  return normalized === 'true' || normalized === '1' || normalized === 'yes';
}

/**
 * Build the runner config from environment variables.
 */
export function loadRunnerConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  const raw = {
    python: env.PYLOOP_PYTHON,
    useVenv: parseBoolean(env.PYLOOP_USE_VENV),
    venvDir: env.PYLOOP_VENV_DIR,
    autoInstall: parseBoolean(env.PYLOOP_AUTO_INSTALL),
    timeoutMs: env.PYLOOP_EXEC_TIMEOUT_MS,
    killGraceMs: env.PYLOOP_KILL_GRACE_MS,
    maxOutputChars: env.PYLOOP_MAX_OUTPUT_CHARS,
    truncationHead: env.PYLOOP_TRUNCATION_HEAD,
    truncationTail: env.PYLOOP_TRUNCATION_TAIL,
    executionLogDir: env.PYLOOP_EXECUTION_LOG_DIR,
  };

  // Strip undefined and empty keys so Zod defaults kick in
  const cleaned = Object.fromEntries(
    Object.entries(raw).filter(([, v]) => v !== undefined && v !== ''),
  );

  const result = configSchema.safeParse(cleaned);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('\n');
    throw new ConfigurationError(`Runner configuration invalid:\n${errors}`, result.error.flatten());
  }
  return result.data;
}

// ── Singleton ────────────────────────────────────────────────────────────────

let cached: RunnerConfig | null = null;

export function getRunnerConfig(): RunnerConfig {
  if (!cached) {
    cached = loadRunnerConfig();
  }
  return cached;
}

/** Reset cached config (for testing) */
export function resetRunnerConfig(): void {
  cached = null;
}

// ── Stripped Environment ─────────────────────────────────────────────────────

const ENV_ALLOWLIST = [
  'PATH', 'HOME', 'LANG', 'LC_ALL', 'TERM', 'TMPDIR', 'USER',
  // Windows needs these to start an interpreter at all
  'SYSTEMROOT', 'PATHEXT', 'TEMP', 'TMP', 'USERPROFILE', 'APPDATA', 'LOCALAPPDATA',
];

/**
 * Build a minimal environment for child processes.
 * Only allowlisted vars pass through, so model credentials never reach
 * generated code.
 */
export function getStrippedEnv(source: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const env: Record<string, string> = {
    PYTHONUNBUFFERED: '1',
    PYTHONIOENCODING: 'utf-8',
  };
  for (const key of ENV_ALLOWLIST) {
    const val = source[key];
    if (val !== undefined) {
      env[key] = val;
    }
  }
  return env;
}
