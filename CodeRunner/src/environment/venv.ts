/**
 * Dedicated virtual environment for generated code, so installs never touch
 * the user's own interpreter.
 */

import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { Logger } from '@pyloop/shared/Utils/logger.js';
import { ConfigurationError } from '@pyloop/shared/Types/errors.js';
import { runProcess } from '../executor/process.js';
import type { RunnerConfig } from '../config.js';

const logger = new Logger('pyloop:venv');

const VENV_CREATE_TIMEOUT_MS = 180_000;

export interface PythonToolchain {
  /** Interpreter that runs generated code */
  python: string;
  /** pip inside the venv; null when no venv is used and installs are off */
  pip: string | null;
  venvDir: string | null;
  created: boolean;
}

export function venvPaths(
  venvDir: string,
  platform: NodeJS.Platform = process.platform,
): { python: string; pip: string } {
  if (platform === 'win32') {
    return {
      python: join(venvDir, 'Scripts', 'python.exe'),
      pip: join(venvDir, 'Scripts', 'pip.exe'),
    };
  }
  return {
    python: join(venvDir, 'bin', 'python'),
    pip: join(venvDir, 'bin', 'pip'),
  };
}

/**
 * Resolve the interpreter to run code with, creating the venv on first use.
 *
 * @throws ConfigurationError when `python -m venv` fails
 */
export async function ensureVirtualEnv(
  config: Pick<RunnerConfig, 'python' | 'useVenv' | 'venvDir'>,
  cwd: string = process.cwd(),
): Promise<PythonToolchain> {
  if (!config.useVenv) {
    return { python: config.python, pip: null, venvDir: null, created: false };
  }

  const venvDir = resolve(cwd, config.venvDir);
  const paths = venvPaths(venvDir);

  if (existsSync(paths.python)) {
    logger.debug(`Virtual environment found at ${venvDir}`);
    return { ...paths, venvDir, created: false };
  }

  logger.info(`Creating virtual environment in ${venvDir}`);
  const outcome = await runProcess(config.python, ['-m', 'venv', venvDir], {
    timeoutMs: VENV_CREATE_TIMEOUT_MS,
    cwd,
  });

  if (outcome.exitCode !== 0 || outcome.timedOut) {
    const reason = outcome.spawnError ?? (outcome.stderr.trim() || `exit code ${outcome.exitCode}`);
    throw new ConfigurationError(`Failed to create virtual environment at ${venvDir}: ${reason}`, {
      python: config.python,
      exitCode: outcome.exitCode,
    });
  }

  return { ...paths, venvDir, created: true };
}
