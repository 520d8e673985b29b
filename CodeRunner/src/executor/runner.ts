/**
 * Runs one extracted code fragment as a script in a child process.
 *
 * - Source goes to a private temp directory, removed on every exit path
 * - Stripped environment (no API keys/tokens) unless the caller passes one
 * - Outcome classified as succeeded / failed / timed_out
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Logger } from '@pyloop/shared/Utils/logger.js';
import { errorMessage } from '@pyloop/shared/Types/errors.js';
import { getStrippedEnv } from '../config.js';
import { generateExecutionId } from '../utils/id-generator.js';
import { logExecution } from '../logging/writer.js';
import { runProcess } from './process.js';
import type { ExecutionOutcome, ExecutionResult, ProcessOutcome, RunOptions } from './types.js';

const logger = new Logger('pyloop:runner');

export function classifyOutcome(outcome: ProcessOutcome): ExecutionOutcome {
  if (outcome.timedOut) return 'timed_out';
  return outcome.exitCode === 0 ? 'succeeded' : 'failed';
}

export async function runCode(source: string, options: RunOptions): Promise<ExecutionResult> {
  const executionId = generateExecutionId();
  const outcome = await runScript(source, options);

  const result: ExecutionResult = {
    executionId,
    outcome: classifyOutcome(outcome),
    exitCode: outcome.exitCode,
    signal: outcome.signal,
    stdout: outcome.stdout,
    stderr: outcome.stderr,
    timedOut: outcome.timedOut,
    durationMs: outcome.durationMs,
    pid: outcome.pid,
  };

  logger.debug(`Execution ${executionId} ${result.outcome}`, {
    exitCode: result.exitCode,
    durationMs: result.durationMs,
  });

  if (options.logDir) {
    await logExecution(options.logDir, {
      type: 'execution',
      execution_id: executionId,
      interpreter: options.interpreter,
      code: source,
      outcome: result.outcome,
      stdout: result.stdout,
      stderr: result.stderr,
      exit_code: result.exitCode,
      timed_out: result.timedOut,
      duration_ms: result.durationMs,
      executed_at: new Date().toISOString(),
    });
  }

  return result;
}

async function runScript(source: string, options: RunOptions): Promise<ProcessOutcome> {
  const scriptDir = await mkdtemp(join(tmpdir(), 'pyloop-'));
  const scriptPath = join(scriptDir, `script${options.fileExtension ?? '.py'}`);

  try {
    await writeFile(scriptPath, source, 'utf-8');
    return await runProcess(
      options.interpreter,
      [...(options.interpreterArgs ?? []), scriptPath],
      {
        timeoutMs: options.timeoutMs,
        killGraceMs: options.killGraceMs,
        cwd: options.cwd ?? process.cwd(),
        env: options.env ?? getStrippedEnv(),
      },
    );
  } finally {
    await removeScriptDir(scriptDir);
  }
}

async function removeScriptDir(dir: string): Promise<void> {
  try {
    await rm(dir, { recursive: true, force: true });
  } catch (err) {
    logger.warn(`Unable to delete temporary directory ${dir}: ${errorMessage(err)}`);
  }
}
