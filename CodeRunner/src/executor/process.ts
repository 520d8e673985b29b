/**
 * Child process execution with a wall-clock timeout.
 *
 * On POSIX the child leads its own process group, and every signal goes to
 * the whole group, so processes the code starts in the background are
 * stopped along with it. Timeout enforcement is SIGTERM, then SIGKILL after
 * a grace period.
 *
 * The outcome settles on `close` once the child has exited and its stdio is
 * shut. If something outside the child still holds the pipes after it
 * exits, the group is killed and the pipes destroyed after a short drain
 * window, so a run never outlasts its timeout by more than the grace period
 * and that window.
 */

import { spawn } from 'node:child_process';
import { Logger } from '@pyloop/shared/Utils/logger.js';
import type { ProcessOptions, ProcessOutcome } from './types.js';

const logger = new Logger('pyloop:process');

export const DEFAULT_KILL_GRACE_MS = 2_000;

/** How long stdio may stay open after the child itself has exited */
export const STDIO_DRAIN_MS = 250;

/** Exit code reported when the command cannot be started (shell convention) */
export const SPAWN_FAILURE_EXIT_CODE = 127;

const USE_PROCESS_GROUP = process.platform !== 'win32';

function isMissingProcess(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ESRCH';
}

export function runProcess(
  command: string,
  args: readonly string[],
  options: ProcessOptions,
): Promise<ProcessOutcome> {
  const startTime = Date.now();
  const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;

  return new Promise<ProcessOutcome>((resolve) => {
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let timedOut = false;
    let settled = false;
    let killTimer: ReturnType<typeof setTimeout> | null = null;
    let drainTimer: ReturnType<typeof setTimeout> | null = null;

    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: USE_PROCESS_GROUP,
      windowsHide: true,
    });

    logger.debug(`Spawned ${command}`, { pid: child.pid, args });

    child.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    function signalGroup(signal: NodeJS.Signals): void {
      const pid = child.pid;
      if (!USE_PROCESS_GROUP || pid === undefined) {
        child.kill(signal);
        return;
      }
      try {
        process.kill(-pid, signal);
      } catch (err) {
        // ESRCH: every process in the group has already exited
        if (!isMissingProcess(err)) {
          logger.warn(`Could not send ${signal} to process group ${pid}`, err);
        }
      }
    }

    const timeoutTimer = setTimeout(() => {
      timedOut = true;
      logger.debug(`Timeout after ${options.timeoutMs}ms, sending SIGTERM`, { pid: child.pid });
      signalGroup('SIGTERM');

      killTimer = setTimeout(() => {
        logger.debug('Grace period over, sending SIGKILL', { pid: child.pid });
        signalGroup('SIGKILL');
      }, killGraceMs);
    }, options.timeoutMs);

    function clearTimers(): void {
      clearTimeout(timeoutTimer);
      if (killTimer) clearTimeout(killTimer);
      if (drainTimer) clearTimeout(drainTimer);
    }

    function settle(exitCode: number | null, signal: NodeJS.Signals | null): void {
      if (settled) return;
      settled = true;
      clearTimers();
      // Leftovers that closed their stdio but kept running
      signalGroup('SIGKILL');

      resolve({
        exitCode,
        signal,
        stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
        stderr: Buffer.concat(stderrChunks).toString('utf-8'),
        timedOut,
        durationMs: Date.now() - startTime,
        pid: child.pid,
      });
    }

    // Spawn failures (command not found, bad cwd) never produce an exit
    child.on('error', (err) => {
      if (settled) return;
      settled = true;
      clearTimers();

      resolve({
        exitCode: SPAWN_FAILURE_EXIT_CODE,
        signal: null,
        stdout: '',
        stderr: err.message,
        timedOut: false,
        durationMs: Date.now() - startTime,
        pid: child.pid,
        spawnError: err.message,
      });
    });

    child.on('exit', (code, signal) => {
      if (settled) return;
      drainTimer = setTimeout(() => {
        logger.debug('Child exited but its stdio is still held open, killing the process group', {
          pid: child.pid,
        });
        child.stdout.destroy();
        child.stderr.destroy();
        settle(code, signal);
      }, STDIO_DRAIN_MS);
    });

    child.on('close', (code, signal) => settle(code, signal));
  });
}
