/**
 * Core types for running code in a child process.
 */

/** Low-level result of one child process run. */
export interface ProcessOutcome {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  durationMs: number;
  pid: number | undefined;
  /** Set when the process could not be started at all (e.g. ENOENT) */
  spawnError?: string;
}

export interface ProcessOptions {
  timeoutMs: number;
  /** Delay between SIGTERM and SIGKILL once the timeout fires */
  killGraceMs?: number;
  cwd?: string;
  env?: Record<string, string>;
}

export type ExecutionOutcome = 'succeeded' | 'failed' | 'timed_out';

/**
 * Result of running one extracted code fragment.
 *
 * `stdout` and `stderr` are kept exactly as the child wrote them;
 * truncation happens only where results are turned into prompts.
 */
export interface ExecutionResult {
  executionId: string;
  outcome: ExecutionOutcome;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  durationMs: number;
  pid: number | undefined;
}

export interface RunOptions {
  /** Interpreter command or absolute path, e.g. the venv python */
  interpreter: string;
  interpreterArgs?: readonly string[];
  timeoutMs: number;
  killGraceMs?: number;
  /** Script file extension; defaults to `.py` */
  fileExtension?: string;
  /** Working directory of the child; defaults to the current directory */
  cwd?: string;
  /** Environment of the child; defaults to the stripped host environment */
  env?: Record<string, string>;
  /** When set, each run is appended to a daily JSONL file here */
  logDir?: string;
}
