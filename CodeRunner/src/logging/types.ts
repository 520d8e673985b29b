/**
 * JSONL execution log entry, one line per run.
 */

import type { ExecutionOutcome } from '../executor/types.js';

export interface ExecutionLogEntry {
  type: 'execution';
  execution_id: string;
  interpreter: string;
  code: string;
  outcome: ExecutionOutcome;
  stdout: string;
  stderr: string;
  exit_code: number | null;
  timed_out: boolean;
  duration_ms: number;
  executed_at: string;
}
