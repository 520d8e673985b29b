/**
 * JSONL execution log with daily rotation.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { Logger } from '@pyloop/shared/Utils/logger.js';
import { errorMessage } from '@pyloop/shared/Types/errors.js';
import type { ExecutionLogEntry } from './types.js';

const logger = new Logger('pyloop:log');

export function executionLogFile(logDir: string, date: Date = new Date()): string {
  const day = date.toISOString().slice(0, 10); // YYYY-MM-DD
  return join(logDir, `executions-${day}.jsonl`);
}

/**
 * Append an entry to today's file. A failed write is logged, never thrown.
 */
export async function logExecution(logDir: string, entry: ExecutionLogEntry): Promise<void> {
  const filepath = executionLogFile(logDir);
  try {
    await mkdir(logDir, { recursive: true });
    await appendFile(filepath, JSON.stringify(entry) + '\n', 'utf-8');
  } catch (err) {
    logger.error(`Failed to write execution log ${filepath}: ${errorMessage(err)}`);
  }
}
