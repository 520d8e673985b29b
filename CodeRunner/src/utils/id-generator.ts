import { randomUUID } from 'node:crypto';

export function generateExecutionId(): string {
  return `run_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}
