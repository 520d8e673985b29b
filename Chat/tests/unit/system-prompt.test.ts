import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigurationError } from '@pyloop/shared/Types/errors.js';
import { DEFAULT_SYSTEM_PROMPT, loadSystemPrompt } from '../../src/chat/system-prompt.js';

describe('loadSystemPrompt', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pyloop-prompt-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('uses the built-in prompt when no file is configured', () => {
    expect(loadSystemPrompt()).toBe(DEFAULT_SYSTEM_PROMPT);
  });

  it('reads and trims a prompt file', async () => {
    const path = join(dir, 'prompt.md');
    await writeFile(path, '\nAnswer in French.\n\n');

    expect(loadSystemPrompt(path)).toBe('Answer in French.');
  });

  it('rejects an empty file', async () => {
    const path = join(dir, 'empty.md');
    await writeFile(path, '  \n');

    expect(() => loadSystemPrompt(path)).toThrow(`System prompt file is empty: ${path}`);
  });

  it('rejects a missing file', () => {
    expect(() => loadSystemPrompt(join(dir, 'missing.md'))).toThrow(ConfigurationError);
  });
});
