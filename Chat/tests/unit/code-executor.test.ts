import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmod, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadRunnerConfig, type PythonToolchain, type RunnerConfig } from '@pyloop/code-runner';
import { PythonExecutor } from '../../src/loop/code-executor.js';

/**
 * Shell scripts stand in for the venv's python and pip so the suite needs
 * no Python installation.
 */
describe.skipIf(process.platform === 'win32')('PythonExecutor', () => {
  let dir: string;
  let toolchain: PythonToolchain;
  let config: RunnerConfig;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pyloop-executor-test-'));

    const python = join(dir, 'python');
    await writeFile(python, '#!/bin/sh\necho "ran $(basename "$1")"\n');
    await chmod(python, 0o755);

    const pip = join(dir, 'pip');
    await writeFile(pip, `#!/bin/sh\necho "$2" >> "${join(dir, 'pip-calls.log')}"\necho "Successfully installed $2"\n`);
    await chmod(pip, 0o755);

    toolchain = { python, pip, venvDir: dir, created: false };
    config = { ...loadRunnerConfig({}), timeoutMs: 10_000 };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('runs the source with the toolchain interpreter', async () => {
    const executor = new PythonExecutor(toolchain, { ...config, autoInstall: false });

    const { result, installs } = await executor.execute('print("hi")');

    expect(result.outcome).toBe('succeeded');
    expect(result.stdout).toBe('ran script.py\n');
    expect(installs).toEqual([]);
    expect(executor.timeoutMs).toBe(10_000);
  });

  it('installs third-party imports once per process', async () => {
    const executor = new PythonExecutor(toolchain, config);

    const first = await executor.execute('import os\nimport requests\nfrom sklearn import svm');
    const second = await executor.execute('import requests\nimport yaml');

    expect(first.installs.map((i) => [i.module, i.package, i.success])).toEqual([
      ['requests', 'requests', true],
      ['sklearn', 'scikit-learn', true],
    ]);
    expect(second.installs.map((i) => i.package)).toEqual(['PyYAML']);
    expect(await readFile(join(dir, 'pip-calls.log'), 'utf-8')).toBe('requests\nscikit-learn\nPyYAML\n');
  });

  it('skips installs when there is no pip', async () => {
    const executor = new PythonExecutor({ ...toolchain, pip: null }, config);

    const { installs } = await executor.execute('import requests');

    expect(installs).toEqual([]);
  });
});
