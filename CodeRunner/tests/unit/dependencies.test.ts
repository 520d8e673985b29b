import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmod, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  extractDependencies,
  importedModules,
  installPackages,
  packageNameFor,
} from '../../src/environment/dependencies.js';

const SCRIPT = [
  'import os',
  'import numpy as np, pandas',
  'from matplotlib import pyplot as plt',
  'from . import local_helpers',
  'from sklearn.linear_model import LinearRegression',
  '# import commented_out',
  'import requests  # http client',
  'import os.path',
  '',
  'print(np.arange(3))',
].join('\n');

describe('importedModules', () => {
  it('lists top-level modules in order of first import', () => {
    expect(importedModules(SCRIPT)).toEqual([
      'os',
      'numpy',
      'pandas',
      'matplotlib',
      'sklearn',
      'requests',
    ]);
  });

  it('ignores code without imports', () => {
    expect(importedModules('print("important")\nx = 1')).toEqual([]);
  });
});

describe('extractDependencies', () => {
  it('drops standard-library modules', () => {
    expect(extractDependencies(SCRIPT)).toEqual(['numpy', 'pandas', 'matplotlib', 'sklearn', 'requests']);
  });

  it('returns nothing for stdlib-only scripts', () => {
    expect(extractDependencies('import json\nfrom collections import Counter\nimport sys, re')).toEqual([]);
  });
});

describe('packageNameFor', () => {
  it('maps import names to their pip distribution', () => {
    expect(packageNameFor('sklearn')).toBe('scikit-learn');
    expect(packageNameFor('PIL')).toBe('Pillow');
  });

  it('uses the import name when no alias exists', () => {
    expect(packageNameFor('requests')).toBe('requests');
  });
});

describe('installPackages', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pyloop-pip-test-'));
  });

  afterEach(async () => {
    delete process.env.GEMINI_API_KEY;
    await rm(dir, { recursive: true, force: true });
  });

  async function writePip(body: string): Promise<string> {
    const pip = join(dir, 'pip');
    await writeFile(pip, `#!/bin/sh\n${body}\n`);
    await chmod(pip, 0o755);
    return pip;
  }

  it('reports a missing pip as a failed install', async () => {
    const results = await installPackages(join(dir, 'no-such-pip'), ['requests']);

    expect(results).toHaveLength(1);
    expect(results[0].module).toBe('requests');
    expect(results[0].package).toBe('requests');
    expect(results[0].success).toBe(false);
    expect(results[0].output).toContain('ENOENT');
  });

  it.skipIf(process.platform === 'win32')('installs the aliased distribution name', async () => {
    const fakePip = join(dir, 'pip');
    await writeFile(fakePip, '#!/bin/sh\necho "Successfully installed $2"\n');
    await chmod(fakePip, 0o755);

    const results = await installPackages(fakePip, ['yaml']);

    expect(results).toEqual([
      { module: 'yaml', package: 'PyYAML', success: true, output: 'Successfully installed PyYAML\n' },
    ]);
  });

  describe.skipIf(process.platform === 'win32')('with a stub pip', () => {
    it('installs each module in order and reports every result', async () => {
      const pip = await writePip('echo "Successfully installed $2"');

      const results = await installPackages(pip, ['requests', 'sklearn']);

      expect(results).toEqual([
        { module: 'requests', package: 'requests', success: true, output: 'Successfully installed requests\n' },
        { module: 'sklearn', package: 'scikit-learn', success: true, output: 'Successfully installed scikit-learn\n' },
      ]);
    });

    it('reports a non-zero pip exit with its output', async () => {
      const pip = await writePip('echo "ERROR: No matching distribution found for $2" >&2\nexit 1');

      const [result] = await installPackages(pip, ['notapkg']);

      expect(result.success).toBe(false);
      expect(result.output).toBe('ERROR: No matching distribution found for notapkg\n');
    });

    it('gives up on an install that outlives its timeout', async () => {
      const pip = await writePip('sleep 10');
      const started = Date.now();

      const [result] = await installPackages(pip, ['requests'], { timeoutMs: 300 });

      expect(result.success).toBe(false);
      expect(Date.now() - started).toBeLessThan(5_000);
    });

    it('does not pass credentials to pip', async () => {
      process.env.GEMINI_API_KEY = 'test-secret';
      const pip = await writePip('echo "KEY=$GEMINI_API_KEY"');

      const [result] = await installPackages(pip, ['requests']);

      expect(result.output).toBe('KEY=\n');
    });
  });
});
