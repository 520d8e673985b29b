/**
 * Third-party import detection and pip installs for generated code.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { Logger } from '@pyloop/shared/Utils/logger.js';
import { getStrippedEnv } from '../config.js';
import { runProcess } from '../executor/process.js';
import { truncateOutput } from '../utils/output-truncate.js';

const logger = new Logger('pyloop:deps');

const moduleDataSchema = z.object({
  stdlib: z.array(z.string()),
  packageAliases: z.record(z.string()),
});

export type ModuleData = z.infer<typeof moduleDataSchema>;

let moduleData: ModuleData | null = null;

/** Standard-library names and import→distribution aliases shipped in data/ */
export function getModuleData(): ModuleData {
  if (!moduleData) {
    const raw = readFileSync(new URL('../../data/python-modules.json', import.meta.url), 'utf-8');
    moduleData = moduleDataSchema.parse(JSON.parse(raw));
  }
  return moduleData;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const FROM_IMPORT = /^from\s+([A-Za-z_][\w.]*)\s+import\b/;
const PLAIN_IMPORT = /^import\s+(.+)$/;

function topLevel(dotted: string): string | null {
  const name = dotted.trim().split(/\s+as\s+/)[0].split('.')[0].trim();
  return IDENTIFIER.test(name) ? name : null;
}

/** Top-level module names imported by a script, in order of first use */
export function importedModules(source: string): string[] {
  const found: string[] = [];
  for (const rawLine of source.split('\n')) {
    const line = rawLine.split('#')[0].trim();

    const fromMatch = FROM_IMPORT.exec(line);
    if (fromMatch) {
      const name = topLevel(fromMatch[1]);
      if (name) found.push(name);
      continue;
    }

    const importMatch = PLAIN_IMPORT.exec(line);
    if (importMatch) {
      for (const part of importMatch[1].split(',')) {
        const name = topLevel(part);
        if (name) found.push(name);
      }
    }
  }
  return [...new Set(found)];
}

/**
 * Imported modules that are not part of the standard library.
 */
export function extractDependencies(source: string, data: ModuleData = getModuleData()): string[] {
  const stdlib = new Set(data.stdlib);
  return importedModules(source).filter((name) => !stdlib.has(name));
}

/** Distribution name pip should install for an import name */
export function packageNameFor(moduleName: string, data: ModuleData = getModuleData()): string {
  return data.packageAliases[moduleName] ?? moduleName;
}

export interface PackageInstallResult {
  module: string;
  package: string;
  success: boolean;
  output: string;
}

export interface InstallOptions {
  timeoutMs?: number;
  /** Environment of pip; defaults to the stripped host environment */
  env?: Record<string, string>;
}

const INSTALL_TIMEOUT_MS = 120_000;

/**
 * `pip install` each module's distribution in turn. Failures are reported in
 * the results, never thrown; the code may still run without the package.
 * Package build scripts run here, so pip gets the same stripped environment
 * as generated code.
 */
export async function installPackages(
  pip: string,
  modules: readonly string[],
  options: InstallOptions = {},
): Promise<PackageInstallResult[]> {
  const results: PackageInstallResult[] = [];

  for (const module of modules) {
    const pkg = packageNameFor(module);
    logger.info(`Installing ${pkg}`);

    const outcome = await runProcess(
      pip,
      ['install', pkg, '--no-input', '--disable-pip-version-check'],
      { timeoutMs: options.timeoutMs ?? INSTALL_TIMEOUT_MS, env: options.env ?? getStrippedEnv() },
    );

    const success = outcome.exitCode === 0 && !outcome.timedOut;
    const combined = [outcome.stdout, outcome.stderr].filter((s) => s.length > 0).join('\n');
    const output = truncateOutput(combined, { maxChars: 2_000, head: 500, tail: 1_000 }).text;

    if (!success) {
      logger.warn(`Failed to install ${pkg}`, { exitCode: outcome.exitCode, timedOut: outcome.timedOut });
    }
    results.push({ module, package: pkg, success, output });
  }

  return results;
}
