import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Load `.env` from the current working directory, then from the package root.
 * Values already set win over later files. `quiet` keeps dotenv v17 from
 * printing its banner into the chat transcript on stdout.
 *
 * @param importMetaUrl - pass `import.meta.url` from the entry point
 * @param levelsUp - directories up from the entry file to package root (default: 1 for src/index.ts)
 * @returns the files that were loaded
 */
export function loadEnvSafely(importMetaUrl: string, levelsUp = 1, cwd = process.cwd()): string[] {
  let dir = dirname(fileURLToPath(importMetaUrl));
  for (let i = 0; i < levelsUp; i++) {
    dir = dirname(dir);
  }

  const candidates = [resolve(cwd, '.env'), resolve(dir, '.env')];
  const loaded: string[] = [];
  for (const envPath of new Set(candidates)) {
    if (existsSync(envPath)) {
      dotenvConfig({ path: envPath, quiet: true });
      loaded.push(envPath);
    }
  }
  return loaded;
}
