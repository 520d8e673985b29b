/**
 * Runs extracted code with the prepared Python toolchain, installing
 * third-party imports into the venv first when enabled.
 */

import {
  extractDependencies,
  installPackages,
  runCode,
  type ExecutionResult,
  type PackageInstallResult,
  type PythonToolchain,
  type RunnerConfig,
} from '@pyloop/code-runner';
import { Logger } from '@pyloop/shared/Utils/logger.js';

const logger = new Logger('pyloop:executor');

export interface ExecutionReport {
  result: ExecutionResult;
  installs: PackageInstallResult[];
}

export interface CodeExecutor {
  readonly timeoutMs: number;
  execute(source: string): Promise<ExecutionReport>;
}

export class PythonExecutor implements CodeExecutor {
  private readonly toolchain: PythonToolchain;
  private readonly config: RunnerConfig;
  /** Modules installed successfully during this process */
  private readonly installed = new Set<string>();

  constructor(toolchain: PythonToolchain, config: RunnerConfig) {
    this.toolchain = toolchain;
    this.config = config;
  }

  get timeoutMs(): number {
    return this.config.timeoutMs;
  }

  async execute(source: string): Promise<ExecutionReport> {
    const installs = await this.installMissing(source);

    const result = await runCode(source, {
      interpreter: this.toolchain.python,
      timeoutMs: this.config.timeoutMs,
      killGraceMs: this.config.killGraceMs,
      logDir: this.config.executionLogDir,
    });

    return { result, installs };
  }

  private async installMissing(source: string): Promise<PackageInstallResult[]> {
    const pip = this.toolchain.pip;
    if (!this.config.autoInstall || !pip) return [];

    const wanted = extractDependencies(source).filter((m) => !this.installed.has(m));
    if (wanted.length === 0) return [];

    logger.debug('Installing dependencies', { modules: wanted });
    const results = await installPackages(pip, wanted);
    for (const r of results) {
      if (r.success) this.installed.add(r.module);
    }
    return results;
  }
}
