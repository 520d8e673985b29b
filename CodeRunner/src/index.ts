export { runCode, classifyOutcome } from './executor/runner.js';
export { runProcess, SPAWN_FAILURE_EXIT_CODE } from './executor/process.js';
export type {
  ExecutionOutcome,
  ExecutionResult,
  ProcessOptions,
  ProcessOutcome,
  RunOptions,
} from './executor/types.js';
export { ensureVirtualEnv, venvPaths, type PythonToolchain } from './environment/venv.js';
export {
  extractDependencies,
  importedModules,
  installPackages,
  packageNameFor,
  type PackageInstallResult,
} from './environment/dependencies.js';
export {
  loadRunnerConfig,
  getRunnerConfig,
  resetRunnerConfig,
  getStrippedEnv,
  type RunnerConfig,
} from './config.js';
export { truncateOutput, type TruncateConfig, type TruncateResult } from './utils/output-truncate.js';
export { logExecution, executionLogFile } from './logging/writer.js';
export type { ExecutionLogEntry } from './logging/types.js';
