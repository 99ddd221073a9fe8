/**
 * @gaugelink/cli
 *
 * Command line runner: configuration, logging and the reconciliation pipeline
 */

export { main } from './main.js';
export type { MainOptions } from './main.js';

export { runReconciliation } from './pipeline.js';
export type { RunOutcome } from './pipeline.js';

export {
  ConfigError,
  configFileSchema,
  expandEnvVars,
  formatZodError,
  inferLinkTableType,
  loadConfig,
  parseConfig,
  resolveRunOptions,
} from './config.js';
export type {
  CliOverrides,
  ConfigFile,
  EnvExpansionOptions,
  LinkTableConfig,
  RunOptions,
} from './config.js';

export { USAGE, parseArgs } from './args.js';
export type { CliArgs } from './args.js';

export { Logger, createRunId, redactUrlCredentials } from './logger.js';
export type { LogFormat, LogLevel, LoggerOptions } from './logger.js';
