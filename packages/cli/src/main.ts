import { ConnectorError } from '@gaugelink/core';
import { ReconcileError } from '@gaugelink/reconciliation';
import { USAGE, parseArgs } from './args.js';
import { ConfigError, loadConfig, parseConfig, resolveRunOptions } from './config.js';
import { Logger, createRunId } from './logger.js';
import { runReconciliation } from './pipeline.js';

export interface MainOptions {
  cwd?: string;
  /** Clock used for the report timestamp */
  now?: () => Date;
}

function describeError(error: unknown): string {
  if (error instanceof ReconcileError || error instanceof ConnectorError) {
    return error.toActionableMessage();
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run the command line program and return its exit code
 */
export async function main(args: readonly string[], options: MainOptions = {}): Promise<number> {
  const cwd = options.cwd ?? process.cwd();
  let logger = new Logger();

  try {
    const cliArgs = parseArgs(args);
    if (cliArgs.help) {
      process.stdout.write(`${USAGE}\n`);
      return 0;
    }

    const config = cliArgs.configPath
      ? await loadConfig(cliArgs.configPath, cwd)
      : parseConfig({});
    logger = new Logger({
      level: config.logging.level,
      format: config.logging.format,
    }).child({ runId: createRunId() });

    const runOptions = resolveRunOptions(config, cliArgs, cwd);
    await runReconciliation(runOptions, logger, options.now);
    return 0;
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      logger.error(`Run with --help for usage.`);
      return 1;
    }
    logger.error('Reconciliation failed', { error: describeError(error) });
    return 1;
  }
}
