import { ConfigError, type CliOverrides } from './config.js';

export interface CliArgs extends CliOverrides {
  configPath?: string;
  help: boolean;
}

const VALUE_FLAGS = new Set(['--config', '--links', '--features', '--out', '--min-score']);

export const USAGE = [
  'Usage: gaugelink [--config <gaugelink.json>] [--links <links.csv>] [--features <source.geojson>]',
  '                 [--out <annotated.geojson>] [--min-score <0-1>]',
  '',
  'Links every gauge feature to a row of the link table (exact id, then partial id,',
  'then fuzzy name) and writes the annotated features, a match report and a summary.',
  '',
  'Example gaugelink.json:',
  JSON.stringify(
    {
      linkTable: { filePath: './links.csv' },
      features: { filePath: './source.geojson' },
      output: {
        featuresPath: './River Gauges.geojson',
        reportPath: './replace.log',
        summaryPath: './replace.xlsx',
      },
      matching: { minFuzzyScore: 0.4 },
      logging: { level: 'info', format: 'text' },
    },
    null,
    2
  ),
].join('\n');

/**
 * Parse command line arguments (without the node and script entries)
 *
 * @throws ConfigError for unknown flags, missing values or an invalid score
 */
export function parseArgs(args: readonly string[]): CliArgs {
  const parsed: CliArgs = { help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      parsed.help = true;
      continue;
    }

    if (arg === undefined || !VALUE_FLAGS.has(arg)) {
      throw new ConfigError(`Unknown argument: ${arg ?? ''}`);
    }

    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigError(`Missing value for ${arg}`);
    }
    i++;

    switch (arg) {
      case '--config':
        parsed.configPath = value;
        break;
      case '--links':
        parsed.links = value;
        break;
      case '--features':
        parsed.features = value;
        break;
      case '--out':
        parsed.out = value;
        break;
      case '--min-score': {
        const score = Number(value);
        if (value.trim() === '' || !Number.isFinite(score) || score < 0 || score > 1) {
          throw new ConfigError(`--min-score must be a number between 0 and 1, got "${value}"`);
        }
        parsed.minScore = score;
        break;
      }
    }
  }

  return parsed;
}
