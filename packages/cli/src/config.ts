import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import { z } from 'zod';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  /** Variables to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;

  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Replace `${VAR}` and `${VAR:-default}` in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const encodingSchema = z.enum(['utf-8', 'utf8', 'utf16le', 'latin1', 'ascii']);

const linkTableSchema = z
  .object({
    /** Inferred from the file extension when omitted */
    type: z.enum(['csv', 'excel']).optional(),
    filePath: z.string().min(1).default('links.csv'),
    delimiter: z.string().min(1).optional(),
    sheet: z.union([z.string().min(1), z.number().int().min(1)]).optional(),
    encoding: encodingSchema.optional(),
  })
  .strict();

const featuresSchema = z
  .object({
    filePath: z.string().min(1).default('source.geojson'),
    encoding: encodingSchema.optional(),
  })
  .strict();

const outputSchema = z
  .object({
    featuresPath: z.string().min(1).default('River Gauges.geojson'),
    reportPath: z.string().min(1).default('replace.log'),
    summaryPath: z.string().min(1).default('replace.xlsx'),
    summaryCsvPath: z.string().min(1).optional(),
  })
  .strict();

const matchingSchema = z
  .object({
    minFuzzyScore: z.number().min(0).max(1).default(0.4),
  })
  .strict();

const loggingSchema = z
  .object({
    format: z.enum(['text', 'json']).optional(),
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  })
  .strict();

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    linkTable: linkTableSchema.default({}),
    features: featuresSchema.default({}),
    output: outputSchema.default({}),
    matching: matchingSchema.default({}),
    logging: loggingSchema.default({}),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;
export type LinkTableConfig = ConfigFile['linkTable'];

export function formatZodError(err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `Invalid gaugelink.json:\n${issues}`;
}

/**
 * Validate an already parsed configuration value (env vars expanded first)
 *
 * @throws ConfigError listing every invalid field
 */
export function parseConfig(value: unknown, options?: EnvExpansionOptions): ConfigFile {
  const result = configFileSchema.safeParse(expandEnvVars(value, options));
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }
  return result.data;
}

export async function loadConfig(configPath: string, cwd = process.cwd()): Promise<ConfigFile> {
  const absolutePath = resolve(cwd, configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (error) {
    throw new ConfigError(
      `Invalid JSON in ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parseConfig(parsed);
}

/** Command line overrides */
export interface CliOverrides {
  links?: string;
  features?: string;
  out?: string;
  minScore?: number;
}

/**
 * Everything a run needs, with absolute paths
 */
export interface RunOptions {
  linkTable: Omit<LinkTableConfig, 'type'> & { type: 'csv' | 'excel' };
  features: ConfigFile['features'];
  output: ConfigFile['output'];
  minFuzzyScore: number;
}

const EXCEL_EXTENSIONS = new Set(['.xlsx', '.xlsm']);

export function inferLinkTableType(filePath: string): 'csv' | 'excel' {
  return EXCEL_EXTENSIONS.has(extname(filePath).toLowerCase()) ? 'excel' : 'csv';
}

/**
 * Apply command line overrides to a configuration and resolve every path
 * against `cwd`
 */
export function resolveRunOptions(
  config: ConfigFile,
  overrides: CliOverrides = {},
  cwd = process.cwd()
): RunOptions {
  const linkTablePath = resolve(cwd, overrides.links ?? config.linkTable.filePath);
  const featuresPath = resolve(cwd, overrides.features ?? config.features.filePath);
  const summaryCsvPath = config.output.summaryCsvPath;

  const options: RunOptions = {
    linkTable: {
      ...config.linkTable,
      type: config.linkTable.type ?? inferLinkTableType(linkTablePath),
      filePath: linkTablePath,
    },
    features: { ...config.features, filePath: featuresPath },
    output: {
      featuresPath: resolve(cwd, overrides.out ?? config.output.featuresPath),
      reportPath: resolve(cwd, config.output.reportPath),
      summaryPath: resolve(cwd, config.output.summaryPath),
      ...(summaryCsvPath !== undefined ? { summaryCsvPath: resolve(cwd, summaryCsvPath) } : {}),
    },
    minFuzzyScore: overrides.minScore ?? config.matching.minFuzzyScore,
  };

  const inputs = [options.linkTable.filePath, options.features.filePath];
  for (const path of Object.values(options.output)) {
    if (path !== undefined && inputs.includes(path)) {
      throw new ConfigError(`Output path must not overwrite an input file: ${path}`);
    }
  }

  return options;
}
