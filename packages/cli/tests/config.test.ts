import { describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import {
  ConfigError,
  expandEnvVars,
  inferLinkTableType,
  loadConfig,
  parseConfig,
  resolveRunOptions,
} from '../src/config.js';
import { parseArgs } from '../src/args.js';

describe('expandEnvVars', () => {
  const env = { GAUGE_DIR: '/data/gauges', EMPTY: '' };

  it('replaces variables in nested strings', () => {
    expect(
      expandEnvVars(
        { linkTable: { filePath: '${GAUGE_DIR}/links.csv' }, list: ['${GAUGE_DIR}'], n: 3 },
        { env }
      )
    ).toEqual({ linkTable: { filePath: '/data/gauges/links.csv' }, list: ['/data/gauges'], n: 3 });
  });

  it('uses the default for missing or empty variables', () => {
    expect(expandEnvVars('${MISSING:-links.csv}', { env })).toBe('links.csv');
    expect(expandEnvVars('${EMPTY:-fallback}', { env })).toBe('fallback');
  });

  it('fails on a missing variable without default unless allowed', () => {
    expect(() => expandEnvVars('${MISSING}', { env })).toThrow(
      new ConfigError('Missing required environment variable: MISSING')
    );
    expect(expandEnvVars('${MISSING}', { env, allowMissing: true })).toBe('${MISSING}');
  });
});

describe('parseConfig', () => {
  it('fills in the default file names', () => {
    expect(parseConfig({})).toEqual({
      linkTable: { filePath: 'links.csv' },
      features: { filePath: 'source.geojson' },
      output: {
        featuresPath: 'River Gauges.geojson',
        reportPath: 'replace.log',
        summaryPath: 'replace.xlsx',
      },
      matching: { minFuzzyScore: 0.4 },
      logging: {},
    });
  });

  it('lists every invalid field', () => {
    expect(() =>
      parseConfig({ matching: { minFuzzyScore: 2 }, linkTable: { type: 'tsv' }, extra: true })
    ).toThrow(ConfigError);

    try {
      parseConfig({ matching: { minFuzzyScore: 2 }, extra: true });
      expect.unreachable();
    } catch (error) {
      const message = error instanceof Error ? error.message : '';
      expect(message.split('\n')[0]).toBe('Invalid gaugelink.json:');
      expect(message).toContain('- matching.minFuzzyScore: ');
      expect(message).toContain("- (root): Unrecognized key(s) in object: 'extra'");
    }
  });
});

describe('loadConfig', () => {
  it('reads a config file with a BOM and expands variables', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'gaugelink-config-'));
    try {
      process.env.GAUGELINK_TEST_LINKS = 'links-2026.csv';
      writeFileSync(
        join(dir, 'gaugelink.json'),
        '\uFEFF' +
          JSON.stringify({
            linkTable: { filePath: '${GAUGELINK_TEST_LINKS}' },
            output: { summaryCsvPath: 'summary.csv' },
          }),
        'utf-8'
      );

      const config = await loadConfig('gaugelink.json', dir);

      expect(config.linkTable.filePath).toBe('links-2026.csv');
      expect(config.output.summaryCsvPath).toBe('summary.csv');
    } finally {
      delete process.env.GAUGELINK_TEST_LINKS;
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('reports unreadable and invalid files as configuration errors', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'gaugelink-config-'));
    try {
      writeFileSync(join(dir, 'broken.json'), '{ "linkTable": ', 'utf-8');

      await expect(loadConfig('missing.json', dir)).rejects.toBeInstanceOf(ConfigError);
      await expect(loadConfig('broken.json', dir)).rejects.toThrow(
        `Invalid JSON in ${join(dir, 'broken.json')}`
      );
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('resolveRunOptions', () => {
  it('resolves paths against the working directory and applies overrides', () => {
    const cwd = resolve('/work');
    const options = resolveRunOptions(
      parseConfig({ output: { summaryCsvPath: 'out/summary.csv' } }),
      { links: 'tables/links.xlsx', out: 'out/gauges.geojson', minScore: 0.5 },
      cwd
    );

    expect(options).toEqual({
      linkTable: { type: 'excel', filePath: join(cwd, 'tables/links.xlsx') },
      features: { filePath: join(cwd, 'source.geojson') },
      output: {
        featuresPath: join(cwd, 'out/gauges.geojson'),
        reportPath: join(cwd, 'replace.log'),
        summaryPath: join(cwd, 'replace.xlsx'),
        summaryCsvPath: join(cwd, 'out/summary.csv'),
      },
      minFuzzyScore: 0.5,
    });
  });

  it('keeps an explicit link table type', () => {
    const options = resolveRunOptions(
      parseConfig({ linkTable: { type: 'csv', filePath: 'links.xlsx' } }),
      {},
      resolve('/work')
    );

    expect(options.linkTable.type).toBe('csv');
  });

  it('refuses to overwrite an input file', () => {
    expect(() =>
      resolveRunOptions(parseConfig({}), { out: 'source.geojson' }, resolve('/work'))
    ).toThrow(`Output path must not overwrite an input file: ${join(resolve('/work'), 'source.geojson')}`);
  });
});

describe('inferLinkTableType', () => {
  it('treats .xlsx and .xlsm as Excel and anything else as CSV', () => {
    expect(inferLinkTableType('links.XLSX')).toBe('excel');
    expect(inferLinkTableType('links.xlsm')).toBe('excel');
    expect(inferLinkTableType('links.csv')).toBe('csv');
    expect(inferLinkTableType('links')).toBe('csv');
  });
});

describe('parseArgs', () => {
  it('reads every flag', () => {
    expect(
      parseArgs([
        '--config',
        'gaugelink.json',
        '--links',
        'links.csv',
        '--features',
        'source.geojson',
        '--out',
        'River Gauges.geojson',
        '--min-score',
        '0.55',
      ])
    ).toEqual({
      help: false,
      configPath: 'gaugelink.json',
      links: 'links.csv',
      features: 'source.geojson',
      out: 'River Gauges.geojson',
      minScore: 0.55,
    });
  });

  it('recognises --help', () => {
    expect(parseArgs(['-h'])).toEqual({ help: true });
  });

  it('rejects unknown flags, missing values and bad scores', () => {
    expect(() => parseArgs(['--verbose'])).toThrow('Unknown argument: --verbose');
    expect(() => parseArgs(['--links'])).toThrow('Missing value for --links');
    expect(() => parseArgs(['--links', '--out', 'x'])).toThrow('Missing value for --links');
    expect(() => parseArgs(['--min-score', '1.5'])).toThrow(
      '--min-score must be a number between 0 and 1, got "1.5"'
    );
  });
});
