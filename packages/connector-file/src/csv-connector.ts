/**
 * CSV Connector
 * Reads and writes CSV files with a header row, keeping every value as trimmed text
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import type { Record } from '@gaugelink/core';
import { ConnectorError, extractFieldNames } from '@gaugelink/core';
import {
  BaseFileConnector,
  type FileConnectorConfig,
  type ParsedContent,
} from './base-file-connector.js';

export interface CsvConnectorConfig extends FileConnectorConfig {
  type: 'csv';
  /** CSV delimiter (default: ',') */
  delimiter?: string;
  /** Column order used on write (default: field names in first-seen order) */
  columns?: string[];
}

const FORBIDDEN_RECORD_KEYS = new Set(['__proto__', 'prototype', 'constructor']);
const FORMULA_ESCAPE = "'";

/**
 * Prefix strings that a spreadsheet would run as a formula (=, +, - or @
 * after optional whitespace)
 */
function escapeFormula(value: unknown): unknown {
  if (typeof value !== 'string' || value.startsWith(FORMULA_ESCAPE)) return value;
  return /^[\t\r\n ]*[=+\-@]/.test(value) ? `${FORMULA_ESCAPE}${value}` : value;
}

export class CsvConnector extends BaseFileConnector<CsvConnectorConfig> {
  constructor(config: Omit<CsvConnectorConfig, 'type'> & { type?: 'csv' }) {
    super({ ...config, type: 'csv' });
  }

  protected async parseContent(content: string | Buffer): Promise<ParsedContent> {
    const options = {
      columns: false, // Parse rows first so we can safely map headers ourselves
      bom: true,
      delimiter: this.config.delimiter ?? ',',
      skip_empty_lines: true,
      relax_column_count: false, // Every row must have as many fields as the first
      trim: true,
    };

    let rows: unknown[][];
    try {
      rows = parse(content, options) as unknown[][];
    } catch (error) {
      throw new ConnectorError({
        code: 'PARSE_FAILED',
        message: `Invalid CSV: ${error instanceof Error ? error.message : String(error)}`,
        connectorId: this.config.id,
        filePath: this.config.filePath,
        suggestion: 'Check that every row has the same number of fields as the header and that quotes are balanced.',
        cause: error instanceof Error ? error : undefined,
      });
    }

    const [firstRow] = rows;
    if (!firstRow) return { records: [], columns: [] };

    const headers = firstRow.map((h) => String(h ?? ''));

    for (const header of headers) {
      if (FORBIDDEN_RECORD_KEYS.has(header)) {
        throw new ConnectorError({
          code: 'SCHEMA_MISMATCH',
          message: `Unsafe CSV header name: ${header}`,
          connectorId: this.config.id,
          filePath: this.config.filePath,
          suggestion: 'Rename the column to a safe field name and try again.',
        });
      }
    }

    const records = rows.slice(1).map((row) => {
      const record: Record = Object.create(null);
      headers.forEach((key, i) => {
        record[key] = row[i];
      });
      return record;
    });

    return { records, columns: headers };
  }

  protected async serializeContent(records: Record[]): Promise<string> {
    const columns = this.config.columns ?? extractFieldNames(records);
    if (columns.length === 0) {
      return '';
    }

    const escaped = records.map((record) => {
      const row: Record = Object.create(null);
      for (const key of Object.keys(record)) {
        row[key] = escapeFormula(record[key]);
      }
      return row;
    });

    return stringify(escaped, {
      header: true,
      columns,
      delimiter: this.config.delimiter ?? ',',
    });
  }
}

/**
 * Factory function to create a CSV connector
 */
export function createCsvConnector(
  config: Omit<CsvConnectorConfig, 'type'>
): CsvConnector {
  return new CsvConnector(config);
}
