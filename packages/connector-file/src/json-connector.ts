/**
 * JSON Connector
 * Reads and writes JSON documents whose records are an array at the root or
 * at a dotted path (e.g. the `features` of a GeoJSON FeatureCollection)
 */

import type { Record } from '@gaugelink/core';
import { ConnectorError, extractFieldNames, isPlainRecord } from '@gaugelink/core';
import {
  BaseFileConnector,
  type FileConnectorConfig,
  type ParsedContent,
} from './base-file-connector.js';

export interface JsonConnectorConfig extends FileConnectorConfig {
  type: 'json';
  /** JSON path to the records array (e.g., 'features') */
  recordsPath?: string;
}

const FORBIDDEN_PATH_SEGMENTS = new Set(['__proto__', 'prototype', 'constructor']);

function parseSafePath(path: string, connectorId: string): string[] {
  const parts = path.split('.');
  if (parts.some((p) => p.length === 0)) {
    throw new ConnectorError({
      code: 'CONFIGURATION_ERROR',
      message: `Invalid recordsPath: "${path}"`,
      connectorId,
      suggestion: 'Use dot notation with non-empty segments (e.g., "data.items").',
    });
  }

  for (const part of parts) {
    if (FORBIDDEN_PATH_SEGMENTS.has(part)) {
      throw new ConnectorError({
        code: 'CONFIGURATION_ERROR',
        message: `Unsafe recordsPath segment: "${part}"`,
        connectorId,
        suggestion:
          'Avoid __proto__/prototype/constructor in recordsPath to prevent prototype pollution.',
      });
    }
  }

  return parts;
}

/**
 * Get nested value from object using dot notation path
 */
function getNestedValue(obj: unknown, parts: string[]): unknown {
  let current = obj;

  for (const part of parts) {
    if (!isPlainRecord(current)) {
      return undefined;
    }

    if (!Object.prototype.hasOwnProperty.call(current, part)) {
      return undefined;
    }

    current = current[part];
  }

  return current;
}

/**
 * Copy of `obj` with the value at `parts` replaced. Objects along the path are
 * shallow-copied so key order is kept and the source is not modified.
 */
function withNestedValue(obj: Record, parts: string[], value: unknown): Record {
  const [head, ...rest] = parts;
  if (head === undefined) return obj;

  const output: Record = { ...obj };
  if (rest.length === 0) {
    output[head] = value;
    return output;
  }

  const next = Object.prototype.hasOwnProperty.call(obj, head) ? obj[head] : undefined;
  output[head] = withNestedValue(isPlainRecord(next) ? next : {}, rest, value);
  return output;
}

export class JsonConnector extends BaseFileConnector<JsonConnectorConfig> {
  private _document: unknown = null;

  constructor(config: Omit<JsonConnectorConfig, 'type'> & { type?: 'json' }) {
    super({ ...config, type: 'json' });
  }

  /**
   * The whole parsed document, as loaded by connect()
   */
  get document(): unknown {
    this.ensureConnected();
    return this._document;
  }

  protected async parseContent(content: string | Buffer): Promise<ParsedContent> {
    let parsed: unknown;
    try {
      // Strip a UTF-8 BOM (common on Windows) before parsing
      parsed = JSON.parse(content.toString().replace(/^\uFEFF/, ''));
    } catch (error) {
      throw new ConnectorError({
        code: 'PARSE_FAILED',
        message: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        connectorId: this.config.id,
        filePath: this.config.filePath,
        cause: error instanceof Error ? error : undefined,
      });
    }

    this._document = parsed;

    const records = this.config.recordsPath
      ? getNestedValue(parsed, parseSafePath(this.config.recordsPath, this.config.id))
      : parsed;

    if (!Array.isArray(records)) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: this.config.recordsPath
          ? `Path '${this.config.recordsPath}' does not contain an array`
          : 'JSON file does not contain an array at root level',
        connectorId: this.config.id,
        filePath: this.config.filePath,
        suggestion: this.config.recordsPath
          ? 'Check that recordsPath points to an array of objects.'
          : 'Either provide a JSON file with an array at root, or specify recordsPath.',
      });
    }

    const invalidIndex = records.findIndex((item) => !isPlainRecord(item));
    if (invalidIndex !== -1) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: `Record ${invalidIndex} is not an object`,
        connectorId: this.config.id,
        filePath: this.config.filePath,
        suggestion: 'Every entry of the records array must be a JSON object.',
      });
    }

    const objects = records.filter(isPlainRecord);
    return { records: objects, columns: extractFieldNames(objects) };
  }

  protected async serializeContent(records: Record[]): Promise<string> {
    const indent = 2;

    // If we have a recordsPath, preserve the original structure
    if (this.config.recordsPath && isPlainRecord(this._document)) {
      const parts = parseSafePath(this.config.recordsPath, this.config.id);
      return JSON.stringify(withNestedValue(this._document, parts, records), null, indent);
    }

    // Default: write array directly
    return JSON.stringify(records, null, indent);
  }
}

/**
 * Factory function to create a JSON connector
 */
export function createJsonConnector(
  config: Omit<JsonConnectorConfig, 'type'>
): JsonConnector {
  return new JsonConnector(config);
}
