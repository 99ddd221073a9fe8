/**
 * Feature Collection Loading
 */

import type { IConnector } from '@gaugelink/core';
import { ConnectorError } from '@gaugelink/core';
import type { FileConnectorConfig } from '@gaugelink/connector-file';
import type { ZodError } from 'zod';
import type { FeatureCollection } from '../types/index.js';
import { MalformedInputError } from '../errors/index.js';
import { featureCollectionSchema } from '../validation/index.js';

/**
 * A connector that keeps the whole parsed document, such as the JSON connector
 */
export interface DocumentConnector extends IConnector<FileConnectorConfig> {
  readonly document: unknown;
}

const MALFORMED_CODES = new Set(['PARSE_FAILED', 'SCHEMA_MISMATCH']);

function formatIssues(error: ZodError): string {
  const lines = error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
  return [...new Set(lines)].join('; ');
}

/**
 * Validate a parsed document as a feature collection.
 *
 * The result is a copy of the input with the same members in the same order.
 *
 * @param source - File path, used in error messages
 * @throws MalformedInputError if there is no `features` array, or a feature or
 *   its `properties` is not an object
 */
export function parseFeatureCollection(value: unknown, source: string): FeatureCollection {
  const result = featureCollectionSchema.safeParse(value);

  if (!result.success) {
    throw new MalformedInputError({
      source,
      message: `Not a feature collection: ${formatIssues(result.error)}`,
      suggestion: 'Provide a GeoJSON FeatureCollection with a "features" array of objects.',
      context: { issues: result.error.issues.length },
    });
  }

  return result.data;
}

/**
 * Read and validate the feature collection through a document connector.
 *
 * @throws MalformedInputError if the file is not valid JSON or not a feature collection
 * @throws ConnectorError if the file cannot be found or read
 */
export async function loadFeatureCollection(
  connector: DocumentConnector
): Promise<FeatureCollection> {
  const source = connector.config.filePath;

  try {
    if (connector.state !== 'connected') {
      await connector.connect();
    }
  } catch (error) {
    if (error instanceof ConnectorError && MALFORMED_CODES.has(error.code)) {
      throw new MalformedInputError({
        source,
        message: error.message,
        suggestion: error.suggestion,
        cause: error,
      });
    }
    throw error;
  }

  return parseFeatureCollection(connector.document, source);
}
