/**
 * Utility functions for working with records
 */

import type { Record } from '../types/index.js';

/**
 * Extract all unique field names from an array of records, in first-seen order
 */
export function extractFieldNames(records: Record[]): string[] {
  const fields = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      fields.add(key);
    }
  }
  return Array.from(fields);
}

/**
 * Whether a value is a JSON-style object (not null, not an array)
 */
export function isPlainRecord(value: unknown): value is Record {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
