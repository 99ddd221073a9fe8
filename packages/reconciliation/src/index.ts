/**
 * @gaugelink/reconciliation
 *
 * Links gauge features to link table rows by exact id, partial id and fuzzy
 * name, and formats the match report and summary rows.
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Validation
export * from './validation/index.js';

// Link table
export { LINK_TABLE_COLUMNS, buildLinkTableIndex, loadLinkTable } from './link-table/index.js';

// Feature collections
export { parseFeatureCollection, loadFeatureCollection } from './features/index.js';
export type { DocumentConnector } from './features/index.js';

// Reconciliation Module
export {
  ReconciliationEngine,
  reconcile,
  normalizeFeatureId,
  normalizeFeatureName,
  DEFAULT_MIN_SCORE,
  exactIdStrategy,
  partialIdStrategy,
  fuzzyNameStrategy,
  matchStrategies,
} from './reconciliation/index.js';

// Formatters
export * from './formatters/index.js';

// Errors
export { ReconcileError, MalformedInputError } from './errors/index.js';
export type {
  ReconcileErrorCode,
  ReconcileErrorDetails,
  MalformedInputErrorDetails,
} from './errors/index.js';

