/**
 * Error exports for reconciliation
 */

export { ReconcileError, MalformedInputError } from './reconcile-error.js';
export type {
  ReconcileErrorCode,
  ReconcileErrorDetails,
  MalformedInputErrorDetails,
} from './reconcile-error.js';
