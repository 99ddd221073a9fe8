/**
 * Interface exports for reconciliation
 */

export type { IReconciliationEngine } from './reconciliation-engine.js';
