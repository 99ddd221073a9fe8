/**
 * Reconciliation Engine Interface
 */

import type {
  FeatureCollection,
  LinkTableIndex,
  ReconciliationResult,
} from '../types/index.js';

/**
 * Links the features of a collection to the rows of a link table.
 */
export interface IReconciliationEngine {
  /**
   * Match every feature against the index.
   *
   * @param collection - Features to annotate; left unmodified
   * @param index - Link table rows
   * @returns Annotated copy of the collection and one record per considered feature
   */
  reconcile(collection: FeatureCollection, index: LinkTableIndex): ReconciliationResult;
}
