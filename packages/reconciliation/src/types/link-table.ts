/**
 * Link Table Types
 *
 * The link table is the authoritative list of gauges: one row per gauge with
 * its display name, its identifier and the URL written onto matched features.
 */

/**
 * One data row of the link table. All three fields are trimmed text; an empty
 * cell reads as ''.
 */
export interface LinkRow {
  name: string;
  id: string;
  link: string;
}

/**
 * Read-only index over the link table rows
 */
export interface LinkTableIndex {
  /** Where the rows came from (file path), used in messages */
  readonly source: string;
  /** Rows in file order; row indices are positions in this array */
  readonly rows: readonly LinkRow[];
  /** Non-empty id -> index of the first row carrying it */
  readonly idToFirstIndex: ReadonlyMap<string, number>;
  /** Non-empty ids that appear on more than one row */
  readonly duplicateIds: ReadonlySet<string>;
}
