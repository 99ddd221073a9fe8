/**
 * Summary Table
 *
 * One row per considered feature for the summary workbook. Only id matches
 * count as confirmed; fuzzy matches are listed with their candidate row but
 * marked 'No' for manual review.
 */

import type { MatchOutcome, MatchRecord } from '../types/index.js';
import { compareIgnoreCase } from './utils.js';

export type SummaryMatched = 'Yes' | 'No';

export type SummaryRow = {
  SourceName: string;
  MatchedName: string;
  Matched: SummaryMatched;
  /** Outcome behind the row; not written as a column */
  tier: MatchOutcome;
};

/** Columns written to the summary, in order */
export const SUMMARY_COLUMNS = ['SourceName', 'MatchedName', 'Matched'];

export const SUMMARY_COLUMN_WIDTHS = [50, 50, 10];

/** ARGB fills: green for id matches, amber for fuzzy matches awaiting review */
export const SUMMARY_FILLS: Readonly<Partial<Record<MatchOutcome, string>>> = {
  'exact-id': 'FF90EE90',
  'partial-id': 'FF90EE90',
  'fuzzy-name': 'FFFFD966',
};

/**
 * Build the summary rows: confirmed rows first, then the rest, each block
 * ordered by source name ignoring case.
 */
export function buildSummaryRows(records: readonly MatchRecord[]): SummaryRow[] {
  const rows = records.map((record): SummaryRow => {
    const confirmed = record.tier === 'exact-id' || record.tier === 'partial-id';
    return {
      SourceName: record.featureName,
      MatchedName: record.tier === 'unmatched' ? '' : record.row.name,
      Matched: confirmed ? 'Yes' : 'No',
      tier: record.tier,
    };
  });

  const rank = (row: SummaryRow): number => (row.Matched === 'Yes' ? 0 : 1);

  return rows.sort(
    (a, b) => rank(a) - rank(b) || compareIgnoreCase(a.SourceName, b.SourceName)
  );
}

function isMatchOutcome(value: unknown): value is MatchOutcome {
  return (
    value === 'exact-id' ||
    value === 'partial-id' ||
    value === 'fuzzy-name' ||
    value === 'unmatched'
  );
}

/**
 * Fill for a written summary row, read from its `tier`
 */
export function summaryRowFill(row: { [key: string]: unknown }): string | undefined {
  return isMatchOutcome(row.tier) ? SUMMARY_FILLS[row.tier] : undefined;
}
