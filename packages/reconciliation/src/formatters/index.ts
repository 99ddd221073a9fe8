/**
 * Formatters for reconciliation results
 */

export { formatMatchReport } from './match-report.js';
export type { MatchReportOptions } from './match-report.js';

export {
  SUMMARY_COLUMNS,
  SUMMARY_COLUMN_WIDTHS,
  SUMMARY_FILLS,
  buildSummaryRows,
  summaryRowFill,
} from './summary-table.js';
export type { SummaryMatched, SummaryRow } from './summary-table.js';
