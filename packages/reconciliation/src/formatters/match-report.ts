/**
 * Match Report Formatter
 *
 * Plain-text report listing every considered feature under the tier that
 * matched it, followed by the unmatched features and any warnings.
 */

import type {
  MatchedFeature,
  MatchRecord,
  MatchTier,
  ReconciliationResult,
  SkipReason,
  UnmatchedFeature,
} from '../types/index.js';
import { RULE, SECTION_RULE, formatId } from './utils.js';

export interface MatchReportOptions {
  /** Timestamp printed in the header (default: now) */
  generatedAt?: Date;
  /** Link table file, printed in the header */
  linkTableSource?: string;
  /** Feature collection file, printed in the header */
  featureSource?: string;
}

const SKIP_REASONS: Record<SkipReason, string> = {
  'no-properties': 'no properties',
};

function matchedIn(records: readonly MatchRecord[], tier: MatchTier): MatchedFeature[] {
  return records.filter((record): record is MatchedFeature => record.tier === tier);
}

function pushSection(
  lines: string[],
  title: string,
  entries: string[][],
  totalLabel: string
): void {
  lines.push(title);
  lines.push(SECTION_RULE);
  entries.forEach((entry, i) => {
    if (i > 0 && entry.length > 1) lines.push('');
    lines.push(...entry);
  });
  lines.push('');
  lines.push(`${totalLabel}: ${entries.length}`);
  lines.push('');
}

function pairEntry(record: MatchedFeature, withScore: boolean): string[] {
  const entry = [
    `  Feature    -> Name: ${record.featureName}, ID: ${formatId(record.featureId)}`,
    `  Link table -> Name: ${record.row.name}, ID: ${record.row.id}`,
  ];
  if (withScore && record.score !== undefined) {
    entry.push(`  Score: ${record.score}`);
  }
  return entry;
}

/**
 * Format a reconciliation result as a plain-text match report
 */
export function formatMatchReport(
  result: ReconciliationResult,
  options: MatchReportOptions = {}
): string {
  const { summary, records } = result;
  const generatedAt = options.generatedAt ?? new Date();
  const lines: string[] = [];

  // Header
  lines.push('Match Report');
  lines.push(`Generated: ${generatedAt.toISOString()}`);
  if (options.linkTableSource) {
    lines.push(`Link table: ${options.linkTableSource}`);
  }
  lines.push(`Link table rows: ${summary.rowCount}`);
  if (options.featureSource) {
    lines.push(`Features: ${options.featureSource}`);
  }
  lines.push(`Features considered: ${summary.featureCount - summary.skippedCount} of ${summary.featureCount}`);
  lines.push(RULE);
  lines.push('');

  pushSection(
    lines,
    '(1) FOUND BY ID',
    matchedIn(records, 'exact-id').map((record) => [
      `  Name: ${record.featureName}, ID: ${formatId(record.featureId)}`,
    ]),
    'Total found by ID'
  );

  pushSection(
    lines,
    '(2) FOUND BY ID (partial: link table id contained in feature id)',
    matchedIn(records, 'partial-id').map((record) => pairEntry(record, false)),
    'Total found by partial ID'
  );

  pushSection(
    lines,
    `(3) FOUND BY NAME (fuzzy match, score >= ${result.minScore})`,
    matchedIn(records, 'fuzzy-name').map((record) => pairEntry(record, true)),
    'Total found by name'
  );

  pushSection(
    lines,
    '(4) NOT FOUND',
    records
      .filter((record): record is UnmatchedFeature => record.tier === 'unmatched')
      .map((record) => [`  Name: ${record.featureName}, ID: ${formatId(record.featureId)}`]),
    'Total not found'
  );

  const warnings: string[][] = [
    ...result.warnings.map((warning) =>
      warning.kind === 'missing-id'
        ? [`  Feature #${warning.featureIndex} has no id (Name: ${warning.featureName})`]
        : [`  Feature #${warning.featureIndex} has no name (ID: ${formatId(warning.featureId)})`]
    ),
    ...result.skipped.map((skip) => [
      `  Feature #${skip.featureIndex} skipped: ${SKIP_REASONS[skip.reason]}`,
    ]),
    ...result.duplicateIds.map((id) => [
      `  Link table id ${id} appears on more than one row; only the first is matched by exact id`,
    ]),
  ];

  pushSection(lines, '(5) WARNINGS', warnings, 'Total warnings');

  return lines.join('\n');
}
