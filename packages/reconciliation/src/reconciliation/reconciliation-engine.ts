/**
 * Reconciliation Engine
 *
 * Links every feature of a collection to at most one link table row and
 * writes the row's link onto the feature as `properties.source`.
 */

import { similarityScore } from '@gaugelink/entity-resolution';
import type { IReconciliationEngine } from '../interfaces/index.js';
import type {
  FeatureCollection,
  FeatureProperties,
  LinkTableIndex,
  MatchCandidate,
  MatchContext,
  MatchRecord,
  MatchStrategy,
  MissingPropertyWarning,
  ReconcileOptions,
  ReconciliationResult,
  ReconciliationSummary,
  SkippedFeature,
} from '../types/index.js';
import { ReconcileError } from '../errors/index.js';
import { DEFAULT_MIN_SCORE, matchStrategies } from './strategies.js';

interface PendingFeature {
  candidate: MatchCandidate;
  properties: FeatureProperties;
}

/**
 * Property value as text: scalars via String(), objects as JSON.
 *
 * Numbers print in their shortest form, so an id written as `101.0` in the
 * file reads as "101" (JSON.parse keeps no trailing zeros). Booleans read as
 * "true" / "false".
 */
function propertyText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Trimmed feature id, or null when missing or blank
 */
export function normalizeFeatureId(value: unknown): string | null {
  const text = propertyText(value).trim();
  return text === '' ? null : text;
}

/**
 * Feature name as text; missing, null, false and 0 read as ''
 */
export function normalizeFeatureName(value: unknown): string {
  return value ? propertyText(value) : '';
}

function validateOptions(minScore: number, strategies: readonly MatchStrategy[]): void {
  if (!Number.isFinite(minScore) || minScore < 0 || minScore > 1) {
    throw new ReconcileError({
      code: 'INVALID_OPTIONS',
      message: `minScore must be between 0 and 1, got ${minScore}`,
      suggestion: 'Use a fuzzy score threshold such as 0.4.',
      context: { minScore },
    });
  }

  if (strategies.length === 0) {
    throw new ReconcileError({
      code: 'INVALID_OPTIONS',
      message: 'At least one matching strategy is required',
      suggestion: 'Omit strategies to use the default tiers.',
    });
  }
}

/**
 * Run every strategy, in order, over the features it has not yet matched.
 *
 * The input collection is not modified; the result carries an annotated copy.
 * Features whose `properties` is null or absent are skipped and left unchanged.
 *
 * @throws ReconcileError for invalid options, or when a strategy returns a row
 *   that is already used or does not exist
 */
export function reconcile(
  collection: FeatureCollection,
  index: LinkTableIndex,
  options: ReconcileOptions = {}
): ReconciliationResult {
  const {
    minScore = DEFAULT_MIN_SCORE,
    strategies = matchStrategies,
    scorer = similarityScore,
  } = options;

  validateOptions(minScore, strategies);

  const annotated = structuredClone(collection);
  const pending: PendingFeature[] = [];
  const skipped: SkippedFeature[] = [];
  const warnings: MissingPropertyWarning[] = [];

  annotated.features.forEach((feature, featureIndex) => {
    const { properties } = feature;
    if (!properties) {
      skipped.push({ featureIndex, reason: 'no-properties' });
      return;
    }

    const candidate: MatchCandidate = {
      featureIndex,
      featureId: normalizeFeatureId(properties.id),
      featureName: normalizeFeatureName(properties.name),
    };

    if (candidate.featureId === null) {
      warnings.push({ kind: 'missing-id', ...candidate });
    }
    if (candidate.featureName === '') {
      warnings.push({ kind: 'missing-name', ...candidate });
    }

    pending.push({ candidate, properties });
  });

  const usedRows = new Set<number>();
  const matched = new Set<number>();
  const records: MatchRecord[] = [];
  const context: MatchContext = { index, usedRows, minScore, scorer };

  for (const strategy of strategies) {
    for (const { candidate, properties } of pending) {
      if (matched.has(candidate.featureIndex)) continue;

      const match = strategy.match(candidate, context);
      if (!match) continue;

      const row = index.rows[match.rowIndex];
      if (!row || usedRows.has(match.rowIndex)) {
        throw new ReconcileError({
          code: 'RECONCILIATION_ERROR',
          message: `Strategy '${strategy.tier}' returned ${row ? 'an already used' : 'an unknown'} row ${match.rowIndex}`,
          context: { featureIndex: candidate.featureIndex, rowIndex: match.rowIndex },
        });
      }

      properties.source = row.link;
      usedRows.add(match.rowIndex);
      matched.add(candidate.featureIndex);
      records.push({
        ...candidate,
        tier: strategy.tier,
        rowIndex: match.rowIndex,
        row,
        ...(match.score !== undefined ? { score: match.score } : {}),
      });
    }
  }

  for (const { candidate } of pending) {
    if (!matched.has(candidate.featureIndex)) {
      records.push({ ...candidate, tier: 'unmatched' });
    }
  }

  const countTier = (tier: MatchRecord['tier']): number =>
    records.filter((record) => record.tier === tier).length;

  const summary: ReconciliationSummary = {
    featureCount: annotated.features.length,
    rowCount: index.rows.length,
    exactIdCount: countTier('exact-id'),
    partialIdCount: countTier('partial-id'),
    fuzzyNameCount: countTier('fuzzy-name'),
    unmatchedCount: countTier('unmatched'),
    skippedCount: skipped.length,
    warningCount: warnings.length,
    duplicateIdCount: index.duplicateIds.size,
    usedRowCount: usedRows.size,
  };

  return {
    collection: annotated,
    records,
    usedRows,
    skipped,
    warnings,
    duplicateIds: [...index.duplicateIds],
    minScore,
    summary,
  };
}

/**
 * Reconciliation Engine Implementation
 *
 * Holds the options for repeated runs.
 */
export class ReconciliationEngine implements IReconciliationEngine {
  private readonly options: ReconcileOptions;

  constructor(options: ReconcileOptions = {}) {
    validateOptions(
      options.minScore ?? DEFAULT_MIN_SCORE,
      options.strategies ?? matchStrategies
    );
    this.options = options;
  }

  reconcile(collection: FeatureCollection, index: LinkTableIndex): ReconciliationResult {
    return reconcile(collection, index, this.options);
  }
}
