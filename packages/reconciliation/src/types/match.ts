/**
 * Match Types
 *
 * Types for the three-tier matching of features against link table rows.
 */

import type { SimilarityScorer } from '@gaugelink/entity-resolution';
import type { FeatureCollection } from './feature.js';
import type { LinkRow, LinkTableIndex } from './link-table.js';

/** Tiers in the order they are applied */
export type MatchTier = 'exact-id' | 'partial-id' | 'fuzzy-name';

/** Final outcome for a feature that was considered for matching */
export type MatchOutcome = MatchTier | 'unmatched';

/**
 * What the strategies see of a feature
 */
export interface MatchCandidate {
  /** Position of the feature in the collection */
  featureIndex: number;
  /** Trimmed id, or null when the feature has none */
  featureId: string | null;
  /** Name as text, '' when the feature has none */
  featureName: string;
}

/**
 * Shared state handed to every strategy call
 */
export interface MatchContext {
  readonly index: LinkTableIndex;
  /** Rows already linked to a feature; a strategy must never return one */
  readonly usedRows: ReadonlySet<number>;
  /** Lowest fuzzy score that is accepted */
  readonly minScore: number;
  readonly scorer: SimilarityScorer;
}

export interface StrategyMatch {
  rowIndex: number;
  /** Similarity score, for tiers that compute one */
  score?: number;
}

/**
 * One matching tier. The engine runs each strategy over every still
 * unmatched feature before moving on to the next one.
 */
export interface MatchStrategy {
  readonly tier: MatchTier;
  match(candidate: MatchCandidate, context: MatchContext): StrategyMatch | null;
}

/**
 * A feature linked to a row
 */
export interface MatchedFeature extends MatchCandidate {
  tier: MatchTier;
  rowIndex: number;
  row: LinkRow;
  score?: number;
}

/**
 * A feature that no tier could link
 */
export interface UnmatchedFeature extends MatchCandidate {
  tier: 'unmatched';
}

export type MatchRecord = MatchedFeature | UnmatchedFeature;

/** Why a feature was not considered for matching */
export type SkipReason = 'no-properties';

export interface SkippedFeature {
  featureIndex: number;
  reason: SkipReason;
}

/**
 * Non-fatal notice about a feature missing an expected property. The feature
 * is still matched with what it has.
 */
export interface MissingPropertyWarning {
  kind: 'missing-id' | 'missing-name';
  featureIndex: number;
  featureId: string | null;
  featureName: string;
}

/**
 * Options for a reconciliation run
 */
export interface ReconcileOptions {
  /** Lowest fuzzy score accepted, 0-1 (default: 0.4) */
  minScore?: number;
  /** Tiers to run, in order (default: exact id, partial id, fuzzy name) */
  strategies?: readonly MatchStrategy[];
  /** Name similarity used by the fuzzy tier (default: similarityScore) */
  scorer?: SimilarityScorer;
}

export interface ReconciliationSummary {
  featureCount: number;
  rowCount: number;
  exactIdCount: number;
  partialIdCount: number;
  fuzzyNameCount: number;
  unmatchedCount: number;
  skippedCount: number;
  warningCount: number;
  duplicateIdCount: number;
  usedRowCount: number;
}

/**
 * Output of a reconciliation run
 */
export interface ReconciliationResult {
  /** Copy of the input collection with `properties.source` set on matched features */
  collection: FeatureCollection;
  /** Matches in the order they were made, then unmatched features in collection order */
  records: MatchRecord[];
  usedRows: ReadonlySet<number>;
  skipped: SkippedFeature[];
  warnings: MissingPropertyWarning[];
  /** Link table ids that appear on more than one row */
  duplicateIds: string[];
  minScore: number;
  summary: ReconciliationSummary;
}
