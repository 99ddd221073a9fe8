/**
 * Type exports for reconciliation
 */

export type { LinkRow, LinkTableIndex } from './link-table.js';

export type { FeatureProperties, Feature, FeatureCollection } from './feature.js';

export type {
  MatchTier,
  MatchOutcome,
  MatchCandidate,
  MatchContext,
  StrategyMatch,
  MatchStrategy,
  MatchedFeature,
  UnmatchedFeature,
  MatchRecord,
  SkipReason,
  SkippedFeature,
  MissingPropertyWarning,
  ReconcileOptions,
  ReconciliationSummary,
  ReconciliationResult,
} from './match.js';
