/**
 * Matching Strategies
 *
 * The three tiers, in the order the engine applies them. Every tier skips
 * rows that are already linked and never links a row twice.
 */

import type {
  MatchCandidate,
  MatchContext,
  MatchStrategy,
  StrategyMatch,
} from '../types/index.js';

/** Default lowest accepted fuzzy score */
export const DEFAULT_MIN_SCORE = 0.4;

/**
 * Tier 1: the feature id equals a row id. Only the first row carrying an id
 * is considered; if that row is already used, this tier finds nothing.
 */
export const exactIdStrategy: MatchStrategy = {
  tier: 'exact-id',
  match(candidate: MatchCandidate, { index, usedRows }: MatchContext): StrategyMatch | null {
    if (candidate.featureId === null) return null;

    const rowIndex = index.idToFirstIndex.get(candidate.featureId);
    if (rowIndex === undefined || usedRows.has(rowIndex)) return null;

    return { rowIndex };
  },
};

/**
 * Tier 2: a row id is a substring of the feature id. The first unused row in
 * file order wins. Rows with an empty id are never considered, although the
 * empty string is contained in every feature id: such a row carries no id to
 * match on and is left to the name tier.
 */
export const partialIdStrategy: MatchStrategy = {
  tier: 'partial-id',
  match(candidate: MatchCandidate, { index, usedRows }: MatchContext): StrategyMatch | null {
    const { featureId } = candidate;
    if (featureId === null) return null;

    const rowIndex = index.rows.findIndex(
      (row, i) => !usedRows.has(i) && row.id !== '' && featureId.includes(row.id)
    );

    return rowIndex === -1 ? null : { rowIndex };
  },
};

/**
 * Tier 3: the unused row whose name scores highest against the feature name.
 * Ties go to the earliest row. Accepted only when the score reaches
 * `minScore`. A feature without a name is never matched here.
 */
export const fuzzyNameStrategy: MatchStrategy = {
  tier: 'fuzzy-name',
  match(
    candidate: MatchCandidate,
    { index, usedRows, minScore, scorer }: MatchContext
  ): StrategyMatch | null {
    if (candidate.featureName === '') return null;

    let best: StrategyMatch | null = null;
    let bestScore = 0;

    for (const [rowIndex, row] of index.rows.entries()) {
      if (usedRows.has(rowIndex)) continue;

      const score = scorer(candidate.featureName, row.name);
      if (score > bestScore) {
        bestScore = score;
        best = { rowIndex, score };
      }
    }

    return best !== null && bestScore >= minScore ? best : null;
  },
};

/** Tiers in application order */
export const matchStrategies: readonly MatchStrategy[] = [
  exactIdStrategy,
  partialIdStrategy,
  fuzzyNameStrategy,
];
