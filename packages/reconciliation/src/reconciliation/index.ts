export {
  ReconciliationEngine,
  reconcile,
  normalizeFeatureId,
  normalizeFeatureName,
} from './reconciliation-engine.js';
export {
  DEFAULT_MIN_SCORE,
  exactIdStrategy,
  partialIdStrategy,
  fuzzyNameStrategy,
  matchStrategies,
} from './strategies.js';
