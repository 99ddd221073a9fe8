export type { SimilarityResult, SimilarityAlgorithm, SimilarityScorer } from './similarity.js';
