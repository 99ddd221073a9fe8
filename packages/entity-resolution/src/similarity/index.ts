export { levenshtein, similarityScore, roundScore } from './string-similarity.js';
