/**
 * String Similarity Functions
 *
 * Edit-distance based similarity for station names.
 * Uses fastest-levenshtein for the distance itself.
 */

import { distance as levenshteinDistance } from 'fastest-levenshtein';
import type { SimilarityResult } from '../types/similarity.js';

const SCORE_DECIMALS = 4;
const SURROGATE = /[\uD800-\uDFFF]/;

/**
 * Round a score to a fixed number of decimals (default: 4).
 *
 * Rounds the exact binary value of `value`. A value that lies exactly halfway
 * between two candidates (e.g. 29/32 = 0.90625) rounds to the even one.
 */
export function roundScore(value: number, decimals = SCORE_DECIMALS): number {
  // Halfway values that a double can hold exactly are odd multiples of 2^-(decimals + 1)
  const halves = value * 2 ** (decimals + 1);
  if (Number.isInteger(halves) && halves % 2 !== 0) {
    const factor = 10 ** decimals;
    const lower = Math.floor(value * factor);
    return (lower % 2 === 0 ? lower : lower + 1) / factor;
  }
  return Number(value.toFixed(decimals));
}

/**
 * Both strings with one UTF-16 unit per code point, so that the distance and
 * lengths count characters outside the Basic Multilingual Plane once.
 */
function toSingleUnits(a: string, b: string): [string, string] {
  if (!SURROGATE.test(a) && !SURROGATE.test(b)) {
    return [a, b];
  }

  const units = new Map<string, string>();
  const encode = (text: string): string =>
    Array.from(text, (char) => {
      let unit = units.get(char);
      if (unit === undefined) {
        unit = String.fromCharCode(units.size);
        units.set(char, unit);
      }
      return unit;
    }).join('');

  return [encode(a), encode(b)];
}

/**
 * Calculate normalized Levenshtein similarity
 *
 * Case-sensitive and unrounded. Lengths and edits count code points.
 *
 * @param a First string
 * @param b Second string
 * @returns Similarity score 0-1 (1 = identical)
 */
export function levenshtein(a: string, b: string): SimilarityResult {
  if (a === b) {
    return { score: 1, algorithm: 'levenshtein' };
  }

  if (a.length === 0 || b.length === 0) {
    return { score: 0, algorithm: 'levenshtein' };
  }

  const [left, right] = toSingleUnits(a, b);
  const dist = levenshteinDistance(left, right);
  const maxLen = Math.max(left.length, right.length);
  const score = 1 - dist / maxLen;

  return {
    score,
    algorithm: 'levenshtein',
    details: `Distance: ${dist}, Max length: ${maxLen}`,
  };
}

/**
 * Name similarity used by the fuzzy matching tier.
 *
 * Identical strings score 1 and an empty string against a non-empty one
 * scores 0. Otherwise both strings are lowercased and scored as
 * `1 - distance / max(length)`, rounded to 4 decimals.
 *
 * @example
 * similarityScore('Avoca', 'AVOCA'); // 1
 * similarityScore('kitten', 'sitting'); // 0.5714
 */
export function similarityScore(a: string, b: string): number {
  if (a === b) {
    return 1;
  }

  if (a.length === 0 || b.length === 0) {
    return 0;
  }

  return roundScore(levenshtein(a.toLowerCase(), b.toLowerCase()).score);
}
