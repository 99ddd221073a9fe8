/**
 * @gaugelink/entity-resolution
 *
 * Similarity scoring used to pair station names from independent sources.
 */

export * from './similarity/index.js';
export * from './types/index.js';
