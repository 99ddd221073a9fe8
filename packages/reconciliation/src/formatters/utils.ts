/**
 * Formatter Utilities
 *
 * Shared utility functions for report formatting.
 */

export const RULE = '='.repeat(80);
export const SECTION_RULE = '-'.repeat(40);

/**
 * Format a feature id for display
 */
export function formatId(id: string | null): string {
  return id ?? '(none)';
}

/**
 * Order strings by UTF-16 code units, ignoring case
 */
export function compareIgnoreCase(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}
