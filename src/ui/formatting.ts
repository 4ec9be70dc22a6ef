/**
 * Text formatting helpers for human-readable output.
 */

/**
 * Join lines with newlines, skipping undefined, null and false entries.
 *
 * Empty strings are kept so callers can insert blank lines.
 *
 * @param lines - Lines, possibly conditional (`cond && 'text'`)
 * @returns Joined text
 *
 * @example
 * ```typescript
 * joinLines('Result: 1365x768', unchanged && 'Original size already fits');
 * ```
 */
export function joinLines(...lines: (string | undefined | null | false)[]): string {
  return lines.filter((line): line is string => typeof line === 'string').join('\n');
}

/**
 * Format an integer with thousands separators (1048576 -> '1,048,576').
 */
export function formatCount(value: number): string {
  return value.toString().replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

/**
 * Format an aspect ratio with four decimals.
 */
export function formatRatio(ratio: number): string {
  return ratio.toFixed(4);
}
