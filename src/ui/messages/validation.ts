/**
 * Messages for option validation failures.
 */

/**
 * Generate invalid integer error message.
 *
 * @param option - Option name without dashes (e.g., 'width')
 * @param value - Raw value the user passed
 * @param range - Accepted bounds, if any
 * @returns Formatted error message
 *
 * @example
 * ```typescript
 * invalidIntegerError('width', 'abc', { min: 1, max: 65536 });
 * // Returns: 'Invalid --width value "abc": expected an integer between 1 and 65536'
 * ```
 */
export function invalidIntegerError(
  option: string,
  value: string,
  range: { min?: number; max?: number } = {}
): string {
  const { min, max } = range;
  let expected = 'an integer';
  if (min !== undefined && max !== undefined) expected = `an integer between ${min} and ${max}`;
  else if (min !== undefined) expected = `an integer >= ${min}`;
  else if (max !== undefined) expected = `an integer <= ${max}`;
  return `Invalid --${option} value "${value}": expected ${expected}`;
}
