/**
 * Human-readable output for the compute command.
 */

import type { ComputeResult } from '@/commands/types.js';
import { formatCount, formatRatio, joinLines } from '@/ui/formatting.js';

/**
 * Format a compute result.
 *
 * The first line is the bare WIDTHxHEIGHT so it can be piped into other tools.
 *
 * @example
 * ```
 * 1365x768
 *   Pixels:       1,048,320 / 1,048,576
 *   Original:     1920x1080 (2,073,600 pixels)
 *   Aspect ratio: 1.7778 -> 1.7773
 *   Cache key:    1920_1080_1048576
 * ```
 */
export function formatComputeResult(result: ComputeResult): string {
  const { original } = result;
  return joinLines(
    `${result.width_max}x${result.height_max}`,
    `  Pixels:       ${formatCount(result.pixels)} / ${formatCount(result.budget)}`,
    `  Original:     ${original.width}x${original.height} (${formatCount(original.width * original.height)} pixels)`,
    `  Aspect ratio: ${formatRatio(result.aspectRatio.original)} -> ${formatRatio(result.aspectRatio.result)}`,
    `  Cache key:    ${result.cacheKey}`,
    result.unchanged && '  Original size already fits the budget'
  );
}
