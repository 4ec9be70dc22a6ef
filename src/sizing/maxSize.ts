/**
 * Aspect-ratio-preserving maximum size under a pixel budget.
 *
 * Given original dimensions and a budget, finds the largest integer
 * width/height whose product fits the budget while keeping the original
 * aspect ratio as closely as integer rounding allows.
 *
 * The result is locally maximal: no single-unit increase of either dimension
 * (with the other recomputed from the ratio) stays within budget. It is not a
 * global search over every integer pair near the budget.
 */

import { invalidInputError, numericAnomalyError } from '@/sizing/errors.js';
import type { CalculateOptions, Size, SizingDiagnostic, SizingInput } from '@/sizing/types.js';
import { createLogger, isDebugEnabled } from '@/ui/logging/index.js';

/**
 * Upper bound on refinement steps.
 */
export const MAX_REFINEMENT_ITERATIONS = 100;

const DEGENERATE_SIZE: Readonly<Size> = { width: 1, height: 1 };

const log = createLogger('sizing');

function reportToLog(diagnostic: SizingDiagnostic): void {
  if (diagnostic.type !== 'error' && !isDebugEnabled()) return;

  switch (diagnostic.type) {
    case 'error':
      log.warn(`${diagnostic.error.message}, returning 1x1`);
      return;
    case 'unchanged': {
      const { width, height, numPixels } = diagnostic.input;
      log.debug(`Original size fits: ${width}x${height} <= ${numPixels} pixels`);
      return;
    }
    case 'calculated': {
      const { input, result, refinementIterations } = diagnostic;
      log.debug(
        `Calculated ${result.width}x${result.height} = ${result.width * result.height} pixels ` +
          `(limit ${input.numPixels}, ${refinementIterations} refinement steps)`
      );
      return;
    }
  }
}

function isPositiveInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0;
}

/**
 * Dimensions derived from the ratio never drop below 1, so a zero width cannot
 * make a candidate look like it fits.
 */
function atLeastOne(value: number): number {
  return Math.max(1, Math.floor(value));
}

/**
 * Check whether a size fits a pixel budget.
 *
 * @param size - Candidate dimensions
 * @param numPixels - Pixel budget
 * @returns True if width * height does not exceed the budget
 */
export function fitsBudget(size: Size, numPixels: number): boolean {
  return size.width * size.height <= numPixels;
}

/**
 * Relative deviation of the result's aspect ratio from the original one.
 *
 * @param original - Original dimensions
 * @param result - Calculated dimensions
 * @returns |result ratio - original ratio| / original ratio
 */
export function aspectRatioDeviation(original: Size, result: Size): number {
  const originalRatio = original.width / original.height;
  return Math.abs(result.width / result.height - originalRatio) / originalRatio;
}

function shrinkToBudget(start: Size, aspectRatio: number, numPixels: number): Size {
  let { width, height } = start;

  while (width * height > numPixels && (width > 1 || height > 1)) {
    if (width > height) {
      // Same stop point as shrinking one unit at a time: first width that fits,
      // or width == height
      width = Math.max(Math.floor(numPixels / height), height);
    } else {
      height -= 1;
      width = atLeastOne(aspectRatio * height);
      if (width === 1) {
        // Width stays 1 from here down, so height stops at the budget
        height = Math.min(height, numPixels);
      }
    }
  }

  return { width, height };
}

function growWithinBudget(
  start: Size,
  aspectRatio: number,
  numPixels: number
): { size: Size; iterations: number } {
  let size = start;
  let iterations = 0;

  while (iterations < MAX_REFINEMENT_ITERATIONS) {
    iterations++;

    const taller: Size = {
      width: atLeastOne(aspectRatio * (size.height + 1)),
      height: size.height + 1,
    };
    if (fitsBudget(taller, numPixels)) {
      size = taller;
      continue;
    }

    const wider: Size = {
      width: size.width + 1,
      height: atLeastOne((size.width + 1) / aspectRatio),
    };
    if (fitsBudget(wider, numPixels)) {
      size = wider;
      continue;
    }

    break;
  }

  return { size, iterations };
}

/**
 * Calculate the largest aspect-preserving integer size within a pixel budget.
 *
 * Never throws. Non-positive or non-integer inputs, and a non-finite square
 * root, yield 1x1 and an `error` diagnostic.
 *
 * @param width - Original width
 * @param height - Original height
 * @param numPixels - Maximum allowed width * height
 * @param options - Diagnostic callback (defaults to the `sizing` logger)
 * @returns Largest fitting dimensions, or the original ones if they already fit
 *
 * @example
 * ```typescript
 * calculateMaxSize(1920, 1080, 1048576); // { width: 1365, height: 768 }
 * calculateMaxSize(800, 600, 1000000);   // { width: 800, height: 600 }
 * calculateMaxSize(0, 100, 1000);        // { width: 1, height: 1 }
 * ```
 */
export function calculateMaxSize(
  width: number,
  height: number,
  numPixels: number,
  options: CalculateOptions = {}
): Size {
  const report = options.onDiagnostic ?? reportToLog;
  const input: SizingInput = { width, height, numPixels };

  if (!isPositiveInteger(width) || !isPositiveInteger(height) || !isPositiveInteger(numPixels)) {
    report({ type: 'error', error: invalidInputError(input) });
    return { ...DEGENERATE_SIZE };
  }

  if (width * height <= numPixels) {
    report({ type: 'unchanged', input });
    return { width, height };
  }

  const aspectRatio = width / height;
  const theoreticalHeight = Math.sqrt(numPixels / aspectRatio);
  if (!Number.isFinite(theoreticalHeight)) {
    report({
      type: 'error',
      error: numericAnomalyError(input, `sqrt(${numPixels} / ${aspectRatio}) is not finite`),
    });
    return { ...DEGENERATE_SIZE };
  }

  const startHeight = atLeastOne(theoreticalHeight);
  const corrected = shrinkToBudget(
    { width: atLeastOne(aspectRatio * startHeight), height: startHeight },
    aspectRatio,
    numPixels
  );
  const { size, iterations } = growWithinBudget(corrected, aspectRatio, numPixels);

  const result: Size = { width: Math.max(1, size.width), height: Math.max(1, size.height) };
  report({ type: 'calculated', input, result, refinementIterations: iterations });
  return result;
}
