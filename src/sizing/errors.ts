/**
 * Error taxonomy for the size calculator.
 *
 * These errors are never thrown by the calculator. They are handed to the
 * diagnostic channel while the caller still receives a usable 1x1 size.
 */

import type { SizingInput } from '@/sizing/types.js';

export type SizingErrorCode = 'INVALID_INPUT' | 'NUMERIC_ANOMALY';

export class SizingError extends Error {
  readonly code: SizingErrorCode;
  readonly input: SizingInput;

  constructor(message: string, code: SizingErrorCode, input: SizingInput) {
    super(message);
    this.name = 'SizingError';
    this.code = code;
    this.input = input;
  }
}

/**
 * Build the error reported when width, height or budget is unusable.
 *
 * @param input - Offending input
 */
export function invalidInputError(input: SizingInput): SizingError {
  return new SizingError(
    `Invalid input: width=${input.width}, height=${input.height}, num_pixels=${input.numPixels}`,
    'INVALID_INPUT',
    input
  );
}

/**
 * Build the error reported when the closed-form step produces a non-finite value.
 *
 * @param input - Input that triggered the anomaly
 * @param detail - What went wrong
 */
export function numericAnomalyError(input: SizingInput, detail: string): SizingError {
  return new SizingError(
    `Numeric anomaly for ${input.width}x${input.height} @ ${input.numPixels}: ${detail}`,
    'NUMERIC_ANOMALY',
    input
  );
}
