/**
 * Types shared by the size calculator and its callers.
 */

import type { SizingError } from '@/sizing/errors.js';

/**
 * Integer pixel dimensions.
 */
export interface Size {
  width: number;
  height: number;
}

/**
 * Calculator input: original dimensions plus the pixel budget.
 */
export interface SizingInput extends Size {
  /** Maximum allowed width * height of the result */
  numPixels: number;
}

/**
 * One diagnostic is emitted per calculation.
 *
 * The `type` field discriminates failure (degraded to 1x1), the no-op fast
 * path, and a regular calculation.
 */
export type SizingDiagnostic =
  | { type: 'error'; error: SizingError }
  | { type: 'unchanged'; input: SizingInput }
  | { type: 'calculated'; input: SizingInput; result: Size; refinementIterations: number };

export interface CalculateOptions {
  /** Receives the diagnostic instead of the default `sizing` logger */
  onDiagnostic?: (diagnostic: SizingDiagnostic) => void;
}
