/**
 * Validation layer for command options.
 */

import type { IntInputSpec } from '@/nodes/types.js';
import { CommandError } from '@/ui/errors/index.js';
import { invalidIntegerError } from '@/ui/messages/validation.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

export interface ValidationRule<T> {
  validate: (value: unknown) => T;
}

export interface IntegerRuleOptions {
  /** Option name used in error messages (without dashes) */
  name?: string;
  min?: number;
  max?: number;
  default?: number;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

function buildRangeSuggestion(min?: number, max?: number): string {
  if (min !== undefined && max !== undefined) return `Use a value between ${min} and ${max}`;
  if (min !== undefined) return `Use a value >= ${min}`;
  if (max !== undefined) return `Use a value <= ${max}`;
  return 'Provide a valid integer';
}

function throwValidationError(message: string, suggestion: string): never {
  throw new CommandError(message, { suggestion }, EXIT_CODES.INVALID_ARGUMENTS);
}

function parseInteger(value: unknown, options: IntegerRuleOptions): number {
  const { name = 'value', min, max, default: defaultValue } = options;

  if (value === undefined || value === null || value === '') {
    if (defaultValue !== undefined) return defaultValue;
    throwValidationError(`--${name} is required`, 'Provide a numeric value for this option');
  }

  if (typeof value !== 'string' && typeof value !== 'number') {
    throwValidationError(
      `--${name} must be a number, got ${typeof value}`,
      'Provide a numeric value'
    );
  }

  const raw = String(value).trim();
  const rangeSuggestion = buildRangeSuggestion(min, max);
  const rangeError = (): never =>
    throwValidationError(invalidIntegerError(name, raw, { min, max }), rangeSuggestion);

  // parseInt would accept '12px' and '1e3'; only plain integers pass
  if (!INTEGER_PATTERN.test(raw)) rangeError();

  const parsed = Number(raw);
  if (!Number.isSafeInteger(parsed)) rangeError();
  if (min !== undefined && parsed < min) rangeError();
  if (max !== undefined && parsed > max) rangeError();

  return parsed;
}

/**
 * Integer option rule with optional bounds and default.
 *
 * @param options - Bounds, default and option name for messages
 * @returns Rule whose validate() returns the parsed integer or throws CommandError
 */
export function integerRule(options: IntegerRuleOptions = {}): ValidationRule<number> {
  return {
    validate: (value: unknown): number => parseInteger(value, options),
  };
}

/**
 * Integer rule taking its bounds and default from a node input declaration.
 *
 * @param name - Input name, also used as the option name in messages
 * @param spec - Declared input range and default
 */
export function nodeInputRule(name: string, spec: IntInputSpec): ValidationRule<number> {
  return integerRule({ name, min: spec.min, max: spec.max, default: spec.default });
}
