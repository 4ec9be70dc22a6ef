/**
 * Structured error for CLI commands.
 */

import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Extra context shown alongside a command error.
 */
export interface ErrorMetadata {
  /** Actionable next step for the user */
  suggestion?: string;
  /** Key/value details included in JSON output */
  context?: Record<string, string>;
}

/**
 * Error thrown by command handlers and validation rules.
 *
 * runCommand catches it and turns it into human or JSON error output with
 * the carried exit code.
 *
 * @example
 * ```typescript
 * throw new CommandError(
 *   'Unknown node: "ImageResize"',
 *   { suggestion: 'Did you mean: ImageResizeCalculator?' },
 *   EXIT_CODES.RESOURCE_NOT_FOUND
 * );
 * ```
 */
export class CommandError extends Error {
  readonly metadata: ErrorMetadata;
  readonly exitCode: number;

  constructor(
    message: string,
    metadata: ErrorMetadata = {},
    exitCode: number = EXIT_CODES.SOFTWARE_ERROR
  ) {
    super(message);
    this.name = 'CommandError';
    this.metadata = metadata;
    this.exitCode = exitCode;
  }
}
