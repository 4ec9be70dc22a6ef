/**
 * Semantic exit codes for scriptable error handling.
 *
 * Exit codes follow semantic ranges so automation can branch on them:
 * - **0**: Success
 * - **1**: Generic failure (avoid in new code)
 * - **80-99**: User errors (invalid input, unknown resource)
 * - **100-119**: Software errors (bugs, unexpected exceptions)
 *
 * Values are stable: new codes may be added inside the existing ranges,
 * existing codes do not change meaning.
 */

export const EXIT_CODES = {
  SUCCESS: 0,
  GENERIC_FAILURE: 1,
  INVALID_ARGUMENTS: 81,
  RESOURCE_NOT_FOUND: 83,
  UNHANDLED_EXCEPTION: 104,
  SOFTWARE_ERROR: 110,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

interface ExitCodeEntry {
  readonly code: ExitCode;
  readonly name: keyof typeof EXIT_CODES;
  readonly description: string;
}

/**
 * Documentation for every exit code, derived from EXIT_CODES.
 */
export const EXIT_CODE_REGISTRY: readonly ExitCodeEntry[] = [
  { code: EXIT_CODES.SUCCESS, name: 'SUCCESS', description: 'Operation completed successfully' },
  {
    code: EXIT_CODES.GENERIC_FAILURE,
    name: 'GENERIC_FAILURE',
    description: 'Generic failure (use specific codes when possible)',
  },
  {
    code: EXIT_CODES.INVALID_ARGUMENTS,
    name: 'INVALID_ARGUMENTS',
    description: 'Invalid command-line arguments or options',
  },
  {
    code: EXIT_CODES.RESOURCE_NOT_FOUND,
    name: 'RESOURCE_NOT_FOUND',
    description: 'Requested resource not found (unknown node id)',
  },
  {
    code: EXIT_CODES.UNHANDLED_EXCEPTION,
    name: 'UNHANDLED_EXCEPTION',
    description: 'Unhandled exception in code',
  },
  {
    code: EXIT_CODES.SOFTWARE_ERROR,
    name: 'SOFTWARE_ERROR',
    description: 'Generic software error (use specific codes when possible)',
  },
];
