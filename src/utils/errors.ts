/**
 * Error message extraction.
 */

/**
 * Get a printable message from any thrown value.
 *
 * @param error - Caught value (Error, string, anything)
 * @returns Error message, or the value converted to a string
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
