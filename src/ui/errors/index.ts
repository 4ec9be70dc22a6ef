/**
 * Error handling for the pixfit CLI.
 */

export { CommandError, type ErrorMetadata } from './CommandError.js';
