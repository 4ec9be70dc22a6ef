/**
 * Lightweight context-tagged logging.
 *
 * Everything goes to stderr so stdout stays reserved for command output
 * (human-readable or JSON). Debug messages are dropped until
 * enableDebugLogging() is called, either by the --debug flag or by
 * PIXFIT_DEBUG=1 in the environment.
 */

const DEBUG_ENV_VAR = 'PIXFIT_DEBUG';

let debugEnabled = process.env[DEBUG_ENV_VAR] === '1';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

/**
 * Turn on debug output for every logger.
 */
export function enableDebugLogging(): void {
  debugEnabled = true;
}

/**
 * Turn debug output back off. Used by tests.
 */
export function disableDebugLogging(): void {
  debugEnabled = false;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

/**
 * Format a log line with its context prefix.
 *
 * @param context - Logger context (e.g., 'sizing')
 * @param level - Message level
 * @param message - Message text
 * @returns Line as written to stderr
 *
 * @example
 * ```typescript
 * formatLogLine('sizing', 'warn', 'Invalid input');
 * // Returns: '[sizing] warning: Invalid input'
 * ```
 */
export function formatLogLine(context: string, level: LogLevel, message: string): string {
  switch (level) {
    case 'debug':
      return `[${context}] debug: ${message}`;
    case 'warn':
      return `[${context}] warning: ${message}`;
    case 'error':
      return `[${context}] error: ${message}`;
    case 'info':
      return `[${context}] ${message}`;
  }
}

/**
 * Create a logger bound to a context.
 *
 * @param context - Short subsystem name shown in brackets
 */
export function createLogger(context: string): Logger {
  const write = (level: LogLevel, message: string): void => {
    console.error(formatLogLine(context, level, message));
  };

  return {
    debug: (message) => {
      if (debugEnabled) write('debug', message);
    },
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}
