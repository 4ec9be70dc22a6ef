/**
 * JSON envelopes for command output.
 */

import { VERSION } from '@/utils/version.js';

export interface JsonErrorOptions {
  exitCode?: number;
  suggestion?: string;
  context?: Record<string, string>;
}

export class OutputBuilder {
  static buildJsonError(
    error: string | Error,
    options: JsonErrorOptions = {}
  ): Record<string, unknown> {
    return {
      version: VERSION,
      success: false,
      error: error instanceof Error ? error.message : error,
      ...options,
    };
  }

  static buildJsonSuccess(data: Record<string, unknown>): Record<string, unknown> {
    return { version: VERSION, success: true, ...data };
  }
}
