/**
 * Shared command execution wrapper.
 *
 * Every command handler returns a CommandResult instead of printing and
 * exiting itself. runCommand renders the result as human-readable text or a
 * JSON envelope, and maps failures to semantic exit codes. The caller sets
 * process.exitCode from the returned code so pending output is flushed
 * before the process ends.
 */

import type { BaseOptions } from '@/commands/shared/optionTypes.js';
import { CommandError, type ErrorMetadata } from '@/ui/errors/index.js';
import { joinLines } from '@/ui/formatting.js';
import { createLogger } from '@/ui/logging/index.js';
import { OutputBuilder } from '@/ui/OutputBuilder.js';
import { getErrorMessage } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

const log = createLogger('command');

export type CommandResult<T> =
  | { success: true; data: T }
  | { success: false; error: string; exitCode?: number; errorContext?: ErrorMetadata };

export type CommandHandler<TOptions, TResult> = (
  options: TOptions
) => CommandResult<TResult> | Promise<CommandResult<TResult>>;

/**
 * Output sinks. Tests swap these to capture what a command prints.
 */
export interface CommandOutput {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const defaultOutput: CommandOutput = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

function toFailure(error: unknown): Extract<CommandResult<never>, { success: false }> {
  if (error instanceof CommandError) {
    return {
      success: false,
      error: error.message,
      exitCode: error.exitCode,
      errorContext: error.metadata,
    };
  }
  log.debug(error instanceof Error && error.stack ? error.stack : getErrorMessage(error));
  return {
    success: false,
    error: getErrorMessage(error),
    exitCode: EXIT_CODES.UNHANDLED_EXCEPTION,
  };
}

/**
 * Run a command handler and render its result.
 *
 * @param handler - Command logic returning a CommandResult
 * @param options - Parsed Commander options (--json selects JSON output)
 * @param formatter - Human-readable renderer for successful results
 * @param output - Where to write (defaults to console)
 * @returns Exit code for the process
 *
 * @example
 * ```typescript
 * process.exitCode = await runCommand<ComputeCommandOptions, ComputeResult>(
 *   (opts) => ({ success: true, data: buildComputeResult(opts) }),
 *   options,
 *   formatComputeResult
 * );
 * ```
 */
export async function runCommand<TOptions extends BaseOptions, TResult>(
  handler: CommandHandler<TOptions, TResult>,
  options: TOptions,
  formatter?: (data: TResult) => string,
  output: CommandOutput = defaultOutput
): Promise<number> {
  let result: CommandResult<TResult>;
  try {
    result = await handler(options);
  } catch (error: unknown) {
    result = toFailure(error);
  }

  if (result.success) {
    if (options.json) {
      output.stdout(JSON.stringify(OutputBuilder.buildJsonSuccess({ data: result.data }), null, 2));
    } else if (formatter) {
      output.stdout(formatter(result.data));
    } else {
      output.stdout(JSON.stringify(result.data, null, 2));
    }
    return EXIT_CODES.SUCCESS;
  }

  const exitCode = result.exitCode ?? EXIT_CODES.GENERIC_FAILURE;
  const suggestion = result.errorContext?.suggestion;

  if (options.json) {
    output.stdout(
      JSON.stringify(
        OutputBuilder.buildJsonError(result.error, {
          exitCode,
          ...(suggestion ? { suggestion } : {}),
          ...(result.errorContext?.context ? { context: result.errorContext.context } : {}),
        }),
        null,
        2
      )
    );
  } else {
    output.stderr(joinLines(`Error: ${result.error}`, suggestion ? `Suggestion: ${suggestion}` : undefined));
  }

  return exitCode;
}
