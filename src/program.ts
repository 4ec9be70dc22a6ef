import { Command } from 'commander';

import { commandRegistry } from '@/commands.js';
import { joinLines } from '@/ui/formatting.js';
import { EXIT_CODE_REGISTRY } from '@/utils/exitCodes.js';
import { VERSION } from '@/utils/version.js';

export const CLI_NAME = 'pixfit';
const CLI_DESCRIPTION = 'Aspect-ratio-preserving image sizes under a pixel budget';

/**
 * Exit code table appended to the root --help output.
 */
export function formatExitCodesHelp(): string {
  return joinLines(
    '',
    'Exit codes:',
    ...EXIT_CODE_REGISTRY.map(
      (entry) => `  ${String(entry.code).padStart(3)}  ${entry.name.padEnd(20)}${entry.description}`
    )
  );
}

/**
 * Build the Commander program with every registered command.
 *
 * @returns Program ready to parse argv
 */
export function createProgram(): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(VERSION)
    .option('--debug', 'Enable debug logging (verbose output)')
    .addHelpText('after', formatExitCodesHelp());

  commandRegistry.forEach((register) => register(program));

  return program;
}
