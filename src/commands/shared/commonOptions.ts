import { Option } from 'commander';

/**
 * `-j, --json` flag shared by every pixfit command.
 *
 * A fresh Option per call: commander keeps per-command state on the instance,
 * so `compute`, `nodes list` and `nodes describe` each get their own.
 *
 * @example
 * ```typescript
 * program.command('compute').addOption(jsonOption());
 * // pixfit compute --width 1920 --height 1080 --json
 * ```
 */
export function jsonOption(): Option {
  return new Option('-j, --json', 'Output as JSON').default(false);
}
