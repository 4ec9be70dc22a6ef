/**
 * Composable command option types.
 *
 * @example
 * ```typescript
 * type NodesListCommandOptions = BaseOptions;
 * type ComputeCommandOptions = BaseOptions & SizeOptions;
 * ```
 */

/**
 * Base options available to all commands.
 */
export interface BaseOptions {
  /** Output as JSON instead of human-readable format */
  json?: boolean;
}

/**
 * Size inputs for the compute command.
 * Commander passes option values as strings; validation parses them.
 */
export interface SizeOptions {
  /** Original width (string from CLI) */
  width?: string;
  /** Original height (string from CLI) */
  height?: string;
  /** Pixel budget (string from CLI) */
  pixels?: string;
}

/** Options for compute command */
export type ComputeCommandOptions = BaseOptions & SizeOptions;

/** Options for nodes list command */
export type NodesListCommandOptions = BaseOptions;

/** Options for nodes describe command */
export type NodesDescribeCommandOptions = BaseOptions;
