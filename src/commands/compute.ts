import type { Command } from 'commander';

import { runCommand } from '@/commands/shared/CommandRunner.js';
import { jsonOption } from '@/commands/shared/commonOptions.js';
import type { ComputeCommandOptions } from '@/commands/shared/optionTypes.js';
import { nodeInputRule } from '@/commands/shared/validation.js';
import type { ComputeResult } from '@/commands/types.js';
import {
  executeResizeCalculator,
  imageResizeCalculatorNode,
  resizeCalculatorCacheKey,
  type ResizeCalculatorInputs,
} from '@/nodes/imageResizeCalculator.js';
import { formatComputeResult } from '@/ui/formatters/sizing.js';

const { inputs } = imageResizeCalculatorNode;

/**
 * Parse and range-check the compute options against the node's declared inputs.
 *
 * @param options - Raw Commander options
 * @returns Node inputs
 * @throws CommandError with INVALID_ARGUMENTS when a value is out of range
 */
export function parseComputeInputs(options: ComputeCommandOptions): ResizeCalculatorInputs {
  return {
    width: nodeInputRule('width', inputs.width).validate(options.width),
    height: nodeInputRule('height', inputs.height).validate(options.height),
    num_pixels: nodeInputRule('pixels', inputs.num_pixels).validate(options.pixels),
  };
}

/**
 * Run the calculator for validated inputs and assemble the command result.
 *
 * @param nodeInputs - Validated node inputs
 */
export function buildComputeResult(nodeInputs: ResizeCalculatorInputs): ComputeResult {
  const { width, height, num_pixels: budget } = nodeInputs;
  const { width_max, height_max } = executeResizeCalculator(nodeInputs);

  return {
    width_max,
    height_max,
    original: { width, height },
    pixels: width_max * height_max,
    budget,
    aspectRatio: {
      original: width / height,
      result: width_max / height_max,
    },
    cacheKey: resizeCalculatorCacheKey(nodeInputs),
    unchanged: width * height <= budget,
  };
}

/**
 * Register compute command
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerComputeCommand(program: Command): void {
  program
    .command('compute')
    .description('Largest size that keeps the aspect ratio within a pixel budget')
    .option('-W, --width <pixels>', `Original width (default: ${inputs.width.default})`)
    .option('-H, --height <pixels>', `Original height (default: ${inputs.height.default})`)
    .option(
      '-p, --pixels <count>',
      `Pixel budget, width * height limit (default: ${inputs.num_pixels.default})`
    )
    .addOption(jsonOption())
    .addHelpText(
      'after',
      '\nExamples:\n  pixfit compute --width 1920 --height 1080 --pixels 1048576\n  pixfit compute -W 4000 -H 3000 -p 2000000 --json'
    )
    .action(async (options: ComputeCommandOptions) => {
      process.exitCode = await runCommand<ComputeCommandOptions, ComputeResult>(
        (opts) => ({ success: true, data: buildComputeResult(parseComputeInputs(opts)) }),
        options,
        formatComputeResult
      );
    });
}
