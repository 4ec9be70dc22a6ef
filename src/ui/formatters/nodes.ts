/**
 * Human-readable output for node listing and description.
 */

import type { NodeDescription, NodesListResult } from '@/commands/types.js';
import { joinLines } from '@/ui/formatting.js';

function padColumn(value: string, width: number): string {
  return value.padEnd(width);
}

function columnWidth(values: readonly string[]): number {
  return Math.max(0, ...values.map((value) => value.length)) + 2;
}

/**
 * Format the node list as aligned columns: id, display name, category.
 */
export function formatNodesList(result: NodesListResult): string {
  if (result.nodes.length === 0) {
    return 'No nodes registered';
  }

  const idWidth = columnWidth(result.nodes.map((node) => node.id));
  const nameWidth = columnWidth(result.nodes.map((node) => node.displayName));

  return joinLines(
    ...result.nodes.map(
      (node) =>
        `${padColumn(node.id, idWidth)}${padColumn(node.displayName, nameWidth)}${node.category}`
    )
  );
}

/**
 * Format a node's declared interface.
 *
 * @example
 * ```
 * ImageResizeCalculator (Image Resize Calculator)
 * Category: image
 * ...
 *
 * Inputs:
 *   width       INT  1..65536  default 1024  Original image width
 *
 * Outputs:
 *   width_max   INT
 * ```
 */
export function formatNodeDescription(node: NodeDescription): string {
  const inputNames = Object.keys(node.inputs);
  const nameWidth = columnWidth([...inputNames, ...node.outputs.map((output) => output.name)]);
  const ranges = Object.values(node.inputs).map((spec) => `${spec.min}..${spec.max}`);
  const rangeWidth = columnWidth(ranges);
  const defaults = Object.values(node.inputs).map((spec) => `default ${spec.default}`);
  const defaultWidth = columnWidth(defaults);

  const inputLines = Object.entries(node.inputs).map(
    ([name, spec]) =>
      `  ${padColumn(name, nameWidth)}${spec.type}  ` +
      `${padColumn(`${spec.min}..${spec.max}`, rangeWidth)}` +
      `${padColumn(`default ${spec.default}`, defaultWidth)}${spec.tooltip}`
  );
  const outputLines = node.outputs.map(
    (output) => `  ${padColumn(output.name, nameWidth)}${output.type}`
  );

  return joinLines(
    `${node.id} (${node.displayName})`,
    `Category: ${node.category}`,
    node.description,
    '',
    'Inputs:',
    ...inputLines,
    '',
    'Outputs:',
    ...outputLines
  );
}
