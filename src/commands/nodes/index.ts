import type { Command } from 'commander';

import { runCommand } from '@/commands/shared/CommandRunner.js';
import { jsonOption } from '@/commands/shared/commonOptions.js';
import type {
  NodesDescribeCommandOptions,
  NodesListCommandOptions,
} from '@/commands/shared/optionTypes.js';
import type { NodeDescription, NodesListResult } from '@/commands/types.js';
import { getNode, getNodeIds, listNodes } from '@/nodes/registry.js';
import type { AnyNodeDefinition } from '@/nodes/types.js';
import { CommandError } from '@/ui/errors/index.js';
import { formatNodeDescription, formatNodesList } from '@/ui/formatters/nodes.js';
import { availableNodesHint, unknownNodeError } from '@/ui/messages/nodes.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { getSuggestion } from '@/utils/suggestions.js';

/**
 * Project a node definition onto its serializable fields.
 */
export function describeNode(node: AnyNodeDefinition): NodeDescription {
  return {
    id: node.id,
    displayName: node.displayName,
    category: node.category,
    description: node.description,
    inputs: { ...node.inputs },
    outputs: [...node.outputs],
  };
}

export function buildNodesListResult(): NodesListResult {
  return {
    nodes: listNodes().map(({ id, displayName, category }) => ({ id, displayName, category })),
  };
}

/**
 * Resolve a node id to its description.
 *
 * @param id - Node id as typed by the user
 * @throws CommandError with RESOURCE_NOT_FOUND and a typo suggestion if unknown
 */
export function resolveNodeDescription(id: string): NodeDescription {
  const node = getNode(id);
  if (!node) {
    const ids = getNodeIds();
    const suggestion = getSuggestion(id, ids) || availableNodesHint(ids);
    throw new CommandError(unknownNodeError(id), { suggestion }, EXIT_CODES.RESOURCE_NOT_FOUND);
  }
  return describeNode(node);
}

/**
 * Register nodes command group (list, describe)
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerNodesCommands(program: Command): void {
  const nodes = program.command('nodes').description('Inspect the nodes this package provides');

  nodes
    .command('list')
    .description('List registered nodes')
    .addOption(jsonOption())
    .action(async (options: NodesListCommandOptions) => {
      process.exitCode = await runCommand<NodesListCommandOptions, NodesListResult>(
        () => ({ success: true, data: buildNodesListResult() }),
        options,
        formatNodesList
      );
    });

  nodes
    .command('describe')
    .description("Show a node's inputs, ranges, defaults and outputs")
    .argument('<id>', 'Node id (see: pixfit nodes list)')
    .addOption(jsonOption())
    .action(async (id: string, options: NodesDescribeCommandOptions) => {
      process.exitCode = await runCommand<NodesDescribeCommandOptions, NodeDescription>(
        () => ({ success: true, data: resolveNodeDescription(id) }),
        options,
        formatNodeDescription
      );
    });
}
