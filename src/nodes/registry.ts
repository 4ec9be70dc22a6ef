/**
 * Registration table of the nodes this package provides.
 */

import { imageResizeCalculatorNode } from '@/nodes/imageResizeCalculator.js';
import type { AnyNodeDefinition } from '@/nodes/types.js';

const NODES: readonly AnyNodeDefinition[] = [imageResizeCalculatorNode];

/**
 * Node id to definition. Built once; never mutated.
 */
export const NODE_REGISTRY: ReadonlyMap<string, AnyNodeDefinition> = new Map(
  NODES.map((node) => [node.id, node])
);

export function listNodes(): readonly AnyNodeDefinition[] {
  return NODES;
}

export function getNodeIds(): string[] {
  return NODES.map((node) => node.id);
}

/**
 * Look up a node by id.
 *
 * @param id - Node id (case-sensitive)
 * @returns Node definition, or undefined if no node has that id
 */
export function getNode(id: string): AnyNodeDefinition | undefined {
  return NODE_REGISTRY.get(id);
}
