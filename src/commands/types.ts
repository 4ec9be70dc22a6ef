/**
 * Type definitions for command results.
 *
 * runCommand is generic over these, so formatters get compile-time checked
 * inputs.
 */

import type { IntInputSpec, NodeCategory, OutputSpec } from '@/nodes/types.js';
import type { Size } from '@/sizing/types.js';

/**
 * Compute command result. Output names match the node's outputs.
 */
export interface ComputeResult {
  width_max: number;
  height_max: number;
  original: Size;
  /** width_max * height_max */
  pixels: number;
  budget: number;
  aspectRatio: {
    original: number;
    result: number;
  };
  cacheKey: string;
  /** True when the original size already fit and was returned as is */
  unchanged: boolean;
}

/**
 * Serializable view of a node definition.
 */
export interface NodeDescription {
  id: string;
  displayName: string;
  category: NodeCategory;
  description: string;
  inputs: Record<string, IntInputSpec>;
  outputs: OutputSpec[];
}

/**
 * Nodes list command result
 */
export interface NodesListResult {
  nodes: Pick<NodeDescription, 'id' | 'displayName' | 'category'>[];
}
