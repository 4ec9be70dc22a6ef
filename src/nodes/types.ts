/**
 * Declarative node interface consumed by a node-graph host.
 *
 * A node describes its inputs (with ranges and defaults), its ordered outputs,
 * a cache key derived from its inputs, and the function the host executes.
 */

/**
 * Integer input widget description.
 */
export interface IntInputSpec {
  type: 'INT';
  default: number;
  min: number;
  max: number;
  step: number;
  tooltip: string;
}

export interface OutputSpec<TName extends string = string> {
  name: TName;
  type: 'INT';
}

export type NodeCategory = 'image';

export interface NodeDefinition<
  TInputs extends Record<string, number> = Record<string, number>,
  TOutputs extends Record<string, number> = Record<string, number>,
> {
  /** Stable identifier used by the host's registration table */
  id: string;
  displayName: string;
  category: NodeCategory;
  description: string;
  inputs: { readonly [K in keyof TInputs]: IntInputSpec };
  outputs: readonly OutputSpec<Extract<keyof TOutputs, string>>[];
  /**
   * Identity of a call for the host's cache. Equal inputs give equal keys.
   * The node itself caches nothing.
   */
  cacheKey: (inputs: TInputs) => string;
  /** Never throws; failures degrade to a usable result */
  execute: (inputs: TInputs) => TOutputs;
}

/**
 * Node definition with its input and output types erased, as stored in the registry.
 */
export interface AnyNodeDefinition {
  id: string;
  displayName: string;
  category: NodeCategory;
  description: string;
  inputs: { readonly [name: string]: IntInputSpec };
  outputs: readonly OutputSpec[];
}
