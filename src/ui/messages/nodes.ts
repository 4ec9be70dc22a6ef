/**
 * Messages for node lookup.
 */

export function unknownNodeError(id: string): string {
  return `Unknown node: "${id}"`;
}

export function availableNodesHint(ids: readonly string[]): string {
  return `Available nodes: ${ids.join(', ')}`;
}
