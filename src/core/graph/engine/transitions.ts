/**
 * Graph state transition logic
 *
 * Resolves the edge a node body selected and computes which of a node's
 * edges are currently eligible.
 */

import type { EdgeDefinition, GraphControl, NodeDefinition } from '../../models/types.js';

/**
 * Resolve state.currentEdge against the node's edges.
 *
 * Falls back to the only edge when the node has exactly one.
 * Returns undefined when the selection cannot be resolved.
 */
export function resolveEdge<S extends GraphControl>(
  node: NodeDefinition<S>,
  state: S,
): EdgeDefinition<S> | undefined {
  const selected = state.currentEdge ? node.edges.get(state.currentEdge) : undefined;
  if (selected) {
    return selected;
  }
  if (node.edges.size === 1) {
    return node.edges.values().next().value;
  }
  return undefined;
}

/** Whether every eligibility predicate on the edge holds */
export function isEdgeEligible<S extends GraphControl>(edge: EdgeDefinition<S>, state: S): boolean {
  return edge.eligibility.every((predicate) => predicate(state));
}

/**
 * Names of the node's edges whose eligibility predicates all hold.
 * Edges without predicates are always available.
 */
export function availableTransitions<S extends GraphControl>(
  node: NodeDefinition<S>,
  state: S,
): string[] {
  return [...node.edges.values()]
    .filter((edge) => isEdgeEligible(edge, state))
    .map((edge) => edge.name);
}
