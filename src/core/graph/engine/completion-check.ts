/**
 * Completion-check-and-retry around a node invocation.
 *
 * When the edge a node selected declares a completion check, the check
 * runs against the resulting state. A failed check stores its hint in
 * retryHint and re-runs the same node body, up to the edge's retry budget.
 */

import type { EdgeDefinition, GraphControl, NodeDefinition } from '../../models/types.js';
import { RetryExhaustedError, UndefinedEdgeError } from '../errors.js';
import { resolveEdge } from './transitions.js';

export interface CompletionCheckDeps<S extends GraphControl> {
  /** Run the node body once (applies the node's error policy) */
  runBody: (state: S) => Promise<S>;
  onRetry?: (attempt: number, hint: string | undefined) => void;
}

export interface CompletionCheckOutcome<S extends GraphControl> {
  state: S;
  edge: EdgeDefinition<S>;
  /** Failed checks before success */
  retries: number;
}

/**
 * Evaluate the edge's completion check, re-running the node until it passes.
 *
 * @throws RetryExhaustedError when the budget of failed checks is used up
 * @throws UndefinedEdgeError when a re-run selects an edge the node lacks
 */
export async function runCompletionCheck<S extends GraphControl>(
  node: NodeDefinition<S>,
  initialState: S,
  initialEdge: EdgeDefinition<S>,
  deps: CompletionCheckDeps<S>,
): Promise<CompletionCheckOutcome<S>> {
  let state = initialState;
  let edge = initialEdge;
  let failures = 0;

  while (edge.completionCheck) {
    const result = await edge.completionCheck(state);
    state = result.state;

    if (result.ok) {
      state.retryHint = undefined;
      break;
    }

    failures++;
    state.retryHint = result.hint;
    if (failures >= edge.retryBudget) {
      throw new RetryExhaustedError(node.name, failures);
    }

    deps.onRetry?.(failures, result.hint);
    state = await deps.runBody(state);

    const next = resolveEdge(node, state);
    if (!next) {
      throw new UndefinedEdgeError(node.name, state.currentEdge);
    }
    edge = next;
  }

  return { state, edge, retries: failures };
}
