/**
 * Execution state management
 *
 * Helpers for the control fields the engine threads through every
 * node call. The payload belongs to the workflow author and is never
 * touched here.
 */

import type { GraphControl, GraphState } from '../../models/types.js';

/** Create a fresh state record with empty control fields */
export function createGraphState<P extends object>(payload: P): GraphState<P> {
  return {
    ...payload,
    currentEdge: undefined,
    pendingInterrupt: undefined,
    interruptedAt: undefined,
    pendingResume: undefined,
    selectedRoute: undefined,
    errorMessage: undefined,
    retryHint: undefined,
  };
}

/** Clear per-invocation diagnostics at the start of invoke() */
export function resetDiagnostics(state: GraphControl): void {
  state.errorMessage = undefined;
  state.retryHint = undefined;
}

/** Whether the state represents a suspended workflow */
export function isSuspended(state: GraphControl): boolean {
  return Boolean(state.pendingInterrupt);
}

/** Record a suspension at the given node/edge */
export function markSuspended(state: GraphControl, nodeName: string, edgeName: string): void {
  state.pendingInterrupt = edgeName;
  state.interruptedAt = nodeName;
}

export function clearInterrupt(state: GraphControl): void {
  state.pendingInterrupt = undefined;
  state.interruptedAt = undefined;
}

/**
 * Consume the suspension markers.
 *
 * Returns the interrupted edge and the node that raised it, or
 * undefined when the state is not suspended.
 */
export function takeInterrupt(
  state: GraphControl,
): { edge: string; node: string | undefined } | undefined {
  const edge = state.pendingInterrupt;
  if (!edge) {
    return undefined;
  }
  const node = state.interruptedAt;
  clearInterrupt(state);
  return { edge, node };
}

/** Append a failure (and its stack when available) to the state */
export function recordError(state: GraphControl, message: string, stack?: string): void {
  state.errorMessage = stack ? `${message}\n\n${stack}` : message;
}
