/**
 * Graph engine module.
 *
 * Re-exports the GraphEngine class and its supporting helpers.
 */

export { GraphEngine } from './GraphEngine.js';
export { CycleDetector, DEFAULT_LOOP_DETECTION, findTrailingCycle, type TrailingCycle } from './cycle-detector.js';
export { runCompletionCheck } from './completion-check.js';
export type { CompletionCheckDeps, CompletionCheckOutcome } from './completion-check.js';
export { resolveEdge, isEdgeEligible, availableTransitions } from './transitions.js';
export {
  createGraphState,
  resetDiagnostics,
  isSuspended,
  markSuspended,
  clearInterrupt,
  takeInterrupt,
  recordError,
} from './state-manager.js';
