/**
 * Graph module - registry, engine and router composition
 */

export {
  END,
  DEFAULT_STEP_LIMIT,
  DEFAULT_RETRY_BUDGET,
  DECIDE_ROUTE_NODE,
  INVOKE_ROUTE_NODE,
  ERROR_MESSAGES,
  formatCycle,
} from './constants.js';
export {
  GraphError,
  CompileError,
  NotCompiledError,
  UnknownNodeError,
  UndefinedEdgeError,
  StepLimitExceededError,
  RetryExhaustedError,
  InvalidTransitionError,
  NodeExecutionError,
  UnknownRouteError,
  LoopDetectedError,
  type CompileRule,
} from './errors.js';
export type {
  GraphLogger,
  StepOutcome,
  StepResult,
  GraphEvents,
  GraphEngineOptions,
  CompileOptions,
  CycleCheckResult,
} from './types.js';
export { NodeRegistry } from './registry/index.js';
export * from './engine/index.js';
export * from './route/index.js';
