/**
 * Graph error taxonomy.
 *
 * Compile-time problems surface as CompileError before anything runs;
 * everything else is raised from invoke() and propagates to its caller.
 * Suspension is not an error.
 */

import { ERROR_MESSAGES, formatCycle } from './constants.js';

export class GraphError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Structural rule a registry can violate */
export type CompileRule =
  | 'duplicate-node'
  | 'unknown-source'
  | 'duplicate-edge'
  | 'invalid-retry-budget'
  | 'unknown-error-edge'
  | 'dangling-target'
  | 'missing-entry'
  | 'multiple-entry';

export class CompileError extends GraphError {
  readonly rule: CompileRule;
  readonly nodeName?: string;
  readonly edgeName?: string;

  constructor(rule: CompileRule, message: string, nodeName?: string, edgeName?: string) {
    super(message);
    this.rule = rule;
    this.nodeName = nodeName;
    this.edgeName = edgeName;
  }
}

export class NotCompiledError extends GraphError {
  constructor(graphName: string) {
    super(ERROR_MESSAGES.NOT_COMPILED(graphName));
  }
}

export class UnknownNodeError extends GraphError {
  readonly nodeName: string;

  constructor(nodeName: string) {
    super(ERROR_MESSAGES.UNKNOWN_NODE(nodeName));
    this.nodeName = nodeName;
  }
}

export class UndefinedEdgeError extends GraphError {
  readonly nodeName: string;
  readonly edgeName?: string;

  constructor(nodeName: string, edgeName: string | undefined) {
    super(ERROR_MESSAGES.UNDEFINED_EDGE(nodeName, edgeName));
    this.nodeName = nodeName;
    this.edgeName = edgeName;
  }
}

export class StepLimitExceededError extends GraphError {
  readonly limit: number;
  readonly lastEdge?: string;
  /** Cycle the final dispatches kept repeating, when there was one */
  readonly cycle?: readonly string[];

  constructor(limit: number, lastEdge: string | undefined, cycle?: readonly string[]) {
    const cycleNote = cycle ? `; cycle: ${formatCycle(cycle)}` : '';
    super(`${ERROR_MESSAGES.STEP_LIMIT_EXCEEDED(limit)} (last edge: ${lastEdge ?? 'none'}${cycleNote})`);
    this.limit = limit;
    this.lastEdge = lastEdge;
    this.cycle = cycle;
  }
}

export class RetryExhaustedError extends GraphError {
  readonly nodeName: string;
  readonly attempts: number;

  constructor(nodeName: string, attempts: number) {
    super(ERROR_MESSAGES.RETRY_EXHAUSTED(nodeName, attempts));
    this.nodeName = nodeName;
    this.attempts = attempts;
  }
}

export class InvalidTransitionError extends GraphError {
  readonly nodeName: string;
  readonly edgeName: string;
  readonly available: readonly string[];

  constructor(nodeName: string, edgeName: string, available: readonly string[]) {
    super(ERROR_MESSAGES.INVALID_TRANSITION(nodeName, edgeName));
    this.nodeName = nodeName;
    this.edgeName = edgeName;
    this.available = available;
  }
}

export class NodeExecutionError extends GraphError {
  readonly nodeName: string;

  constructor(nodeName: string, message: string, cause: unknown) {
    super(ERROR_MESSAGES.NODE_EXECUTION_FAILED(nodeName, message), { cause });
    this.nodeName = nodeName;
  }
}

export class UnknownRouteError extends GraphError {
  readonly routeName: string;

  constructor(routeName: string) {
    super(ERROR_MESSAGES.UNKNOWN_ROUTE(routeName));
    this.routeName = routeName;
  }
}

export class LoopDetectedError extends GraphError {
  readonly cycle: readonly string[];
  readonly repeats: number;

  constructor(cycle: readonly string[], repeats: number) {
    super(ERROR_MESSAGES.LOOP_DETECTED(cycle, repeats));
    this.cycle = cycle;
    this.repeats = repeats;
  }
}
