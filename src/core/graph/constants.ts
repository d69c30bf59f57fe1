/**
 * Graph engine constants
 *
 * Contains the terminal sentinel, default limits, router node names,
 * and error messages.
 */

/** Terminal sentinel: an edge targeting END finishes the graph */
export const END = '__END__';

/** Maximum node dispatches per invoke() before the run counts as a runaway cycle */
export const DEFAULT_STEP_LIMIT = 10;

/** Failed completion checks tolerated per transition */
export const DEFAULT_RETRY_BUDGET = 5;

/** Node and edge names used by RouterGraph */
export const DECIDE_ROUTE_NODE = 'decide_route';
export const INVOKE_ROUTE_NODE = 'invoke_route';

/** Error messages */
export const ERROR_MESSAGES = {
  NOT_COMPILED: (graphName: string) => `Graph "${graphName}" has not been compiled`,
  UNKNOWN_NODE: (nodeName: string) => `Unknown node: ${nodeName}`,
  UNDEFINED_EDGE: (nodeName: string, edgeName: string | undefined) =>
    `Node "${nodeName}" selected undefined edge "${edgeName ?? ''}"`,
  STEP_LIMIT_EXCEEDED: (limit: number) => `Step limit ${limit} reached without hitting END`,
  RETRY_EXHAUSTED: (nodeName: string, attempts: number) =>
    `Completion check failed for node "${nodeName}" after ${attempts} attempts`,
  INVALID_TRANSITION: (nodeName: string, edgeName: string) =>
    `Invalid transition: ${nodeName} -> ${edgeName}`,
  NODE_EXECUTION_FAILED: (nodeName: string, message: string) =>
    `Node "${nodeName}" failed: ${message}`,
  UNKNOWN_ROUTE: (routeName: string) => `Unknown route: ${routeName}`,
  LOOP_DETECTED: (cycle: readonly string[], repeats: number) =>
    `Cycle detected: ${formatCycle(cycle)} entered ${repeats} times in a row`,
};

/** Render a cycle as a closed path, e.g. "review -> fix -> review" */
export function formatCycle(cycle: readonly string[]): string {
  return [...cycle, cycle[0] ?? ''].join(' -> ');
}
