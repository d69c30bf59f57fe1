/**
 * Graph definition, execution state and compiled plan types
 */

/** Control fields the engine reads and writes on every state record */
export interface GraphControl {
  /** Edge the last node body selected */
  currentEdge?: string;
  /** Edge name recorded when execution suspended; cleared on resume */
  pendingInterrupt?: string;
  /** Node whose edge raised pendingInterrupt */
  interruptedAt?: string;
  /** Child route to re-enter on the next resume */
  pendingResume?: string;
  /** Child route chosen by a router node */
  selectedRoute?: string;
  errorMessage?: string;
  retryHint?: string;
}

/**
 * Execution state: the workflow author's payload plus control fields.
 *
 * The engine mutates the record in place and hands it back from invoke().
 */
export type GraphState<P extends object = object> = P & GraphControl;

/** Node body: reads the state, sets currentEdge, returns the (same or new) state */
export type NodeBody<S extends GraphControl> = (state: S) => S | Promise<S>;

/** Eligibility predicate gating a transition */
export type TransitionPredicate<S extends GraphControl> = (state: S) => boolean;

/** Result of a completion check */
export interface CompletionCheckResult<S extends GraphControl> {
  ok: boolean;
  state: S;
  /** Retry guidance stored into retryHint when ok is false */
  hint?: string;
}

export type CompletionCheck<S extends GraphControl> = (
  state: S,
) => CompletionCheckResult<S> | Promise<CompletionCheckResult<S>>;

/** How a node reacts when its body throws */
export type NodeErrorPolicy =
  | { policy: 'fail-fast' }
  | { policy: 'error-edge'; edge: string };

export interface EdgeDefinition<S extends GraphControl> {
  readonly name: string;
  /** Node name or END */
  readonly target: string;
  readonly interrupt: boolean;
  readonly description?: string;
  readonly eligibility: readonly TransitionPredicate<S>[];
  readonly completionCheck?: CompletionCheck<S>;
  readonly retryBudget: number;
}

export interface NodeDefinition<S extends GraphControl> {
  readonly name: string;
  readonly isEntry: boolean;
  readonly description?: string;
  readonly body: NodeBody<S>;
  readonly onError: NodeErrorPolicy;
  readonly edges: ReadonlyMap<string, EdgeDefinition<S>>;
}

export interface AddNodeOptions {
  entry?: boolean;
  description?: string;
  onError?: NodeErrorPolicy;
}

export interface AddEdgeOptions<S extends GraphControl> {
  interrupt?: boolean;
  description?: string;
  eligibility?: TransitionPredicate<S>[];
  completionCheck?: CompletionCheck<S>;
  retryBudget?: number;
}

/** Edge as seen in the compiled plan */
export interface PlanEdge {
  readonly name: string;
  readonly target: string;
  /** Index of the target in ExecutionPlan.nodes, -1 for END */
  readonly targetIndex: number;
  readonly interrupt: boolean;
  readonly hasCompletionCheck: boolean;
  readonly retryBudget: number;
}

export interface PlanNode {
  readonly name: string;
  readonly index: number;
  readonly isEntry: boolean;
  readonly description?: string;
  readonly edges: readonly PlanEdge[];
}

/** Read-only artifact produced by compile(); frozen at runtime */
export interface ExecutionPlan {
  readonly name: string;
  readonly entry: string;
  readonly nodes: readonly PlanNode[];
}
