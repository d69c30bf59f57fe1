/**
 * Graph engine type definitions
 *
 * Contains types for step outcomes, engine events, options and
 * the injected logging sink.
 */

import type {
  GraphControl,
  LoopDetectionConfig,
  NodeDefinition,
  EdgeDefinition,
} from '../models/types.js';
import type { GraphError } from './errors.js';

/** Logging sink the engine writes step-level trace events to */
export interface GraphLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

/** What happened when one node was dispatched */
export type StepOutcome =
  | { type: 'continue'; edge: string; target: string }
  | { type: 'suspended'; edge: string }
  | { type: 'terminated'; edge: string }
  | { type: 'failed'; error: GraphError };

export interface StepResult<S extends GraphControl> {
  state: S;
  outcome: StepOutcome;
}

/** Events emitted by GraphEngine */
export interface GraphEvents<S extends GraphControl> {
  'node:start': (node: NodeDefinition<S>, step: number) => void;
  'edge:taken': (from: string, edge: EdgeDefinition<S>, to: string) => void;
  'node:error': (node: NodeDefinition<S>, error: unknown) => void;
  'node:retry': (node: NodeDefinition<S>, attempt: number, hint: string | undefined) => void;
  'graph:cycle': (cycle: readonly string[], repeats: number) => void;
  'graph:resume': (edge: string, target: string) => void;
  'graph:suspend': (node: NodeDefinition<S>, edge: string, state: S) => void;
  'graph:complete': (state: S, steps: number) => void;
}

/** Options accepted by GraphEngine */
export interface GraphEngineOptions {
  /** Graph name used in logs and the compiled plan */
  name?: string;
  /** Default limit for invoke() when no stepLimit argument is given */
  stepLimit?: number;
  /** Trace sink; defaults to the 'graph' component debug logger */
  logger?: GraphLogger;
  loopDetection?: LoopDetectionConfig;
}

/** Options accepted by GraphEngine.compile() */
export interface CompileOptions {
  name?: string;
  logger?: GraphLogger;
}

/** Result of recording one dispatch in the cycle detector */
export interface CycleCheckResult {
  /** Shortest block of nodes the latest dispatches repeat, if any */
  cycle?: readonly string[];
  repeats: number;
  isLoop: boolean;
  shouldAbort: boolean;
  shouldWarn: boolean;
}
