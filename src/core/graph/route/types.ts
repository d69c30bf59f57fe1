/**
 * Route composition type definitions
 */

import type { z } from 'zod/v4';
import type { GraphControl, GraphState } from '../../models/types.js';
import type { RouteDecisionSchema } from '../../models/schemas.js';
import type { GraphEngine } from '../engine/GraphEngine.js';

/** Input the router hands to a child route alongside the parent state */
export interface RouteRequest {
  userMessage?: string;
}

/**
 * A child graph a router can delegate to.
 *
 * The router never shares state objects with the child: projectState
 * builds the child's state from the parent, mergeState folds the
 * child's result back into the parent.
 */
export interface ChildRoute<P, C extends GraphControl> {
  readonly graph: GraphEngine<C>;
  /** Human-readable summary shown to the routing decision */
  describe(parentState: P): string;
  isAvailable(parentState: P): boolean;
  projectState(parentState: P, request: RouteRequest): C;
  mergeState(parentState: P, childState: C): P;
  /**
   * Fold new input into a suspended child state before it resumes.
   * Without it the held state resumes unchanged.
   */
  resumeState?(childState: C, parentState: P, request: RouteRequest): C;
}

/** Payload of a router's own state */
export interface RouterPayload<P> {
  parentState: P;
  userMessage?: string;
  /** Direct reply when the decision did not route */
  agentMessage?: string;
}

export type RouterState<P> = GraphState<RouterPayload<P>>;

export type RouteDecision = z.infer<typeof RouteDecisionSchema>;

/** A route as offered to the decision step */
export interface RouteOption {
  name: string;
  description: string;
}

export interface RouteDecisionRequest<P> {
  userMessage?: string;
  parentState: P;
  routes: RouteOption[];
}

/**
 * Strategy that picks a route (or a direct reply) for a message.
 * Typically backed by a model call; the router only consumes its result.
 */
export interface RouteDecider<P> {
  decide(request: RouteDecisionRequest<P>): RouteDecision | Promise<RouteDecision>;
}
