/**
 * Router graph: hierarchical delegation to named child graphs.
 *
 *   decide_route ──▶ invoke_route ──▶ END
 *        │              │  ▲
 *        ▼              └──┘ (interrupt: child suspended)
 *       END
 *
 * decide_route asks the injected RouteDecider which available route
 * should handle the message. invoke_route runs the chosen child graph;
 * when the child suspends the router suspends too and records the route
 * in pendingResume, so the next invoke() re-enters the same child at its
 * own suspension point.
 */

import type { GraphControl } from '../../models/types.js';
import { RouteDecisionSchema } from '../../models/schemas.js';
import { END, DECIDE_ROUTE_NODE, INVOKE_ROUTE_NODE } from '../constants.js';
import { UnknownRouteError } from '../errors.js';
import type { GraphEngineOptions, GraphLogger } from '../types.js';
import { NodeRegistry } from '../registry/index.js';
import { GraphEngine } from '../engine/GraphEngine.js';
import { isSuspended } from '../engine/state-manager.js';
import type {
  ChildRoute,
  RouteDecider,
  RouteOption,
  RouterState,
} from './types.js';

/** Read-only view of a registered route */
export interface RouteHandle<P> {
  readonly name: string;
  describe(parentState: P): string;
  isAvailable(parentState: P): boolean;
  isCompiled(): boolean;
}

/** A registered route with its child state type erased */
interface RouteEntry<P> extends RouteHandle<P> {
  ensureCompiled(logger: GraphLogger): void;
  /** Run the child graph; resolves to true when the child suspended */
  run(state: RouterState<P>, resume: boolean, logger: GraphLogger): Promise<boolean>;
}

export class RouterGraph<P> extends GraphEngine<RouterState<P>> {
  private readonly decider: RouteDecider<P>;
  private readonly routes = new Map<string, RouteEntry<P>>();

  constructor(decider: RouteDecider<P>, options: GraphEngineOptions = {}) {
    super(new NodeRegistry<RouterState<P>>(), options);
    this.decider = decider;

    this.registry
      .addNode(DECIDE_ROUTE_NODE, (state) => this.decideRoute(state), {
        entry: true,
        description: 'Pick a route for the user message',
      })
      .addEdge(DECIDE_ROUTE_NODE, INVOKE_ROUTE_NODE, INVOKE_ROUTE_NODE)
      .addEdge(DECIDE_ROUTE_NODE, END, END)
      .addNode(INVOKE_ROUTE_NODE, (state) => this.invokeRoute(state), {
        description: 'Run the selected child graph',
      })
      .addEdge(INVOKE_ROUTE_NODE, INVOKE_ROUTE_NODE, INVOKE_ROUTE_NODE, {
        interrupt: true,
        description: 'child route suspended',
      })
      .addEdge(INVOKE_ROUTE_NODE, END, END);
  }

  /**
   * Register a child graph under a name.
   * Re-using a name replaces the route and requires compile() again.
   */
  addRoute<C extends GraphControl>(route: ChildRoute<P, C>, name: string): this {
    if (this.routes.has(name)) {
      this.logger.info(`${this.getName()} | Replacing route <${name}>`);
    }
    this.routes.set(name, createRouteEntry(name, route));
    this.invalidate();
    return this;
  }

  getRoute(name: string): RouteHandle<P> | undefined {
    return this.routes.get(name);
  }

  routeNames(): string[] {
    return [...this.routes.keys()];
  }

  /** Names of the routes available for the given parent state */
  availableRoutes(parentState: P): string[] {
    return [...this.routes.entries()]
      .filter(([, entry]) => entry.isAvailable(parentState))
      .map(([name]) => name);
  }

  /** Available routes with their descriptions, as offered to the decider */
  describeRoutes(parentState: P): RouteOption[] {
    return [...this.routes.entries()]
      .filter(([, entry]) => entry.isAvailable(parentState))
      .map(([name, entry]) => ({ name, description: entry.describe(parentState) }));
  }

  /** Compile every child graph that is not compiled yet, with this router's logger */
  protected override preflight(): void {
    for (const entry of this.routes.values()) {
      entry.ensureCompiled(this.logger);
    }
  }

  private async decideRoute(state: RouterState<P>): Promise<RouterState<P>> {
    const routes = this.describeRoutes(state.parentState);
    const decision = RouteDecisionSchema.parse(
      await this.decider.decide({
        userMessage: state.userMessage,
        parentState: state.parentState,
        routes,
      }),
    );
    this.logger.debug(`${this.getName()} | Route decision`, { decision, available: routes.map((r) => r.name) });

    const chosen = decision.route;
    if (decision.shouldRoute && chosen !== undefined && routes.some((r) => r.name === chosen)) {
      state.selectedRoute = chosen;
      state.agentMessage = undefined;
      state.currentEdge = INVOKE_ROUTE_NODE;
      return state;
    }

    state.selectedRoute = undefined;
    state.agentMessage = decision.reply;
    state.currentEdge = END;
    return state;
  }

  private async invokeRoute(state: RouterState<P>): Promise<RouterState<P>> {
    let resume = false;
    if (state.pendingResume) {
      if (this.routes.has(state.pendingResume)) {
        this.logger.info(`${this.getName()} | Resume requested: ${state.pendingResume}`);
        state.selectedRoute = state.pendingResume;
        resume = true;
      } else {
        this.logger.info(`${this.getName()} | Resume requested: ${state.pendingResume} (NOT AVAILABLE)`);
      }
      state.pendingResume = undefined;
    }

    const routeName = state.selectedRoute;
    const entry = routeName !== undefined ? this.routes.get(routeName) : undefined;
    if (routeName === undefined || !entry) {
      throw new UnknownRouteError(routeName ?? '');
    }

    state.agentMessage = undefined;
    const suspended = await entry.run(state, resume, this.logger);
    if (suspended) {
      this.logger.info(`${this.getName()} | Route <${routeName}> suspended`);
      state.pendingResume = routeName;
      state.currentEdge = INVOKE_ROUTE_NODE;
      return state;
    }

    state.selectedRoute = undefined;
    state.currentEdge = END;
    return state;
  }
}

function createRouteEntry<P, C extends GraphControl>(name: string, route: ChildRoute<P, C>): RouteEntry<P> {
  // Child states held between a child's suspension and its resume, per router state
  const held = new WeakMap<RouterState<P>, C>();

  return {
    name,
    describe: (parentState) => route.describe(parentState),
    isAvailable: (parentState) => route.isAvailable(parentState),
    isCompiled: () => route.graph.isCompiled(),
    ensureCompiled: (logger) => {
      if (!route.graph.isCompiled()) {
        route.graph.compile({ name, logger });
      }
    },
    run: async (state, resume, logger) => {
      const request = { userMessage: state.userMessage };
      const suspendedChild = resume ? held.get(state) : undefined;
      if (resume && !suspendedChild) {
        logger.info(`${name} | No suspended child state to resume, starting route from projectState`);
      }
      let childState: C;
      if (suspendedChild) {
        childState = route.resumeState
          ? route.resumeState(suspendedChild, state.parentState, request)
          : suspendedChild;
      } else {
        childState = route.projectState(state.parentState, request);
      }

      const result = await route.graph.invoke(childState);
      state.parentState = route.mergeState(state.parentState, result);

      if (isSuspended(result)) {
        held.set(state, result);
        return true;
      }
      held.delete(state);
      return false;
    },
  };
}
