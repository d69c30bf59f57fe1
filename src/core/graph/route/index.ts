export { RouterGraph, type RouteHandle } from './RouterGraph.js';
export type {
  ChildRoute,
  RouteRequest,
  RouterPayload,
  RouterState,
  RouteDecision,
  RouteOption,
  RouteDecisionRequest,
  RouteDecider,
} from './types.js';
