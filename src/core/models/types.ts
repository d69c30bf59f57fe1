/**
 * Core type definitions for stepgraph
 *
 * This file re-exports all types from categorized sub-modules.
 */

export type {
  GraphControl,
  GraphState,
  NodeBody,
  TransitionPredicate,
  CompletionCheckResult,
  CompletionCheck,
  NodeErrorPolicy,
  EdgeDefinition,
  NodeDefinition,
  AddNodeOptions,
  AddEdgeOptions,
  PlanEdge,
  PlanNode,
  ExecutionPlan,
} from './graph-types.js';

export type {
  DebugConfig,
  LogLevel,
  LoopAction,
  LoopDetectionConfig,
  EngineConfig,
} from './config-types.js';
