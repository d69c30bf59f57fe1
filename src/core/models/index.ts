// Re-export from types.ts (primary type definitions)
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
  DebugConfig,
  LogLevel,
  LoopAction,
  LoopDetectionConfig,
  EngineConfig,
} from './types.js';

// Re-export from schemas.ts
export * from './schemas.js';
