/**
 * Zod schemas for graph definition files and engine configuration
 *
 * Raw schemas mirror the snake_case YAML format; loaders normalize them.
 */

import { z } from 'zod/v4';
import { DEFAULT_RETRY_BUDGET, DEFAULT_STEP_LIMIT } from '../graph/constants.js';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const LoopActionSchema = z.enum(['abort', 'warn', 'ignore']);

/** Node error policy - raw YAML format */
export const NodeErrorPolicyRawSchema = z.discriminatedUnion('policy', [
  z.object({ policy: z.literal('fail-fast') }),
  z.object({ policy: z.literal('error-edge'), edge: z.string().min(1) }),
]);

/**
 * Edge schema - raw YAML format
 *
 * `completion_check` and `eligibility` name handlers bound at load time.
 */
export const GraphEdgeRawSchema = z.object({
  name: z.string().min(1).optional(),
  target: z.string().min(1),
  description: z.string().optional(),
  interrupt: z.boolean().optional().default(false),
  eligibility: z.array(z.string().min(1)).optional(),
  completion_check: z.string().min(1).optional(),
  retry_budget: z.number().int().positive().optional(),
});

/** Node schema - raw YAML format */
export const GraphNodeRawSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  entry: z.boolean().optional().default(false),
  /** Handler name for the body; defaults to the node name */
  body: z.string().min(1).optional(),
  on_error: NodeErrorPolicyRawSchema.optional(),
  edges: z.array(GraphEdgeRawSchema).optional().default([]),
});

/** Graph definition schema - raw YAML format */
export const GraphDefinitionRawSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  step_limit: z.number().int().positive().optional(),
  nodes: z.array(GraphNodeRawSchema).min(1),
});

/** Engine configuration schema - raw YAML format (.stepgraph/config.yaml) */
export const EngineConfigRawSchema = z.object({
  step_limit: z.number().int().positive().optional().default(DEFAULT_STEP_LIMIT),
  retry_budget: z.number().int().positive().optional().default(DEFAULT_RETRY_BUDGET),
  log_level: LogLevelSchema.optional().default('info'),
  verbose: z.boolean().optional().default(false),
  debug: z.object({
    enabled: z.boolean().optional().default(false),
    log_file: z.string().optional(),
  }).optional(),
  loop_detection: z.object({
    max_cycle_repeats: z.number().int().positive().optional(),
    action: LoopActionSchema.optional(),
  }).optional(),
});

/**
 * Structured result of a routing decision.
 *
 * Produced by an external decider (e.g. a model call) and validated
 * before the router acts on it.
 */
export const RouteDecisionSchema = z.object({
  shouldRoute: z.boolean(),
  route: z.string().optional(),
  reply: z.string().optional(),
});
