/**
 * Graph definition files.
 *
 * A YAML file declares a graph's structure: nodes, edges, interrupt
 * flags, retry budgets and error policies. Behaviour stays in code:
 * bodies, completion checks and eligibility predicates are referenced
 * by handler name and bound when the registry is built.
 *
 *   name: review
 *   nodes:
 *     - name: draft
 *       entry: true
 *       edges:
 *         - target: approve
 *           interrupt: true
 *     - name: approve
 *       edges:
 *         - target: END
 */

import { existsSync, readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import type { z } from 'zod/v4';
import { GraphDefinitionRawSchema, GraphNodeRawSchema } from '../../../core/models/index.js';
import type {
  CompletionCheck,
  GraphControl,
  NodeBody,
  NodeErrorPolicy,
  TransitionPredicate,
} from '../../../core/models/index.js';
import { END, GraphEngine, NodeRegistry } from '../../../core/graph/index.js';
import type { GraphEngineOptions } from '../../../core/graph/index.js';
import { getErrorMessage } from '../../../shared/utils/index.js';
import { ConfigValidationError, formatSchemaIssues } from '../validation.js';

type RawNode = z.output<typeof GraphNodeRawSchema>;

/** Target names in definition files that mean END */
const END_ALIASES: ReadonlySet<string> = new Set(['END', END]);

export interface GraphEdgeSpec {
  name: string;
  target: string;
  description?: string;
  interrupt: boolean;
  /** Predicate handler names */
  eligibility: string[];
  /** Completion check handler name */
  completionCheck?: string;
  retryBudget?: number;
}

export interface GraphNodeSpec {
  name: string;
  description?: string;
  entry: boolean;
  /** Body handler name */
  body: string;
  onError?: NodeErrorPolicy;
  edges: GraphEdgeSpec[];
}

/** Normalized graph definition */
export interface GraphDefinition {
  name: string;
  description?: string;
  stepLimit?: number;
  nodes: GraphNodeSpec[];
}

/** Code a definition's handler names are bound to */
export interface GraphHandlers<S extends GraphControl> {
  bodies: Record<string, NodeBody<S>>;
  completionChecks?: Record<string, CompletionCheck<S>>;
  predicates?: Record<string, TransitionPredicate<S>>;
}

export interface BuildRegistryOptions {
  /** Retry budget for edges that do not declare one */
  retryBudget?: number;
}

/** Raised when a definition names a handler the handler map lacks */
export class UnknownHandlerError extends Error {
  readonly kind: 'body' | 'completion check' | 'predicate';
  readonly handlerName: string;

  constructor(kind: 'body' | 'completion check' | 'predicate', handlerName: string, nodeName: string) {
    super(`Node "${nodeName}": unknown ${kind} handler "${handlerName}"`);
    this.name = 'UnknownHandlerError';
    this.kind = kind;
    this.handlerName = handlerName;
  }
}

function normalizeTarget(target: string): string {
  return END_ALIASES.has(target) ? END : target;
}

function normalizeNode(node: RawNode): GraphNodeSpec {
  return {
    name: node.name,
    description: node.description,
    entry: node.entry,
    body: node.body ?? node.name,
    onError: node.on_error,
    edges: node.edges.map((edge) => {
      const target = normalizeTarget(edge.target);
      return {
        name: edge.name ?? target,
        target,
        description: edge.description,
        interrupt: edge.interrupt,
        eligibility: edge.eligibility ?? [],
        completionCheck: edge.completion_check,
        retryBudget: edge.retry_budget,
      };
    }),
  };
}

/**
 * Validate a parsed YAML document and normalize it.
 *
 * @param source File path or label used in error messages
 * @throws ConfigValidationError when the document does not match the schema
 */
export function parseGraphDefinition(raw: unknown, source = '<inline>'): GraphDefinition {
  const result = GraphDefinitionRawSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(source, formatSchemaIssues(result.error));
  }
  const parsed = result.data;
  return {
    name: parsed.name,
    description: parsed.description,
    stepLimit: parsed.step_limit,
    nodes: parsed.nodes.map(normalizeNode),
  };
}

/** Load and validate a graph definition from a YAML file */
export function loadGraphDefinition(filePath: string): GraphDefinition {
  if (!existsSync(filePath)) {
    throw new Error(`Graph definition file not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigValidationError(filePath, [getErrorMessage(err)], { cause: err });
  }
  return parseGraphDefinition(raw, filePath);
}

function lookup<T>(
  table: Record<string, T> | undefined,
  name: string,
  kind: UnknownHandlerError['kind'],
  nodeName: string,
): T {
  const handler = table && Object.hasOwn(table, name) ? table[name] : undefined;
  if (handler === undefined) {
    throw new UnknownHandlerError(kind, name, nodeName);
  }
  return handler;
}

/**
 * Register a definition's nodes and edges, binding handler names.
 *
 * The registry is returned uncompiled; structural problems surface from
 * compile() as CompileError like any hand-built registry.
 *
 * @throws UnknownHandlerError when a referenced handler is missing
 */
export function buildRegistry<S extends GraphControl>(
  definition: GraphDefinition,
  handlers: GraphHandlers<S>,
  options: BuildRegistryOptions = {},
): NodeRegistry<S> {
  const registry = new NodeRegistry<S>();

  for (const node of definition.nodes) {
    registry.addNode(node.name, lookup(handlers.bodies, node.body, 'body', node.name), {
      entry: node.entry,
      description: node.description,
      onError: node.onError,
    });
  }

  for (const node of definition.nodes) {
    for (const edge of node.edges) {
      registry.addEdge(node.name, edge.name, edge.target, {
        interrupt: edge.interrupt,
        description: edge.description,
        eligibility: edge.eligibility.map((name) => lookup(handlers.predicates, name, 'predicate', node.name)),
        completionCheck: edge.completionCheck !== undefined
          ? lookup(handlers.completionChecks, edge.completionCheck, 'completion check', node.name)
          : undefined,
        retryBudget: edge.retryBudget ?? options.retryBudget,
      });
    }
  }

  return registry;
}

/**
 * Registry with every handler replaced by a pass-through.
 *
 * Used to validate and plan a definition without its code.
 */
export function buildStructuralRegistry(
  definition: GraphDefinition,
  options: BuildRegistryOptions = {},
): NodeRegistry<GraphControl> {
  const passThrough = (state: GraphControl): GraphControl => state;
  const bodies: Record<string, NodeBody<GraphControl>> = {};
  const completionChecks: Record<string, CompletionCheck<GraphControl>> = {};
  const predicates: Record<string, TransitionPredicate<GraphControl>> = {};

  for (const node of definition.nodes) {
    bodies[node.body] = passThrough;
    for (const edge of node.edges) {
      if (edge.completionCheck !== undefined) {
        completionChecks[edge.completionCheck] = (state) => ({ ok: true, state });
      }
      for (const name of edge.eligibility) {
        predicates[name] = () => true;
      }
    }
  }

  return buildRegistry(definition, { bodies, completionChecks, predicates }, options);
}

/**
 * Build and compile a GraphEngine from a definition.
 *
 * The definition's step_limit takes precedence over options.stepLimit.
 */
export function createGraphFromDefinition<S extends GraphControl>(
  definition: GraphDefinition,
  handlers: GraphHandlers<S>,
  options: GraphEngineOptions & BuildRegistryOptions = {},
): GraphEngine<S> {
  const registry = buildRegistry(definition, handlers, { retryBudget: options.retryBudget });
  const engine = new GraphEngine(registry, {
    name: options.name ?? definition.name,
    logger: options.logger,
    stepLimit: definition.stepLimit ?? options.stepLimit,
    loopDetection: options.loopDetection,
  });
  engine.compile();
  return engine;
}
