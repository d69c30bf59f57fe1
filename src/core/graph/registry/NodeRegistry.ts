/**
 * Node registry: an arena of node definitions keyed by name.
 *
 * Nodes and edges are registered imperatively. Registration never throws;
 * structural problems are collected and reported by compile(), which
 * either returns a complete ExecutionPlan or fails with a CompileError.
 * Edges reference targets by name, so cycles carry no ownership links.
 */

import type {
  AddEdgeOptions,
  AddNodeOptions,
  EdgeDefinition,
  ExecutionPlan,
  GraphControl,
  NodeBody,
  NodeDefinition,
  PlanNode,
} from '../../models/types.js';
import { END, DEFAULT_RETRY_BUDGET } from '../constants.js';
import { CompileError, type CompileRule } from '../errors.js';

interface RegisteredNode<S extends GraphControl> extends NodeDefinition<S> {
  readonly edges: Map<string, EdgeDefinition<S>>;
}

interface RegistrationIssue {
  rule: CompileRule;
  message: string;
  nodeName?: string;
  edgeName?: string;
}

/** Order in which registration-time issues are reported */
const ISSUE_PRIORITY: readonly CompileRule[] = [
  'duplicate-node',
  'unknown-source',
  'duplicate-edge',
  'invalid-retry-budget',
];

export class NodeRegistry<S extends GraphControl> {
  private readonly nodes = new Map<string, RegisteredNode<S>>();
  private readonly issues: RegistrationIssue[] = [];
  private ready = false;

  /** Register a node. The first registration of a name wins. */
  addNode(name: string, body: NodeBody<S>, options: AddNodeOptions = {}): this {
    this.ready = false;
    if (this.nodes.has(name)) {
      this.issues.push({
        rule: 'duplicate-node',
        message: `Node "${name}" is registered more than once`,
        nodeName: name,
      });
      return this;
    }
    this.nodes.set(name, {
      name,
      isEntry: options.entry === true,
      description: options.description,
      body,
      onError: options.onError ?? { policy: 'fail-fast' },
      edges: new Map(),
    });
    return this;
  }

  /** Register an outgoing edge on an already registered node */
  addEdge(
    nodeName: string,
    edgeName: string,
    target: string,
    options: AddEdgeOptions<S> = {},
  ): this {
    this.ready = false;
    const node = this.nodes.get(nodeName);
    if (!node) {
      this.issues.push({
        rule: 'unknown-source',
        message: `Edge<${edgeName}> is registered on unknown node "${nodeName}"`,
        nodeName,
        edgeName,
      });
      return this;
    }
    if (node.edges.has(edgeName)) {
      this.issues.push({
        rule: 'duplicate-edge',
        message: `Edge<${edgeName}> is already registered on node "${nodeName}"`,
        nodeName,
        edgeName,
      });
      return this;
    }

    const retryBudget = options.retryBudget ?? DEFAULT_RETRY_BUDGET;
    if (!Number.isInteger(retryBudget) || retryBudget < 1) {
      this.issues.push({
        rule: 'invalid-retry-budget',
        message: `Edge<${edgeName}> (${nodeName}): retry budget must be a positive integer, got ${retryBudget}`,
        nodeName,
        edgeName,
      });
    }

    node.edges.set(edgeName, {
      name: edgeName,
      target,
      interrupt: options.interrupt === true,
      description: options.description,
      eligibility: options.eligibility ?? [],
      completionCheck: options.completionCheck,
      retryBudget,
    });
    return this;
  }

  getNode(name: string): NodeDefinition<S> | undefined {
    return this.nodes.get(name);
  }

  hasNode(name: string): boolean {
    return this.nodes.has(name);
  }

  nodeNames(): string[] {
    return [...this.nodes.keys()];
  }

  /** Whether the last compile() succeeded and nothing was registered since */
  isReady(): boolean {
    return this.ready;
  }

  /**
   * Validate the registry and build the execution plan.
   *
   * @throws CompileError on the first structural violation
   */
  compile(name = 'graph'): ExecutionPlan {
    this.ready = false;
    this.assertNoRegistrationIssues();

    for (const node of this.nodes.values()) {
      if (node.onError.policy === 'error-edge' && !node.edges.has(node.onError.edge)) {
        throw new CompileError(
          'unknown-error-edge',
          `Node "${node.name}": error edge "${node.onError.edge}" is not one of its edges`,
          node.name,
          node.onError.edge,
        );
      }
      for (const edge of node.edges.values()) {
        if (edge.target !== END && !this.nodes.has(edge.target)) {
          throw new CompileError(
            'dangling-target',
            `Edge<${edge.name}> (${node.name}->${edge.target}): target not found in nodes`,
            node.name,
            edge.name,
          );
        }
      }
    }

    const entries = [...this.nodes.values()].filter((node) => node.isEntry);
    const entry = entries[0];
    if (!entry) {
      throw new CompileError('missing-entry', 'No entry node defined');
    }
    if (entries.length > 1) {
      throw new CompileError(
        'multiple-entry',
        `More than one entry node defined: ${entries.map((node) => node.name).join(', ')}`,
        entries[1]?.name,
      );
    }

    const plan = this.buildPlan(name, entry.name);
    this.ready = true;
    return plan;
  }

  private assertNoRegistrationIssues(): void {
    for (const rule of ISSUE_PRIORITY) {
      const issue = this.issues.find((candidate) => candidate.rule === rule);
      if (issue) {
        throw new CompileError(issue.rule, issue.message, issue.nodeName, issue.edgeName);
      }
    }
  }

  private buildPlan(name: string, entry: string): ExecutionPlan {
    const names = this.nodeNames();
    const nodes: PlanNode[] = [...this.nodes.values()].map((node, index) => Object.freeze({
      name: node.name,
      index,
      isEntry: node.isEntry,
      description: node.description,
      edges: Object.freeze([...node.edges.values()].map((edge) => Object.freeze({
        name: edge.name,
        target: edge.target,
        targetIndex: edge.target === END ? -1 : names.indexOf(edge.target),
        interrupt: edge.interrupt,
        hasCompletionCheck: edge.completionCheck !== undefined,
        retryBudget: edge.retryBudget,
      }))),
    }));
    return Object.freeze({ name, entry, nodes: Object.freeze(nodes) });
  }
}
