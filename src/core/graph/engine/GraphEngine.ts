/**
 * Graph execution engine.
 *
 * Compiles a NodeRegistry and runs the step loop: dispatch, edge
 * resolution, completion checks, suspension at interrupt edges, resume,
 * and step-limit enforcement. Each dispatch is one call to step(), which
 * reports a StepOutcome; invoke() loops until the outcome is not 'continue'.
 */

import { EventEmitter } from 'node:events';
import type { ExecutionPlan, GraphControl, NodeDefinition } from '../../models/types.js';
import { END, DEFAULT_STEP_LIMIT, ERROR_MESSAGES } from '../constants.js';
import {
  GraphError,
  InvalidTransitionError,
  LoopDetectedError,
  NodeExecutionError,
  NotCompiledError,
  StepLimitExceededError,
  UndefinedEdgeError,
  UnknownNodeError,
} from '../errors.js';
import type {
  CompileOptions,
  GraphEngineOptions,
  GraphEvents,
  GraphLogger,
  StepResult,
} from '../types.js';
import type { NodeRegistry } from '../registry/index.js';
import { availableTransitions, isEdgeEligible, resolveEdge } from './transitions.js';
import { runCompletionCheck } from './completion-check.js';
import { CycleDetector } from './cycle-detector.js';
import {
  clearInterrupt,
  markSuspended,
  recordError,
  resetDiagnostics,
  takeInterrupt,
} from './state-manager.js';
import { createLogger, getErrorMessage } from '../../../shared/utils/index.js';

export type { GraphEvents, GraphEngineOptions, CompileOptions, StepResult } from '../types.js';
export { END } from '../constants.js';

/** Graph engine for one compiled registry */
export class GraphEngine<S extends GraphControl> extends EventEmitter {
  protected readonly registry: NodeRegistry<S>;
  protected logger: GraphLogger;
  private readonly options: GraphEngineOptions;
  private graphName: string;
  private plan: ExecutionPlan | null = null;
  /** Entry node captured at compile time */
  private entryNode: string | null = null;

  constructor(registry: NodeRegistry<S>, options: GraphEngineOptions = {}) {
    super();
    this.registry = registry;
    this.options = options;
    this.graphName = options.name ?? new.target.name;
    this.logger = options.logger ?? createLogger('graph');
  }

  getName(): string {
    return this.graphName;
  }

  getRegistry(): NodeRegistry<S> {
    return this.registry;
  }

  getLogger(): GraphLogger {
    return this.logger;
  }

  /**
   * Validate the registry and build the execution plan.
   *
   * @throws CompileError when the registry is structurally invalid
   */
  compile(options: CompileOptions = {}): ExecutionPlan {
    if (options.name) {
      this.graphName = options.name;
    }
    if (options.logger) {
      this.logger = options.logger;
    }
    this.plan = null;
    this.entryNode = null;
    this.preflight();

    const plan = this.registry.compile(this.graphName);
    this.plan = plan;
    this.entryNode = plan.entry;
    this.logger.info(`${this.graphName} | Graph compiled`, {
      entry: plan.entry,
      nodes: plan.nodes.map((node) => node.name),
    });
    return plan;
  }

  /** Hook for subclasses to prepare dependencies before the registry compiles */
  protected preflight(): void {}

  /** Drop the compiled plan so the next invoke() requires compile() again */
  protected invalidate(): void {
    this.plan = null;
    this.entryNode = null;
  }

  isCompiled(): boolean {
    return this.plan !== null && this.registry.isReady();
  }

  /** Compiled plan for introspection (e.g. diagram renderers) */
  getPlan(): ExecutionPlan {
    return this.requirePlan();
  }

  /**
   * Run the graph until it reaches END or suspends at an interrupt edge.
   *
   * A state with pendingInterrupt set resumes at the interrupted edge's
   * target instead of the entry node. The state is mutated in place and
   * returned; call invoke() again on the same object to resume.
   */
  async invoke(state: S, stepLimit: number = this.options.stepLimit ?? DEFAULT_STEP_LIMIT): Promise<S> {
    const entry = this.requireEntry();
    resetDiagnostics(state);

    let current = state;
    let target: string;
    const resumed = takeInterrupt(current);
    if (resumed) {
      target = this.resolveResumeTarget(resumed.edge, resumed.node);
      this.logger.info(`${this.graphName} | Resuming <${resumed.edge}> at <${target}>`);
      this.emitEvent('graph:resume', resumed.edge, target);
    } else {
      target = entry;
      this.logger.debug(`${this.graphName} | Calling entry node <${target}>`);
    }

    const cycles = new CycleDetector(this.options.loopDetection);
    let steps = 0;

    while (target !== END) {
      const cycleCheck = cycles.record(target);
      if (cycleCheck.cycle && cycleCheck.shouldWarn) {
        this.logger.info(`${this.graphName} | ${ERROR_MESSAGES.LOOP_DETECTED(cycleCheck.cycle, cycleCheck.repeats)}`);
        this.emitEvent('graph:cycle', cycleCheck.cycle, cycleCheck.repeats);
      }
      if (cycleCheck.cycle && cycleCheck.shouldAbort) {
        const error = new LoopDetectedError(cycleCheck.cycle, cycleCheck.repeats);
        recordError(current, error.message);
        throw error;
      }

      steps++;
      const result = await this.step(current, target, steps);
      current = result.state;
      const { outcome } = result;

      switch (outcome.type) {
        case 'failed':
          if (!current.errorMessage) {
            recordError(current, outcome.error.message);
          }
          this.logger.error(`${this.graphName} | Step ${steps} failed`, { error: outcome.error.message });
          throw outcome.error;
        case 'suspended':
          return current;
        case 'terminated':
          this.logger.info(`${this.graphName} | Reached END after ${steps} steps`);
          this.emitEvent('graph:complete', current, steps);
          return current;
        case 'continue':
          if (steps > stepLimit) {
            const error = new StepLimitExceededError(stepLimit, outcome.edge, cycles.currentCycle());
            recordError(current, ERROR_MESSAGES.STEP_LIMIT_EXCEEDED(stepLimit));
            this.logger.error(`${this.graphName} | ERROR: ${current.errorMessage}`, {
              lastEdge: outcome.edge,
              cycle: error.cycle,
            });
            throw error;
          }
          target = outcome.target;
          break;
      }
    }

    // Resumed through an interrupt edge that targets END
    this.emitEvent('graph:complete', current, steps);
    return current;
  }

  /**
   * Dispatch a single node and report what happened.
   *
   * Never throws for graph errors; they are returned as a 'failed' outcome.
   */
  async step(state: S, nodeName: string, stepNumber = 1): Promise<StepResult<S>> {
    const node = this.registry.getNode(nodeName);
    if (!node) {
      return { state, outcome: { type: 'failed', error: new UnknownNodeError(nodeName) } };
    }

    this.logger.debug(`${this.graphName} | [${stepNumber}] --- Entering <${node.name}> ---`);
    this.emitEvent('node:start', node, stepNumber);

    let current = state;
    try {
      current = await this.runBody(node, current);

      let edge = resolveEdge(node, current);
      if (!edge) {
        throw new UndefinedEdgeError(node.name, current.currentEdge);
      }

      if (edge.completionCheck) {
        const checked = await runCompletionCheck(node, current, edge, {
          runBody: (retryState) => this.runBody(node, retryState),
          onRetry: (attempt, hint) => {
            this.logger.info(
              `${this.graphName} | Completion check failed at <${node.name}>, attempt ${attempt}: ${hint ?? ''}`,
            );
            this.emitEvent('node:retry', node, attempt, hint);
          },
        });
        current = checked.state;
        edge = checked.edge;
      }

      if (edge.eligibility.length > 0 && !isEdgeEligible(edge, current)) {
        throw new InvalidTransitionError(node.name, edge.name, availableTransitions(node, current));
      }

      current.currentEdge = edge.name;
      this.logger.debug(`${this.graphName} | [${stepNumber}] --- Exiting <${node.name} -> ${edge.name}> ---`);

      if (edge.interrupt) {
        markSuspended(current, node.name, edge.name);
        this.logger.info(`${this.graphName} | Interrupt raised at <${node.name}> via <${edge.name}>`);
        this.emitEvent('graph:suspend', node, edge.name, current);
        return { state: current, outcome: { type: 'suspended', edge: edge.name } };
      }

      clearInterrupt(current);
      this.logger.debug(`${this.graphName} | Edge ${node.name} -> ${edge.target} taken`);
      this.emitEvent('edge:taken', node.name, edge, edge.target);

      if (edge.target === END) {
        return { state: current, outcome: { type: 'terminated', edge: edge.name } };
      }
      return { state: current, outcome: { type: 'continue', edge: edge.name, target: edge.target } };
    } catch (error) {
      const graphError = error instanceof GraphError
        ? error
        : new NodeExecutionError(node.name, getErrorMessage(error), error);
      return { state: current, outcome: { type: 'failed', error: graphError } };
    }
  }

  /** Run a node body once, applying the node's error policy */
  private async runBody(node: NodeDefinition<S>, state: S): Promise<S> {
    state.currentEdge = undefined;
    try {
      return await node.body(state);
    } catch (error) {
      const message = getErrorMessage(error);
      recordError(
        state,
        ERROR_MESSAGES.NODE_EXECUTION_FAILED(node.name, message),
        error instanceof Error ? error.stack : undefined,
      );
      this.logger.error(`${this.graphName} | --- EXCEPTION <${node.name}> ---`, { error: message });
      this.emitEvent('node:error', node, error);

      if (node.onError.policy === 'error-edge') {
        state.currentEdge = node.onError.edge;
        return state;
      }
      throw new NodeExecutionError(node.name, message, error);
    }
  }

  private resolveResumeTarget(edgeName: string, nodeName: string | undefined): string {
    if (nodeName) {
      const edge = this.registry.getNode(nodeName)?.edges.get(edgeName);
      if (edge) {
        return edge.target;
      }
    }
    return edgeName;
  }

  private requirePlan(): ExecutionPlan {
    if (!this.plan || !this.registry.isReady()) {
      throw new NotCompiledError(this.graphName);
    }
    return this.plan;
  }

  private requireEntry(): string {
    if (this.entryNode === null || !this.registry.isReady()) {
      throw new NotCompiledError(this.graphName);
    }
    return this.entryNode;
  }

  private emitEvent<K extends keyof GraphEvents<S>>(
    event: K,
    ...args: Parameters<GraphEvents<S>[K]>
  ): void {
    this.emit(event, ...args);
  }
}
