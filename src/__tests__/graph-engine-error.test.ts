/**
 * GraphEngine: node failures, completion checks, eligibility and cycle detection.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  END,
  GraphEngine,
  InvalidTransitionError,
  LoopDetectedError,
  NodeExecutionError,
  NodeRegistry,
  RetryExhaustedError,
  StepLimitExceededError,
  findTrailingCycle,
} from '../core/graph/index.js';
import type { CompletionCheck } from '../core/models/index.js';
import { createTestLogger, makeState, visit, type TraceState } from './graph-test-helpers.js';

describe('GraphEngine error handling', () => {
  let logger: ReturnType<typeof createTestLogger>;

  beforeEach(() => {
    logger = createTestLogger();
  });

  describe('node error policy', () => {
    it('should fail fast and keep the original error as cause', async () => {
      const boom = new Error('boom');
      const registry = new NodeRegistry<TraceState>()
        .addNode('explode', () => {
          throw boom;
        }, { entry: true })
        .addEdge('explode', 'done', END);
      const engine = new GraphEngine(registry, { logger });
      engine.compile();
      const state = makeState();

      const error = await engine.invoke(state).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(NodeExecutionError);
      expect(error).toHaveProperty('message', 'Node "explode" failed: boom');
      expect(error).toHaveProperty('cause', boom);
      expect(state.errorMessage?.startsWith('Node "explode" failed: boom\n\n')).toBe(true);
      expect(state.errorMessage).toContain(boom.stack ?? '');
    });

    it('should fail fast on a rejected async body', async () => {
      const registry = new NodeRegistry<TraceState>()
        .addNode('fetch', async () => {
          throw new Error('timeout');
        }, { entry: true })
        .addEdge('fetch', 'done', END);
      const engine = new GraphEngine(registry, { logger });
      engine.compile();

      await expect(engine.invoke(makeState())).rejects.toThrow('Node "fetch" failed: timeout');
    });

    it('should follow the error edge when the node declares one', async () => {
      const registry = new NodeRegistry<TraceState>()
        .addNode('work', (state) => {
          state.visited.push('work');
          throw new Error('disk full');
        }, { entry: true, onError: { policy: 'error-edge', edge: 'failed' } })
        .addNode('cleanup', visit('cleanup'))
        .addEdge('work', 'ok', END)
        .addEdge('work', 'failed', 'cleanup')
        .addEdge('cleanup', 'done', END);
      const engine = new GraphEngine(registry, { logger });
      engine.compile();
      const failures: string[] = [];
      engine.on('node:error', (node: { name: string }) => failures.push(node.name));

      const result = await engine.invoke(makeState());

      expect(result.visited).toEqual(['work', 'cleanup']);
      expect(result.currentEdge).toBe('done');
      expect(result.errorMessage?.startsWith('Node "work" failed: disk full')).toBe(true);
      expect(failures).toEqual(['work']);
    });
  });

  describe('completion checks', () => {
    function checkedRegistry(check: CompletionCheck<TraceState>, retryBudget?: number): NodeRegistry<TraceState> {
      return new NodeRegistry<TraceState>()
        .addNode('write', visit('write', 'submit'), { entry: true })
        .addEdge('write', 'submit', END, { completionCheck: check, retryBudget });
    }

    it('should re-run the node until the check passes', async () => {
      const engine = new GraphEngine(
        checkedRegistry((state) => ({ ok: state.count >= 3, state, hint: 'add a summary' })),
        { logger },
      );
      engine.compile();
      const retries: Array<[number, string | undefined]> = [];
      engine.on('node:retry', (_node: unknown, attempt: number, hint: string | undefined) => retries.push([attempt, hint]));

      const result = await engine.invoke(makeState());

      expect(result.count).toBe(3);
      expect(result.retryHint).toBeUndefined();
      expect(retries).toEqual([[1, 'add a summary'], [2, 'add a summary']]);
    });

    it('should expose the hint to the re-run body', async () => {
      const hintsSeen: Array<string | undefined> = [];
      const registry = new NodeRegistry<TraceState>()
        .addNode('write', (state) => {
          hintsSeen.push(state.retryHint);
          state.count++;
          return state;
        }, { entry: true })
        .addEdge('write', 'submit', END, {
          completionCheck: (state) => ({ ok: state.count > 1, state, hint: 'be specific' }),
        });
      const engine = new GraphEngine(registry, { logger });
      engine.compile();

      await engine.invoke(makeState());

      expect(hintsSeen).toEqual([undefined, 'be specific']);
    });

    it('should give up once the retry budget of failed checks is spent', async () => {
      const engine = new GraphEngine(
        checkedRegistry((state) => ({ ok: false, state, hint: 'still wrong' }), 2),
        { logger },
      );
      engine.compile();
      const state = makeState();

      const error = await engine.invoke(state).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RetryExhaustedError);
      expect(error).toHaveProperty('message', 'Completion check failed for node "write" after 2 attempts');
      expect(error).toHaveProperty('attempts', 2);
      expect(state.count).toBe(2);
      expect(state.retryHint).toBe('still wrong');
      expect(state.errorMessage).toBe('Completion check failed for node "write" after 2 attempts');
    });

    it('should use a budget of five by default', async () => {
      const engine = new GraphEngine(checkedRegistry((state) => ({ ok: false, state })), { logger });
      engine.compile();
      const state = makeState();

      await expect(engine.invoke(state)).rejects.toBeInstanceOf(RetryExhaustedError);
      expect(state.count).toBe(5);
    });

    it('should accept an async check', async () => {
      const engine = new GraphEngine(
        checkedRegistry(async (state) => ({ ok: state.count === 2, state })),
        { logger },
      );
      engine.compile();

      const result = await engine.invoke(makeState());

      expect(result.count).toBe(2);
    });
  });

  describe('eligibility predicates', () => {
    function gatedRegistry(): NodeRegistry<TraceState> {
      return new NodeRegistry<TraceState>()
        .addNode('gate', visit('gate', 'open'), { entry: true })
        .addEdge('gate', 'open', END, { eligibility: [(state) => state.count > 5] })
        .addEdge('gate', 'wait', END);
    }

    it('should reject a selected edge whose predicate fails', async () => {
      const engine = new GraphEngine(gatedRegistry(), { logger });
      engine.compile();

      const error = await engine.invoke(makeState()).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(InvalidTransitionError);
      expect(error).toHaveProperty('message', 'Invalid transition: gate -> open');
      expect(error).toHaveProperty('available', ['wait']);
    });

    it('should take the edge when every predicate holds', async () => {
      const engine = new GraphEngine(gatedRegistry(), { logger });
      engine.compile();

      const result = await engine.invoke(makeState(10));

      expect(result.currentEdge).toBe('open');
    });
  });

  describe('cycle detection', () => {
    function spinRegistry(): NodeRegistry<TraceState> {
      return new NodeRegistry<TraceState>()
        .addNode('spin', visit('spin', 'again'), { entry: true })
        .addEdge('spin', 'again', 'spin');
    }

    function pingPongRegistry(): NodeRegistry<TraceState> {
      return new NodeRegistry<TraceState>()
        .addNode('ping', visit('ping', 'to-pong'), { entry: true })
        .addNode('pong', visit('pong', 'to-ping'))
        .addEdge('ping', 'to-pong', 'pong')
        .addEdge('pong', 'to-ping', 'ping');
    }

    it('should find the shortest block the end of the trail repeats', () => {
      expect(findTrailingCycle(['x', 'a', 'b', 'a', 'b'])).toEqual({ nodes: ['a', 'b'], repeats: 2, span: 4 });
      expect(findTrailingCycle(['x', 'a', 'a', 'a'])).toEqual({ nodes: ['a'], repeats: 3, span: 3 });
      expect(findTrailingCycle(['a', 'b', 'c'])).toBeUndefined();
    });

    it('should abort when one node keeps re-running itself', async () => {
      const engine = new GraphEngine(spinRegistry(), {
        logger,
        loopDetection: { maxCycleRepeats: 2, action: 'abort' },
      });
      engine.compile();
      const state = makeState();

      const error = await engine.invoke(state).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(LoopDetectedError);
      expect(error).toHaveProperty('cycle', ['spin']);
      expect(state.count).toBe(2);
      expect(state.errorMessage).toBe('Cycle detected: spin -> spin entered 3 times in a row');
    });

    it('should abort on a ping-pong between two nodes', async () => {
      const engine = new GraphEngine(pingPongRegistry(), {
        logger,
        stepLimit: 20,
        loopDetection: { maxCycleRepeats: 2, action: 'abort' },
      });
      engine.compile();
      const state = makeState();

      const error = await engine.invoke(state).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(LoopDetectedError);
      expect(error).toHaveProperty('message', 'Cycle detected: ping -> pong -> ping entered 3 times in a row');
      expect(error).toHaveProperty('repeats', 3);
      expect(state.visited).toEqual(['ping', 'pong', 'ping', 'pong', 'ping']);
    });

    it('should only warn by default, once per pass', async () => {
      const engine = new GraphEngine(spinRegistry(), {
        logger,
        loopDetection: { maxCycleRepeats: 2 },
      });
      engine.compile();
      const passes: Array<[string, number]> = [];
      engine.on('graph:cycle', (cycle: readonly string[], repeats: number) => passes.push([cycle.join(','), repeats]));

      await expect(engine.invoke(makeState(), 3)).rejects.toThrow('Step limit 3');
      expect(passes).toEqual([['spin', 3], ['spin', 4]]);
    });

    it('should name the cycle when the step limit stops a ping-pong', async () => {
      const engine = new GraphEngine(pingPongRegistry(), { logger });
      engine.compile();

      const error = await engine.invoke(makeState(), 3).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(StepLimitExceededError);
      expect(error).toHaveProperty(
        'message',
        'Step limit 3 reached without hitting END (last edge: to-ping; cycle: ping -> pong -> ping)',
      );
      expect(error).toHaveProperty('cycle', ['ping', 'pong']);
    });

    it('should stay silent when the action is ignore', async () => {
      const engine = new GraphEngine(spinRegistry(), {
        logger,
        loopDetection: { maxCycleRepeats: 1, action: 'ignore' },
      });
      engine.compile();
      const passes: number[] = [];
      engine.on('graph:cycle', (_cycle: readonly string[], repeats: number) => passes.push(repeats));

      await expect(engine.invoke(makeState(), 3)).rejects.toBeInstanceOf(StepLimitExceededError);
      expect(passes).toEqual([]);
    });
  });
});
