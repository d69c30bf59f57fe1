/**
 * Graph definition files: parsing, handler binding and engine creation.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  ConfigValidationError,
  UnknownHandlerError,
  buildRegistry,
  createGraphFromDefinition,
  loadGraphDefinition,
  parseGraphDefinition,
} from '../infra/config/index.js';
import { END, StepLimitExceededError } from '../core/graph/index.js';
import { createTestLogger, createTestTmpDir, makeState, visit, type TraceState } from './graph-test-helpers.js';

const REVIEW_YAML = `
name: review
description: Draft, wait for approval, publish
nodes:
  - name: draft
    entry: true
    edges:
      - target: publish
        interrupt: true
  - name: publish
    body: publishDraft
    edges:
      - name: done
        target: END
        completion_check: published
        retry_budget: 2
`;

describe('graph definition loader', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = createTestTmpDir();
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('loadGraphDefinition', () => {
    it('should normalize names, targets and defaults', () => {
      const filePath = join(tmpDir, 'review.yaml');
      writeFileSync(filePath, REVIEW_YAML, 'utf-8');

      const definition = loadGraphDefinition(filePath);

      expect(definition).toEqual({
        name: 'review',
        description: 'Draft, wait for approval, publish',
        stepLimit: undefined,
        nodes: [
          {
            name: 'draft',
            description: undefined,
            entry: true,
            body: 'draft',
            onError: undefined,
            edges: [
              {
                name: 'publish',
                target: 'publish',
                description: undefined,
                interrupt: true,
                eligibility: [],
                completionCheck: undefined,
                retryBudget: undefined,
              },
            ],
          },
          {
            name: 'publish',
            description: undefined,
            entry: false,
            body: 'publishDraft',
            onError: undefined,
            edges: [
              {
                name: 'done',
                target: END,
                description: undefined,
                interrupt: false,
                eligibility: [],
                completionCheck: 'published',
                retryBudget: 2,
              },
            ],
          },
        ],
      });
    });

    it('should report a missing file', () => {
      const filePath = join(tmpDir, 'missing.yaml');

      expect(() => loadGraphDefinition(filePath)).toThrow(`Graph definition file not found: ${filePath}`);
    });

    it('should report malformed YAML as a validation error', () => {
      const filePath = join(tmpDir, 'broken.yaml');
      writeFileSync(filePath, 'name: [unclosed', 'utf-8');

      expect(() => loadGraphDefinition(filePath)).toThrow(ConfigValidationError);
    });
  });

  describe('parseGraphDefinition', () => {
    it('should reject a definition without nodes', () => {
      try {
        parseGraphDefinition({ name: 'empty', nodes: [] }, 'empty.yaml');
        expect.unreachable('parse should fail');
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigValidationError);
        if (err instanceof ConfigValidationError) {
          expect(err.filePath).toBe('empty.yaml');
          expect(err.issues).toHaveLength(1);
          expect(err.issues[0]?.startsWith('nodes: ')).toBe(true);
        }
      }
    });

    it('should reject an unknown error policy', () => {
      expect(() => parseGraphDefinition({
        name: 'bad',
        nodes: [{ name: 'a', entry: true, on_error: { policy: 'retry' } }],
      })).toThrow(ConfigValidationError);
    });

    it('should accept the raw END sentinel as a target', () => {
      const definition = parseGraphDefinition({
        name: 'short',
        nodes: [{ name: 'a', entry: true, edges: [{ target: END }] }],
      });

      expect(definition.nodes[0]?.edges[0]).toMatchObject({ name: END, target: END });
    });
  });

  describe('buildRegistry', () => {
    it('should fail on a body handler that is not provided', () => {
      const definition = parseGraphDefinition({
        name: 'single',
        nodes: [{ name: 'work', entry: true, edges: [{ target: 'END' }] }],
      });

      expect(() => buildRegistry<TraceState>(definition, { bodies: {} }))
        .toThrow(new UnknownHandlerError('body', 'work', 'work'));
      expect(() => buildRegistry<TraceState>(definition, { bodies: {} }))
        .toThrow('Node "work": unknown body handler "work"');
    });

    it('should fail on a predicate handler that is not provided', () => {
      const definition = parseGraphDefinition({
        name: 'gated',
        nodes: [{ name: 'gate', entry: true, edges: [{ target: 'END', eligibility: ['isReady'] }] }],
      });

      expect(() => buildRegistry<TraceState>(definition, { bodies: { gate: visit('gate') } }))
        .toThrow('Node "gate": unknown predicate handler "isReady"');
    });

    it('should apply the default retry budget to edges without one', () => {
      const definition = parseGraphDefinition({
        name: 'checked',
        nodes: [{ name: 'a', entry: true, edges: [{ target: 'END', completion_check: 'ok' }] }],
      });

      const registry = buildRegistry<TraceState>(
        definition,
        { bodies: { a: visit('a') }, completionChecks: { ok: (state) => ({ ok: true, state }) } },
        { retryBudget: 7 },
      );

      expect(registry.compile().nodes[0]?.edges[0]?.retryBudget).toBe(7);
    });
  });

  describe('createGraphFromDefinition', () => {
    it('should run a loaded graph through suspend and resume', async () => {
      const filePath = join(tmpDir, 'review.yaml');
      writeFileSync(filePath, REVIEW_YAML, 'utf-8');

      const engine = createGraphFromDefinition<TraceState>(loadGraphDefinition(filePath), {
        bodies: { draft: visit('draft'), publishDraft: visit('publish') },
        completionChecks: { published: (state) => ({ ok: true, state }) },
      }, { logger: createTestLogger() });

      const state = await engine.invoke(makeState());
      expect(state.pendingInterrupt).toBe('publish');

      const done = await engine.invoke(state);

      expect(engine.getName()).toBe('review');
      expect(done.visited).toEqual(['draft', 'publish']);
      expect(done.currentEdge).toBe('done');
    });

    it('should prefer the step limit declared in the definition', async () => {
      const definition = parseGraphDefinition({
        name: 'spin',
        step_limit: 2,
        nodes: [{ name: 'spin', entry: true, edges: [{ target: 'spin' }] }],
      });
      const engine = createGraphFromDefinition<TraceState>(
        definition,
        { bodies: { spin: visit('spin') } },
        { stepLimit: 50, logger: createTestLogger() },
      );
      const state = makeState();

      await expect(engine.invoke(state)).rejects.toBeInstanceOf(StepLimitExceededError);
      expect(state.count).toBe(3);
    });
  });
});
