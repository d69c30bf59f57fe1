/**
 * Graph inspection: validate and plan definition files.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { EngineConfig } from '../core/models/index.js';
import {
  formatPlanJson,
  formatPlanText,
  inspectGraphFile,
  planGraph,
  validateGraph,
} from '../features/inspect/index.js';
import { EXIT_COMPILE_FAILED, EXIT_DEFINITION_INVALID, EXIT_SUCCESS } from '../exitCodes.js';
import { createTestTmpDir } from './graph-test-helpers.js';

const CONFIG: EngineConfig = { stepLimit: 10, retryBudget: 5, logLevel: 'info', verbose: false };

const APPROVAL_YAML = `
name: approval
nodes:
  - name: draft
    entry: true
    description: Write a draft
    edges:
      - target: approve
        interrupt: true
  - name: approve
    edges:
      - name: accepted
        target: END
        completion_check: signed
        retry_budget: 3
      - name: rejected
        target: draft
`;

const DANGLING_YAML = `
name: dangling
nodes:
  - name: start
    entry: true
    edges:
      - target: missing
`;

describe('graph inspection', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = createTestTmpDir('stepgraph-inspect-');
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeGraph(name: string, content: string): string {
    const filePath = join(tmpDir, name);
    writeFileSync(filePath, content, 'utf-8');
    return filePath;
  }

  it('should render a compiled plan as text', () => {
    const result = inspectGraphFile(writeGraph('approval.yaml', APPROVAL_YAML), CONFIG);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(formatPlanText(result.plan)).toBe([
        'Graph: approval',
        'Entry: draft',
        '  0. draft (entry) - Write a draft',
        '    approve -> approve [interrupt]',
        '  1. approve',
        '    accepted -> END [check, budget 3]',
        '    rejected -> draft',
      ].join('\n'));
    }
  });

  it('should render a compiled plan as JSON', () => {
    const result = inspectGraphFile(writeGraph('approval.yaml', APPROVAL_YAML), CONFIG);

    expect(result.ok).toBe(true);
    if (result.ok) {
      const parsed: unknown = JSON.parse(formatPlanJson(result.plan));
      expect(parsed).toMatchObject({ name: 'approval', entry: 'draft' });
    }
  });

  it('should report the compile rule a definition breaks', () => {
    const result = inspectGraphFile(writeGraph('dangling.yaml', DANGLING_YAML), CONFIG);

    expect(result).toEqual({
      ok: false,
      stage: 'compile',
      rule: 'dangling-target',
      message: 'Edge<missing> (start->missing): target not found in nodes',
    });
  });

  it('should report an unreadable definition', () => {
    const result = inspectGraphFile(join(tmpDir, 'absent.yaml'), CONFIG);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.stage).toBe('definition');
    }
  });

  it('should map outcomes to exit codes', () => {
    expect(validateGraph(writeGraph('approval.yaml', APPROVAL_YAML), CONFIG)).toBe(EXIT_SUCCESS);
    expect(validateGraph(writeGraph('dangling.yaml', DANGLING_YAML), CONFIG)).toBe(EXIT_COMPILE_FAILED);
    expect(planGraph(join(tmpDir, 'absent.yaml'), CONFIG, 'json')).toBe(EXIT_DEFINITION_INVALID);
  });

  it('should print the plan as JSON on stdout', () => {
    planGraph(writeGraph('approval.yaml', APPROVAL_YAML), CONFIG, 'json');

    const printed = vi.mocked(console.log).mock.calls[0]?.[0];
    expect(typeof printed).toBe('string');
    expect(JSON.parse(String(printed))).toMatchObject({ name: 'approval', nodes: [{ name: 'draft' }, { name: 'approve' }] });
  });
});
