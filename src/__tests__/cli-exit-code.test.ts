/**
 * Exit codes for errors that escape a CLI command.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { exitCodeForError } from '../app/cli/errorExit.js';
import { getProjectConfigPath, loadEngineConfig } from '../infra/config/index.js';
import { EXIT_DEFINITION_INVALID, EXIT_GENERAL_ERROR } from '../exitCodes.js';
import { createTestTmpDir } from './graph-test-helpers.js';

describe('exitCodeForError', () => {
  let projectDir: string | undefined;

  afterEach(() => {
    if (projectDir) {
      rmSync(projectDir, { recursive: true, force: true });
      projectDir = undefined;
    }
  });

  it('should report an invalid project config as an invalid definition', () => {
    projectDir = createTestTmpDir('stepgraph-cli-');
    mkdirSync(join(projectDir, '.stepgraph'), { recursive: true });
    writeFileSync(getProjectConfigPath(projectDir), 'step_limit: zero\n', 'utf-8');
    const dir = projectDir;

    const error = (() => {
      try {
        loadEngineConfig(dir, {});
        return undefined;
      } catch (err) {
        return err;
      }
    })();

    expect(exitCodeForError(error)).toBe(EXIT_DEFINITION_INVALID);
    expect(EXIT_DEFINITION_INVALID).toBe(2);
  });

  it('should report anything else as a general error', () => {
    expect(exitCodeForError(new Error('boom'))).toBe(EXIT_GENERAL_ERROR);
    expect(exitCodeForError('not an error')).toBe(1);
  });
});
