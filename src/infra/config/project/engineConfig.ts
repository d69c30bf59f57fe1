/**
 * Project-level engine configuration
 *
 * Reads .stepgraph/config.yaml, applies STEPGRAPH_* environment
 * overrides, validates the result and normalizes it to EngineConfig.
 */

import { existsSync, readFileSync } from 'node:fs';
import { parse } from 'yaml';
import { EngineConfigRawSchema } from '../../../core/models/index.js';
import type { EngineConfig } from '../../../core/models/index.js';
import type { GraphEngineOptions, GraphLogger } from '../../../core/graph/index.js';
import { getErrorMessage } from '../../../shared/utils/index.js';
import { applyEngineConfigEnvOverrides } from '../env/config-env-overrides.js';
import { getProjectConfigPath } from '../paths.js';
import { ConfigValidationError, formatSchemaIssues } from '../validation.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readRawConfig(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigValidationError(configPath, [getErrorMessage(err)], { cause: err });
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigValidationError(configPath, ['config root must be a mapping']);
  }
  return parsed;
}

/**
 * Load the effective engine configuration for a project.
 *
 * A missing file yields the defaults; an unreadable or invalid file throws
 * ConfigValidationError.
 */
export function loadEngineConfig(
  projectDir: string,
  env: NodeJS.ProcessEnv = process.env,
): EngineConfig {
  const configPath = getProjectConfigPath(projectDir);
  const raw = readRawConfig(configPath);

  try {
    applyEngineConfigEnvOverrides(raw, env);
  } catch (err) {
    throw new ConfigValidationError(configPath, [getErrorMessage(err)], { cause: err });
  }

  const result = EngineConfigRawSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(configPath, formatSchemaIssues(result.error));
  }

  const parsed = result.data;
  const config: EngineConfig = {
    stepLimit: parsed.step_limit,
    retryBudget: parsed.retry_budget,
    logLevel: parsed.log_level,
    verbose: parsed.verbose,
  };
  if (parsed.debug) {
    config.debug = {
      enabled: parsed.debug.enabled,
      logFile: parsed.debug.log_file,
    };
  }
  if (parsed.loop_detection) {
    config.loopDetection = {
      maxCycleRepeats: parsed.loop_detection.max_cycle_repeats,
      action: parsed.loop_detection.action,
    };
  }
  return config;
}

/** Map engine config to GraphEngine constructor options */
export function resolveEngineOptions(
  config: EngineConfig,
  overrides: { name?: string; logger?: GraphLogger } = {},
): GraphEngineOptions {
  return {
    name: overrides.name,
    logger: overrides.logger,
    stepLimit: config.stepLimit,
    loopDetection: config.loopDetection,
  };
}
