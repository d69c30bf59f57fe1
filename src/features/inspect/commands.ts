/**
 * Inspection commands: print results and return a process exit code.
 */

import type { EngineConfig } from '../../core/models/index.js';
import { DEFAULT_LOOP_DETECTION } from '../../core/graph/index.js';
import { engineConfigEnvVarNames, getProjectConfigPath } from '../../infra/config/index.js';
import { error as logError, header, info, list, status, success } from '../../shared/ui/index.js';
import { EXIT_COMPILE_FAILED, EXIT_DEFINITION_INVALID, EXIT_SUCCESS } from '../../exitCodes.js';
import { formatPlanJson, formatPlanPretty, inspectGraphFile, type InspectionResult } from './inspectGraph.js';

export type PlanFormat = 'text' | 'json';

export function parsePlanFormat(input: string): PlanFormat | null {
  return input === 'text' || input === 'json' ? input : null;
}

function failureExitCode(result: Exclude<InspectionResult, { ok: true }>): number {
  return result.stage === 'compile' ? EXIT_COMPILE_FAILED : EXIT_DEFINITION_INVALID;
}

function reportFailure(filePath: string, result: Exclude<InspectionResult, { ok: true }>): number {
  if (result.stage === 'compile') {
    logError(`${filePath}: ${result.rule}: ${result.message}`);
  } else {
    logError(result.message);
  }
  return failureExitCode(result);
}

/** `stepgraph validate <file>` */
export function validateGraph(filePath: string, config: EngineConfig): number {
  const result = inspectGraphFile(filePath, config);
  if (!result.ok) {
    return reportFailure(filePath, result);
  }
  const edgeCount = result.plan.nodes.reduce((sum, node) => sum + node.edges.length, 0);
  success(`${filePath}: OK (${result.plan.nodes.length} nodes, ${edgeCount} edges, entry "${result.plan.entry}")`);
  return EXIT_SUCCESS;
}

/** `stepgraph plan <file>` */
export function planGraph(filePath: string, config: EngineConfig, format: PlanFormat): number {
  const result = inspectGraphFile(filePath, config);
  if (!result.ok) {
    return reportFailure(filePath, result);
  }
  console.log(format === 'json' ? formatPlanJson(result.plan) : formatPlanPretty(result.plan));
  return EXIT_SUCCESS;
}

/** `stepgraph config` */
export function showConfig(projectDir: string, config: EngineConfig): number {
  header('Engine configuration');
  status('Config file', getProjectConfigPath(projectDir));
  status('Step limit', String(config.stepLimit));
  status('Retry budget', String(config.retryBudget));
  status('Log level', config.logLevel);
  status('Verbose', String(config.verbose), config.verbose ? 'yellow' : undefined);
  status('Debug log', config.debug?.enabled ? (config.debug.logFile ?? 'default location') : 'off');
  const action = config.loopDetection?.action ?? DEFAULT_LOOP_DETECTION.action;
  const threshold = config.loopDetection?.maxCycleRepeats ?? DEFAULT_LOOP_DETECTION.maxCycleRepeats;
  status('Cycle detection', `${action} after ${threshold} passes`);
  info('Environment overrides:');
  list(engineConfigEnvVarNames());
  return EXIT_SUCCESS;
}
