/**
 * Graph definition inspection: validate a YAML definition and render
 * its compiled execution plan.
 *
 * Handlers are bound to pass-throughs, so only the structure is checked.
 */

import chalk from 'chalk';
import type { EngineConfig, ExecutionPlan, PlanEdge, PlanNode } from '../../core/models/index.js';
import { CompileError, END, GraphEngine } from '../../core/graph/index.js';
import type { CompileRule } from '../../core/graph/index.js';
import {
  buildStructuralRegistry,
  loadGraphDefinition,
} from '../../infra/config/index.js';
import type { GraphDefinition } from '../../infra/config/index.js';
import { createLogger, getErrorMessage } from '../../shared/utils/index.js';

const log = createLogger('inspect');

export type InspectionResult =
  | { ok: true; plan: ExecutionPlan }
  | { ok: false; stage: 'definition'; message: string }
  | { ok: false; stage: 'compile'; rule: CompileRule; message: string };

/**
 * Load a definition file and compile its structure.
 *
 * A bad file is reported in the result rather than thrown.
 */
export function inspectGraphFile(filePath: string, config: EngineConfig): InspectionResult {
  let definition: GraphDefinition;
  try {
    definition = loadGraphDefinition(filePath);
  } catch (err) {
    log.error('Failed to load graph definition', { filePath, error: getErrorMessage(err) });
    return { ok: false, stage: 'definition', message: getErrorMessage(err) };
  }

  const registry = buildStructuralRegistry(definition, { retryBudget: config.retryBudget });
  const engine = new GraphEngine(registry, { name: definition.name });
  try {
    return { ok: true, plan: engine.compile() };
  } catch (err) {
    if (err instanceof CompileError) {
      log.error('Graph failed to compile', { filePath, rule: err.rule, error: err.message });
      return { ok: false, stage: 'compile', rule: err.rule, message: err.message };
    }
    throw err;
  }
}

function displayTarget(target: string): string {
  return target === END ? 'END' : target;
}

function formatEdge(edge: PlanEdge): string {
  const flags: string[] = [];
  if (edge.interrupt) {
    flags.push('interrupt');
  }
  if (edge.hasCompletionCheck) {
    flags.push(`check, budget ${edge.retryBudget}`);
  }
  const suffix = flags.length > 0 ? ` [${flags.join('; ')}]` : '';
  return `    ${edge.name} -> ${displayTarget(edge.target)}${suffix}`;
}

function formatNode(node: PlanNode): string[] {
  const entry = node.isEntry ? ' (entry)' : '';
  const description = node.description ? ` - ${node.description}` : '';
  return [`  ${node.index}. ${node.name}${entry}${description}`, ...node.edges.map(formatEdge)];
}

/** Plain-text rendering of a compiled plan, one line per node and edge */
export function formatPlanText(plan: ExecutionPlan): string {
  return [
    `Graph: ${plan.name}`,
    `Entry: ${plan.entry}`,
    ...plan.nodes.flatMap(formatNode),
  ].join('\n');
}

/** JSON rendering with END targets kept as the raw sentinel */
export function formatPlanJson(plan: ExecutionPlan): string {
  return JSON.stringify(plan, null, 2);
}

/** Colored variant of formatPlanText for terminals */
export function formatPlanPretty(plan: ExecutionPlan): string {
  const lines = [
    chalk.bold(`Graph: ${plan.name}`),
    `${chalk.gray('Entry')}: ${chalk.cyan(plan.entry)}`,
  ];
  for (const node of plan.nodes) {
    const [head, ...edges] = formatNode(node);
    lines.push(node.isEntry ? chalk.cyan(head ?? '') : (head ?? ''));
    for (const edge of edges) {
      lines.push(chalk.gray(edge));
    }
  }
  return lines.join('\n');
}
