/**
 * CLI subcommand definitions
 *
 * Registers the named subcommands (validate, plan, config).
 */

import { InvalidArgumentError } from 'commander';
import { planGraph, showConfig, validateGraph, parsePlanFormat, type PlanFormat } from '../../features/inspect/index.js';
import { program, requireConfig, resolvedCwd } from './program.js';

function parseFormatOption(value: string): PlanFormat {
  const format = parsePlanFormat(value);
  if (!format) {
    throw new InvalidArgumentError('Expected "text" or "json".');
  }
  return format;
}

program
  .command('validate')
  .description('Check that a graph definition file compiles')
  .argument('<file>', 'Path to a graph definition (YAML)')
  .action((file: string) => {
    process.exitCode = validateGraph(file, requireConfig());
  });

program
  .command('plan')
  .description('Print the compiled execution plan of a graph definition')
  .argument('<file>', 'Path to a graph definition (YAML)')
  .option('-f, --format <format>', 'Output format (text|json)', parseFormatOption, 'text')
  .action((file: string, opts: { format: PlanFormat }) => {
    process.exitCode = planGraph(file, requireConfig(), opts.format);
  });

program
  .command('config')
  .description('Show the effective engine configuration')
  .action(() => {
    process.exitCode = showConfig(resolvedCwd, requireConfig());
  });
