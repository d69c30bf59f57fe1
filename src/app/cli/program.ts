/**
 * Commander program setup
 *
 * Creates the Command instance, registers global options,
 * and sets up the preAction hook that loads project configuration
 * and initializes logging.
 */

import { createRequire } from 'node:module';
import { resolve } from 'node:path';
import { Command } from 'commander';
import type { EngineConfig } from '../../core/models/index.js';
import { loadEngineConfig } from '../../infra/config/index.js';
import { setLogLevel } from '../../shared/ui/index.js';
import { initDebugLogger, createLogger, setVerboseConsole } from '../../shared/utils/index.js';

const require = createRequire(import.meta.url);
const { version: cliVersion } = require('../../../package.json') as { version: string };

const log = createLogger('cli');

/** Resolved cwd shared across commands via preAction hook */
export let resolvedCwd = '';

/** Effective engine configuration, loaded in preAction */
export let resolvedConfig: EngineConfig | null = null;

export { cliVersion };

export const program = new Command();

program
  .name('stepgraph')
  .description('Inspect and validate declarative workflow graphs')
  .version(cliVersion);

program
  .option('-v, --verbose', 'Print trace logs to stderr')
  .option('-C, --cwd <dir>', 'Project directory (defaults to the current directory)');

program.hook('preAction', () => {
  const rootOpts = program.opts<{ verbose?: boolean; cwd?: string }>();
  resolvedCwd = resolve(rootOpts.cwd ?? process.cwd());

  const config = loadEngineConfig(resolvedCwd);
  const verbose = rootOpts.verbose === true || config.verbose;
  resolvedConfig = { ...config, verbose };

  let debugConfig = config.debug;
  if (verbose && !debugConfig?.enabled) {
    debugConfig = { enabled: true };
  }
  initDebugLogger(debugConfig, resolvedCwd);

  if (verbose) {
    setVerboseConsole(true);
    setLogLevel('debug');
  } else {
    setLogLevel(config.logLevel);
  }

  log.info('stepgraph CLI starting', { version: cliVersion, cwd: resolvedCwd, verbose });
});

/** Configuration loaded by the preAction hook */
export function requireConfig(): EngineConfig {
  if (!resolvedConfig) {
    throw new Error('Configuration has not been loaded');
  }
  return resolvedConfig;
}
