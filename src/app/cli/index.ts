#!/usr/bin/env node

/**
 * stepgraph CLI entry point
 *
 * Import order matters: program setup → commands → parse.
 */

import { program } from './program.js';
import './commands.js';
import { describeErrorChain } from '../../shared/utils/index.js';
import { error as logError } from '../../shared/ui/index.js';
import { exitCodeForError } from './errorExit.js';

program.parseAsync().catch((err: unknown) => {
  logError(describeErrorChain(err));
  process.exit(exitCodeForError(err));
});
