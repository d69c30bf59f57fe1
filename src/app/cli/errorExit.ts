/**
 * Maps errors that escape a command to a process exit code.
 */

import { ConfigValidationError } from '../../infra/config/index.js';
import { EXIT_DEFINITION_INVALID, EXIT_GENERAL_ERROR } from '../../exitCodes.js';

export function exitCodeForError(err: unknown): number {
  if (err instanceof ConfigValidationError) {
    return EXIT_DEFINITION_INVALID;
  }
  return EXIT_GENERAL_ERROR;
}
