/**
 * Process exit codes for the stepgraph CLI
 *
 * Distinct codes let scripts tell a bad definition file
 * from a graph that loads but does not compile.
 */

export const EXIT_SUCCESS = 0;
export const EXIT_GENERAL_ERROR = 1;
export const EXIT_DEFINITION_INVALID = 2;
export const EXIT_COMPILE_FAILED = 3;
