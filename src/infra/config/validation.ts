/**
 * Shared helpers for validating YAML documents against zod schemas
 */

import type { z } from 'zod/v4';

/** Raised when a config or definition file cannot be read or does not validate */
export class ConfigValidationError extends Error {
  readonly filePath: string;
  readonly issues: string[];

  constructor(filePath: string, issues: string[], options?: { cause?: unknown }) {
    super(`Invalid ${filePath}:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`, options);
    this.name = 'ConfigValidationError';
    this.filePath = filePath;
    this.issues = issues;
  }
}

/** One line per issue, prefixed with its dotted path (e.g. "nodes.0.name: Required") */
export function formatSchemaIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.map(String).join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
