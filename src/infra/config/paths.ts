/**
 * Path utilities for stepgraph configuration
 */

import { join, resolve } from 'node:path';

/** Project config directory (.stepgraph in project) */
export function getProjectConfigDir(projectDir: string): string {
  return join(resolve(projectDir), '.stepgraph');
}

/** Project config file path */
export function getProjectConfigPath(projectDir: string): string {
  return join(getProjectConfigDir(projectDir), 'config.yaml');
}
