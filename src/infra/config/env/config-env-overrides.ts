/**
 * Environment variable overrides for .stepgraph/config.yaml
 *
 * Each config path maps to STEPGRAPH_<PATH> (e.g. step_limit ->
 * STEPGRAPH_STEP_LIMIT, loop_detection.action -> STEPGRAPH_LOOP_DETECTION_ACTION).
 * Values are parsed by declared type and written into the raw config
 * object before schema validation.
 */

type EnvValueType = 'string' | 'boolean' | 'number' | 'json';

interface EnvSpec {
  path: string;
  type: EnvValueType;
}

export const ENV_PREFIX = 'STEPGRAPH';

function normalizeEnvSegment(segment: string): string {
  return segment
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/[^a-zA-Z0-9]+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '')
    .toUpperCase();
}

export function envVarNameFromPath(path: string): string {
  const key = path
    .split('.')
    .map(normalizeEnvSegment)
    .filter((segment) => segment.length > 0)
    .join('_');
  return `${ENV_PREFIX}_${key}`;
}

function parseEnvValue(envKey: string, raw: string, type: EnvValueType): unknown {
  if (type === 'string') {
    return raw;
  }
  if (type === 'boolean') {
    const normalized = raw.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
    throw new Error(`${envKey} must be one of: true, false`);
  }
  if (type === 'number') {
    const value = Number(raw.trim());
    if (raw.trim() === '' || !Number.isFinite(value)) {
      throw new Error(`${envKey} must be a number`);
    }
    return value;
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new Error(`${envKey} must be valid JSON`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setNested(target: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.').filter((part) => part.length > 0);
  const leaf = parts.pop();
  if (!leaf) return;

  let current = target;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[leaf] = value;
}

function applyEnvOverrides(
  target: Record<string, unknown>,
  specs: readonly EnvSpec[],
  env: NodeJS.ProcessEnv,
): void {
  for (const spec of specs) {
    const envKey = envVarNameFromPath(spec.path);
    const raw = env[envKey];
    if (raw === undefined) continue;
    setNested(target, spec.path, parseEnvValue(envKey, raw, spec.type));
  }
}

const ENGINE_ENV_SPECS: readonly EnvSpec[] = [
  { path: 'step_limit', type: 'number' },
  { path: 'retry_budget', type: 'number' },
  { path: 'log_level', type: 'string' },
  { path: 'verbose', type: 'boolean' },
  { path: 'debug', type: 'json' },
  { path: 'debug.enabled', type: 'boolean' },
  { path: 'debug.log_file', type: 'string' },
  { path: 'loop_detection', type: 'json' },
  { path: 'loop_detection.max_cycle_repeats', type: 'number' },
  { path: 'loop_detection.action', type: 'string' },
];

/** Names of every environment variable the engine config honours */
export function engineConfigEnvVarNames(): string[] {
  return ENGINE_ENV_SPECS.map((spec) => envVarNameFromPath(spec.path));
}

export function applyEngineConfigEnvOverrides(
  target: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): void {
  applyEnvOverrides(target, ENGINE_ENV_SPECS, env);
}
