/**
 * Config module - exports all configuration utilities
 */

export * from './paths.js';
export * from './validation.js';
export * from './loaders/index.js';
export * from './project/index.js';
export {
  envVarNameFromPath,
  engineConfigEnvVarNames,
  applyEngineConfigEnvOverrides,
} from './env/config-env-overrides.js';
