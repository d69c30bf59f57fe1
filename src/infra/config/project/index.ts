/**
 * Project configuration - barrel exports
 */

export {
  loadEngineConfig,
  resolveEngineOptions,
} from './engineConfig.js';
