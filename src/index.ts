/**
 * stepgraph - declarative workflow graph engine
 *
 * This module exports the public API for programmatic usage.
 */

// Models
export * from './core/models/index.js';

// Graph registry, engine and router
export * from './core/graph/index.js';

// Configuration and graph definition files
export * from './infra/config/index.js';

// Inspection
export {
  inspectGraphFile,
  formatPlanText,
  formatPlanJson,
  type InspectionResult,
} from './features/inspect/index.js';

// Logging
export {
  createLogger,
  initDebugLogger,
  setVerboseConsole,
  getErrorMessage,
  type ScopedLogger,
} from './shared/utils/index.js';
