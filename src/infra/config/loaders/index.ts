/**
 * Configuration loaders - barrel exports
 */

export {
  parseGraphDefinition,
  loadGraphDefinition,
  buildRegistry,
  buildStructuralRegistry,
  createGraphFromDefinition,
  UnknownHandlerError,
  type GraphDefinition,
  type GraphNodeSpec,
  type GraphEdgeSpec,
  type GraphHandlers,
  type BuildRegistryOptions,
} from './graphLoader.js';
