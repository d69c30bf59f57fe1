/**
 * Graph inspection feature
 */

export {
  inspectGraphFile,
  formatPlanText,
  formatPlanJson,
  formatPlanPretty,
  type InspectionResult,
} from './inspectGraph.js';
export {
  validateGraph,
  planGraph,
  showConfig,
  parsePlanFormat,
  type PlanFormat,
} from './commands.js';
