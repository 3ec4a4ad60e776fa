/**
 * Extraction Strategies
 *
 * One strategy per supported analysis variant, plus the registry the exporter
 * dispatches through.
 */

export type { AnalysisExtractor, ExtractorDefinition } from './types.js';
export { defineExtractor } from './define.js';
export { PC_PREFIX, LAG_PC_PREFIX, numberedColumns } from './columns.js';
export { extractOrdination, ordinationExtractor } from './ordination.js';
export {
  extractDiscriminant,
  discriminantExtractor,
  GROUP_COLUMN,
  ASSIGNED_GROUP_COLUMN,
  SUPPORT_COLUMN,
} from './discriminant.js';
export { extractSpatial, spatialExtractor } from './spatial.js';
export { ExtractorRegistry, analysisClassNames, createDefaultRegistry } from './registry.js';
