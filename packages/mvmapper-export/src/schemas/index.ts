/**
 * Schema Exports
 */

export {
  ScoreMatrixSchema,
  GroupLabelSchema,
  OrdinationResultSchema,
  DiscriminantResultSchema,
  SpatialComponentResultSchema,
  parseAnalysisResult,
} from './analysis.js';
