/**
 * Core type exports
 */

export type { CellValue, TableRow, Table, MetadataInput, ExportTable } from './table.js';

export type {
  ScoreMatrix,
  GroupLabel,
  OrdinationResult,
  DiscriminantResult,
  SpatialComponentResult,
  AnalysisResult,
  AnalysisKind,
  AnalysisObject,
} from './analysis.js';
