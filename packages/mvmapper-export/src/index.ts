/**
 * mvmapper-export
 *
 * Flattens multivariate analysis results (dudi ordinations, DAPC, sPCA) and
 * per-entity location metadata into the table format read by mvMapper.
 *
 * @example
 * ```typescript
 * import { exportToMvmapper } from 'mvmapper-export';
 *
 * const table = exportToMvmapper(dapcResult, locations, { writeFile: false });
 * ```
 */

// Exporter
export {
  exportToMvmapper,
  exportWithReport,
  type ExportOptions,
  type ExportReport,
} from './services/mvmapper-exporter.js';

// Types
export type {
  CellValue,
  TableRow,
  Table,
  MetadataInput,
  ExportTable,
  ScoreMatrix,
  GroupLabel,
  OrdinationResult,
  DiscriminantResult,
  SpatialComponentResult,
  AnalysisResult,
  AnalysisKind,
  AnalysisObject,
} from './core/types/index.js';

// Errors
export {
  MvmapperExportError,
  UnsupportedAnalysisTypeError,
  MalformedAnalysisResultError,
  MissingColumnError,
  IOFailureError,
  isMvmapperExportError,
  isUnsupportedAnalysisTypeError,
  isMalformedAnalysisResultError,
  isMissingColumnError,
  isIOFailureError,
  type ExportErrorCode,
} from './core/errors.js';

// Tables
export {
  KEY_COLUMN,
  toTable,
  innerJoin,
  keyString,
  compareKeys,
  columnValues,
  hasColumn,
  headTable,
} from './core/table.js';

// Extraction strategies
export * from './extractors/index.js';

// Schemas
export * from './schemas/index.js';

// Validation
export {
  validateMetadata,
  countUndocumented,
  DEFAULT_REQUIRED_COLUMNS,
  type MetadataValidationOptions,
} from './validators/metadata-validator.js';

// Writer
export {
  writeExportTable,
  formatCsv,
  escapeCsvField,
  synthesizeOutputFileName,
  OUTPUT_FILE_PREFIX,
  type WriteOptions,
} from './persistence/csv-writer.js';

// Loaders
export * from './data/loaders/index.js';

// Logging
export {
  logger,
  createLogger,
  ConsoleLogger,
  type Logger,
  type LogLevel,
  type LogMetadata,
} from './core/utils/logger.js';
