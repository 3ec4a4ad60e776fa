/**
 * mvMapper Exporter
 *
 * Turns a multivariate analysis plus per-entity metadata into the flat table
 * mvMapper reads:
 *
 * 1. Dispatch: pick the extraction strategy from the analysis' class list
 * 2. Extract: per-entity scores (and lag scores / group fields) keyed by `key`
 * 3. Validate: required metadata columns, coverage of the analysis entities
 * 4. Merge: inner join on `key`
 * 5. Write (optional): CSV file, synthesised name when none is given
 *
 * Every call builds fresh tables; nothing is cached between calls.
 *
 * @example
 * ```typescript
 * const table = exportToMvmapper(dapcResult, locations, {
 *   outFile: 'mvMapper_Data.csv',
 * });
 * ```
 */

import { MalformedAnalysisResultError } from '../core/errors.js';
import { KEY_COLUMN, columnValues, hasColumn, innerJoin } from '../core/table.js';
import type { AnalysisObject, ExportTable, MetadataInput } from '../core/types/index.js';
import { logger as defaultLogger, type Logger } from '../core/utils/logger.js';
import { createDefaultRegistry, type ExtractorRegistry } from '../extractors/registry.js';
import { writeExportTable } from '../persistence/csv-writer.js';
import {
  DEFAULT_REQUIRED_COLUMNS,
  countUndocumented,
  validateMetadata,
} from '../validators/metadata-validator.js';

export interface ExportOptions {
  /** Write the merged table to a CSV file (default: true) */
  readonly writeFile?: boolean;
  /** Output path; `mvmapper_data_<timestamp>.csv` when absent */
  readonly outFile?: string | null;
  /** Directory for synthesised output names */
  readonly outputDir?: string;
  /** Required metadata columns (default: key, lat, lon); `key` is always checked */
  readonly requiredColumns?: readonly string[];
  /** Strategies to dispatch through (default: dudi, dapc, spca) */
  readonly registry?: ExtractorRegistry;
  /** Sink for the output-path notice and coverage warning */
  readonly logger?: Logger;
}

/**
 * Outcome of an export, for callers that need more than the table
 */
export interface ExportReport {
  readonly table: ExportTable;
  /** Path written, or null when writing was disabled */
  readonly outFile: string | null;
  /** Class name of the strategy that handled the analysis */
  readonly analysisClass: string;
  /** Entities produced by the analysis */
  readonly extractedEntities: number;
  /** Analysis entities without a metadata row */
  readonly undocumentedEntities: number;
}

/**
 * Export an analysis for mvMapper.
 *
 * @returns The merged table (identical whether or not a file was written)
 * @throws UnsupportedAnalysisTypeError when no strategy handles the analysis
 * @throws MalformedAnalysisResultError when the analysis lacks a field, or the
 *   strategy's table lacks one of its fixed columns
 * @throws MissingColumnError when metadata lacks a required column
 * @throws IOFailureError when the output file cannot be written
 */
export function exportToMvmapper(
  analysis: AnalysisObject,
  metadata: MetadataInput,
  options: ExportOptions = {}
): ExportTable {
  return exportWithReport(analysis, metadata, options).table;
}

/**
 * `exportToMvmapper`, also reporting the written path and coverage counts
 */
export function exportWithReport(
  analysis: AnalysisObject,
  metadata: MetadataInput,
  options: ExportOptions = {}
): ExportReport {
  const log = options.logger ?? defaultLogger;
  const registry = options.registry ?? createDefaultRegistry();

  const extractor = registry.resolve(analysis);
  const extracted = extractor.extract(analysis);
  const absent = withKeyColumn(extractor.fixedColumns).find(
    (column) => !hasColumn(extracted, column)
  );
  if (absent !== undefined) {
    throw new MalformedAnalysisResultError(
      absent,
      `not produced by the '${extractor.className}' strategy`
    );
  }

  const referenceKeys = columnValues(extracted, KEY_COLUMN);

  log.debug('Extracted analysis fields', {
    analysisClass: extractor.className,
    entities: extracted.rows.length,
    columns: extracted.columns.length,
  });

  const info = validateMetadata(metadata, referenceKeys, {
    required: withKeyColumn(options.requiredColumns ?? DEFAULT_REQUIRED_COLUMNS),
    logger: log,
  });

  const table = innerJoin(extracted, info, KEY_COLUMN);
  if (table.rows.length === 0 && extracted.rows.length > 0) {
    log.debug('No analysis entity matched the metadata; the export is empty', {
      entities: extracted.rows.length,
    });
  }

  const outFile =
    (options.writeFile ?? true)
      ? writeExportTable(table, {
          outFile: options.outFile,
          outputDir: options.outputDir,
          logger: log,
        })
      : null;

  return {
    table,
    outFile,
    analysisClass: extractor.className,
    extractedEntities: extracted.rows.length,
    undocumentedEntities: countUndocumented(info, referenceKeys),
  };
}

function withKeyColumn(required: readonly string[]): readonly string[] {
  return required.includes(KEY_COLUMN) ? required : [KEY_COLUMN, ...required];
}
