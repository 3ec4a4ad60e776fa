/**
 * Export Command
 *
 * Export an analysis result for mvMapper.
 *
 * Usage:
 *   mvmapper-export export <analysis.json> <metadata.csv> [options]
 *
 * Options:
 *   -o, --out-file <path>  Output CSV path (default: mvmapper_data_<timestamp>.csv)
 *   --out-dir <dir>        Directory for the synthesised output name
 *   --no-write             Validate and merge only; write nothing
 *   --preview <n>          Print the first n merged rows
 *
 * @module cli/commands/export
 */

import { headTable } from '../../../core/table.js';
import { isMvmapperExportError } from '../../../core/errors.js';
import { loadAnalysisFile } from '../../../data/loaders/analysis-loader.js';
import { loadMetadataFile } from '../../../data/loaders/metadata-loader.js';
import { exportWithReport, type ExportReport } from '../../../services/mvmapper-exporter.js';
import { resolveOutputDir, type CLIConfig } from '../../lib/config.js';
import { EXIT_CODES, type ExitCode } from '../../lib/exit-codes.js';
import type { CLILogger } from '../../lib/logger.js';

export interface ExportCommandOptions {
  readonly outFile?: string;
  readonly preview?: number;
}

export interface ExportCommandContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
  /** Base for relative output directories (default: process.cwd()) */
  readonly cwd?: string;
}

export interface ExportCommandResult {
  readonly success: boolean;
  readonly exitCode: ExitCode;
  readonly report?: ExportReport;
  readonly error?: string;
}

/**
 * Run an export from files.
 *
 * Export failures (unsupported analysis, malformed analysis, missing metadata
 * column, unreadable or unwritable file) are logged and reported through the
 * result; anything else propagates.
 */
export async function exportCommand(
  analysisPath: string,
  metadataPath: string,
  options: ExportCommandOptions,
  context: ExportCommandContext
): Promise<ExportCommandResult> {
  const { config, logger } = context;

  logger.commandStart('export', {
    analysis: analysisPath,
    metadata: metadataPath,
    writeFile: config.output.writeFile,
  });

  try {
    const analysis = loadAnalysisFile(analysisPath);
    const metadata = loadMetadataFile(metadataPath);

    const report = exportWithReport(analysis, metadata, {
      writeFile: config.output.writeFile,
      outFile: options.outFile ?? null,
      outputDir: resolveOutputDir(config, context.cwd),
      requiredColumns: config.metadata.requiredColumns,
      logger,
    });

    if (report.table.rows.length === 0) {
      logger.warn('No entity of the analysis matched the metadata; check the key column');
    }

    if (options.preview !== undefined && options.preview > 0) {
      logger.table(headTable(report.table, options.preview));
    }

    logger.commandEnd(true, {
      analysisClass: report.analysisClass,
      rows: report.table.rows.length,
      undocumented: report.undocumentedEntities,
      ...(report.outFile !== null && { outFile: report.outFile }),
    });

    return { success: true, exitCode: EXIT_CODES.SUCCESS, report };
  } catch (error) {
    if (!isMvmapperExportError(error)) {
      throw error;
    }

    logger.error(error.toLogString(), { code: error.code });
    logger.commandEnd(false);
    return { success: false, exitCode: EXIT_CODES.ERRORS, error: error.message };
  }
}
