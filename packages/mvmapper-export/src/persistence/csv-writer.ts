/**
 * CSV Writer for mvMapper input files
 *
 * Serialises an export table as comma-separated text (header row, no row
 * index) and writes it atomically. When no output path is given, the file is
 * named `mvmapper_data_<timestamp>.csv` with a microsecond UTC timestamp.
 *
 * @module persistence/csv-writer
 */

import { join } from 'node:path';
import { performance } from 'node:perf_hooks';
import { IOFailureError } from '../core/errors.js';
import type { CellValue, Table } from '../core/types/index.js';
import { atomicWriteFileSync } from '../core/utils/atomic-write.js';
import { logger as defaultLogger, type Logger } from '../core/utils/logger.js';

export const OUTPUT_FILE_PREFIX = 'mvmapper_data_';

/** Text written for missing cells */
export const MISSING_VALUE = 'NA';

// ============================================================================
// Serialisation
// ============================================================================

/**
 * Quote a field containing a delimiter, quote or line break; inner quotes are
 * doubled.
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) return MISSING_VALUE;
  return String(value);
}

/**
 * Table as CSV text, newline-terminated
 */
export function formatCsv(table: Table): string {
  const header = table.columns.map(escapeCsvField).join(',');
  const lines = table.rows.map((row) =>
    table.columns.map((column) => escapeCsvField(formatCell(row[column]))).join(',')
  );
  return [header, ...lines].join('\n') + '\n';
}

// ============================================================================
// File Naming
// ============================================================================

/**
 * Wall-clock time in microseconds since the epoch
 */
export function currentEpochMicros(): number {
  return Math.floor((performance.timeOrigin + performance.now()) * 1000);
}

/**
 * `mvmapper_data_YYYY-MM-DD_HH-MM-SS.ffffff.csv` (UTC)
 */
export function synthesizeOutputFileName(epochMicros: number = currentEpochMicros()): string {
  const date = new Date(Math.floor(epochMicros / 1000));
  const pad = (n: number, width = 2): string => String(n).padStart(width, '0');

  const day = `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}-${pad(date.getUTCMinutes())}-${pad(date.getUTCSeconds())}`;
  const micros = pad(((epochMicros % 1_000_000) + 1_000_000) % 1_000_000, 6);

  return `${OUTPUT_FILE_PREFIX}${day}_${time}.${micros}.csv`;
}

// ============================================================================
// Writing
// ============================================================================

export interface WriteOptions {
  /** Target path; synthesised when absent */
  readonly outFile?: string | null;
  /** Directory for synthesised file names (default: working directory) */
  readonly outputDir?: string;
  readonly logger?: Logger;
}

/**
 * Write a table to disk as CSV.
 *
 * @returns The path written
 * @throws IOFailureError when the file cannot be written; any previous file at
 *   the path is left untouched
 */
export function writeExportTable(table: Table, options: WriteOptions = {}): string {
  const log = options.logger ?? defaultLogger;
  const outFile = options.outFile ?? join(options.outputDir ?? '.', synthesizeOutputFileName());

  log.info(`Writing output to the file: ${outFile}`, { rows: table.rows.length });

  try {
    atomicWriteFileSync(outFile, formatCsv(table));
  } catch (error) {
    throw new IOFailureError(outFile, 'write', error);
  }

  return outFile;
}
