/**
 * Metadata Validator
 *
 * Checks caller-supplied entity metadata before it is merged with analysis
 * output: the identifying and geographic columns must exist, and entities of
 * the analysis that the metadata does not document are reported.
 *
 * Missing columns are fatal. Undocumented entities are not: they are counted,
 * reported as a warning, and later dropped by the inner join.
 */

import { MissingColumnError } from '../core/errors.js';
import { KEY_COLUMN, hasColumn, keyString, toTable } from '../core/table.js';
import type { CellValue, MetadataInput, Table } from '../core/types/index.js';
import { logger as defaultLogger, type Logger } from '../core/utils/logger.js';

/**
 * Columns every metadata table must provide, checked in this order
 */
export const DEFAULT_REQUIRED_COLUMNS: readonly string[] = [KEY_COLUMN, 'lat', 'lon'];

export interface MetadataValidationOptions {
  /** Required columns, checked in order (default: key, lat, lon) */
  readonly required?: readonly string[];
  /** Sink for the coverage warning */
  readonly logger?: Logger;
}

/**
 * Validate metadata against the entity keys produced by an analysis.
 *
 * @param metadata - Table or record array with one row per entity
 * @param referenceKeys - Entity keys of the extracted analysis table
 * @returns The metadata as a canonical table
 * @throws MissingColumnError for the first required column that is absent
 */
export function validateMetadata(
  metadata: MetadataInput,
  referenceKeys: Iterable<CellValue>,
  options: MetadataValidationOptions = {}
): Table {
  const required = options.required ?? DEFAULT_REQUIRED_COLUMNS;
  const log = options.logger ?? defaultLogger;
  const table = toTable(metadata);

  for (const column of required) {
    if (!hasColumn(table, column)) {
      throw new MissingColumnError(column);
    }
  }

  const missing = countUndocumented(table, referenceKeys);
  if (missing > 0) {
    log.warn(`${missing} individuals are not documented in the metadata`, { missing });
  }

  return table;
}

/**
 * Number of reference keys with no matching metadata row
 */
export function countUndocumented(metadata: Table, referenceKeys: Iterable<CellValue>): number {
  const documented = new Set<string>();
  if (hasColumn(metadata, KEY_COLUMN)) {
    for (const row of metadata.rows) {
      const k = keyString(row[KEY_COLUMN]);
      if (k !== null) documented.add(k);
    }
  }

  let missing = 0;
  for (const ref of referenceKeys) {
    const k = keyString(ref);
    if (k === null || !documented.has(k)) {
      missing++;
    }
  }
  return missing;
}
