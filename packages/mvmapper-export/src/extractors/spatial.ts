/**
 * sPCA extractor
 *
 * Columns: key, PC1..PCk, Lag_PC1..Lag_PCk
 *
 * Lag columns hold, for each entity, the average score of its neighbours;
 * useful for spotting patches and clines on the map. The schema guarantees the
 * lag matrix lists the same entities in the same order with the same width.
 */

import { KEY_COLUMN } from '../core/table.js';
import type { CellValue, SpatialComponentResult, Table, TableRow } from '../core/types/index.js';
import { SpatialComponentResultSchema } from '../schemas/analysis.js';
import { LAG_PC_PREFIX, PC_PREFIX, assignMatrixRow, numberedColumns } from './columns.js';
import { defineExtractor } from './define.js';

export function extractSpatial(result: SpatialComponentResult): Table {
  const { scores, lagScores } = result;
  const pcColumns = numberedColumns(PC_PREFIX, scores.ncol);
  const lagColumns = numberedColumns(LAG_PC_PREFIX, lagScores.ncol);

  const rows: TableRow[] = scores.rowNames.map((key, i) => {
    const row: Record<string, CellValue> = { [KEY_COLUMN]: key };
    assignMatrixRow(row, pcColumns, scores, i);
    assignMatrixRow(row, lagColumns, lagScores, i);
    return row;
  });

  return { columns: [KEY_COLUMN, ...pcColumns, ...lagColumns], rows };
}

export const spatialExtractor = defineExtractor({
  className: 'spca',
  description: 'Spatial principal component analysis (spca)',
  fixedColumns: [KEY_COLUMN],
  schema: SpatialComponentResultSchema,
  build: extractSpatial,
});
