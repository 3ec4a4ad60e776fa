/**
 * Ordination extractor (ade4 `dudi` and its subclasses: pca, coa, pco, ...)
 *
 * Columns: key, PC1..PCk
 */

import { KEY_COLUMN } from '../core/table.js';
import type { CellValue, OrdinationResult, Table, TableRow } from '../core/types/index.js';
import { OrdinationResultSchema } from '../schemas/analysis.js';
import { PC_PREFIX, assignMatrixRow, numberedColumns } from './columns.js';
import { defineExtractor } from './define.js';

export function extractOrdination(result: OrdinationResult): Table {
  const { scores } = result;
  const pcColumns = numberedColumns(PC_PREFIX, scores.ncol);

  const rows: TableRow[] = scores.rowNames.map((key, i) => {
    const row: Record<string, CellValue> = { [KEY_COLUMN]: key };
    assignMatrixRow(row, pcColumns, scores, i);
    return row;
  });

  return { columns: [KEY_COLUMN, ...pcColumns], rows };
}

export const ordinationExtractor = defineExtractor({
  className: 'dudi',
  description: 'Principal component ordination (dudi)',
  fixedColumns: [KEY_COLUMN],
  schema: OrdinationResultSchema,
  build: extractOrdination,
});
