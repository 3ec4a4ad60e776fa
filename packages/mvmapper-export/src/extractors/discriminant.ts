/**
 * DAPC extractor
 *
 * Columns: key, PC1..PCk, grp, assigned_grp, support
 *
 * `support` is the assignment probability of `assigned_grp`: the largest
 * posterior membership probability of each entity, computed row by row.
 */

import { KEY_COLUMN } from '../core/table.js';
import type { CellValue, DiscriminantResult, Table, TableRow } from '../core/types/index.js';
import { DiscriminantResultSchema } from '../schemas/analysis.js';
import { PC_PREFIX, assignMatrixRow, numberedColumns } from './columns.js';
import { defineExtractor } from './define.js';

export const GROUP_COLUMN = 'grp';
export const ASSIGNED_GROUP_COLUMN = 'assigned_grp';
export const SUPPORT_COLUMN = 'support';

export function extractDiscriminant(result: DiscriminantResult): Table {
  const { scores, groups, assigned, posterior } = result;
  const pcColumns = numberedColumns(PC_PREFIX, scores.ncol);

  const rows: TableRow[] = scores.rowNames.map((key, i) => {
    const row: Record<string, CellValue> = { [KEY_COLUMN]: key };
    assignMatrixRow(row, pcColumns, scores, i);
    row[GROUP_COLUMN] = groups[i] ?? null;
    row[ASSIGNED_GROUP_COLUMN] = assigned[i] ?? null;
    row[SUPPORT_COLUMN] = rowMax(posterior.rows[i] ?? []);
    return row;
  });

  return {
    columns: [KEY_COLUMN, ...pcColumns, GROUP_COLUMN, ASSIGNED_GROUP_COLUMN, SUPPORT_COLUMN],
    rows,
  };
}

function rowMax(values: readonly number[]): number | null {
  return values.length > 0 ? Math.max(...values) : null;
}

export const discriminantExtractor = defineExtractor({
  className: 'dapc',
  description: 'Discriminant analysis of principal components (dapc)',
  fixedColumns: [KEY_COLUMN, GROUP_COLUMN, ASSIGNED_GROUP_COLUMN, SUPPORT_COLUMN],
  schema: DiscriminantResultSchema,
  build: extractDiscriminant,
});
