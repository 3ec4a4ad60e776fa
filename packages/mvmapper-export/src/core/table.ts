/**
 * Table Operations
 *
 * Coercion into the canonical table representation and the inner join used to
 * merge extracted analysis fields with entity metadata.
 *
 * @module core/table
 */

import type { CellValue, MetadataInput, Table, TableRow } from './types/index.js';

/**
 * Column that joins analysis output to metadata
 */
export const KEY_COLUMN = 'key';

/**
 * Coerce caller input into the canonical table representation.
 *
 * Record arrays take their columns from the union of record keys, in the
 * order they are first seen. Every returned row holds a value for every
 * column; absent cells become `null`.
 */
export function toTable(input: MetadataInput): Table {
  if ('columns' in input) {
    return {
      columns: [...input.columns],
      rows: input.rows.map((row) => normalizeRow(row, input.columns)),
    };
  }

  const columns: string[] = [];
  const seen = new Set<string>();
  for (const record of input) {
    for (const name of Object.keys(record)) {
      if (!seen.has(name)) {
        seen.add(name);
        columns.push(name);
      }
    }
  }

  return {
    columns,
    rows: input.map((row) => normalizeRow(row, columns)),
  };
}

function normalizeRow(row: TableRow, columns: readonly string[]): TableRow {
  const normalized: Record<string, CellValue> = {};
  for (const column of columns) {
    normalized[column] = row[column] ?? null;
  }
  return normalized;
}

export function hasColumn(table: Table, column: string): boolean {
  return table.columns.includes(column);
}

/**
 * Join key form of a cell. Keys compare by their string form, so `1` and `"1"`
 * refer to the same entity. Missing keys never match.
 */
export function keyString(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  return String(value);
}

/**
 * Ordering used for merged output: numeric when both keys are numbers,
 * code-unit order of the string form otherwise.
 */
export function compareKeys(a: CellValue | undefined, b: CellValue | undefined): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  const left = keyString(a);
  const right = keyString(b);
  if (left === right) return 0;
  if (left === null) return 1;
  if (right === null) return -1;
  return left < right ? -1 : 1;
}

/**
 * Inner join of two tables on a shared key column.
 *
 * - Output columns: key, the left table's columns, then the right table's.
 * - A non-key column present on both sides is emitted as `<name>.x` (left)
 *   and `<name>.y` (right).
 * - A left row matching several right rows yields one output row per match.
 * - Rows are sorted by key (see `compareKeys`); equal keys keep left order.
 *
 * Both tables must contain the key column.
 */
export function innerJoin(left: Table, right: Table, by: string = KEY_COLUMN): Table {
  const leftColumns = left.columns.filter((c) => c !== by);
  const rightColumns = right.columns.filter((c) => c !== by);
  const shared = new Set(leftColumns.filter((c) => rightColumns.includes(c)));

  const leftNames = leftColumns.map((c) => (shared.has(c) ? `${c}.x` : c));
  const rightNames = rightColumns.map((c) => (shared.has(c) ? `${c}.y` : c));

  // key -> indices of right rows carrying it
  const index = new Map<string, number[]>();
  right.rows.forEach((row, i) => {
    const k = keyString(row[by]);
    if (k === null) return;
    const bucket = index.get(k);
    if (bucket) {
      bucket.push(i);
    } else {
      index.set(k, [i]);
    }
  });

  const joined: TableRow[] = [];
  for (const leftRow of left.rows) {
    const k = keyString(leftRow[by]);
    if (k === null) continue;
    for (const i of index.get(k) ?? []) {
      const rightRow = right.rows[i];
      if (rightRow === undefined) continue;

      const row: Record<string, CellValue> = { [by]: leftRow[by] ?? null };
      leftColumns.forEach((c, j) => {
        row[leftNames[j] ?? c] = leftRow[c] ?? null;
      });
      rightColumns.forEach((c, j) => {
        row[rightNames[j] ?? c] = rightRow[c] ?? null;
      });
      joined.push(row);
    }
  }

  joined.sort((a, b) => compareKeys(a[by], b[by]));

  return {
    columns: [by, ...leftNames, ...rightNames],
    rows: joined,
  };
}

/**
 * Values of one column, in row order
 */
export function columnValues(table: Table, column: string): CellValue[] {
  return table.rows.map((row) => row[column] ?? null);
}

/**
 * First `n` rows of a table (for previews)
 */
export function headTable(table: Table, n: number): Table {
  return { columns: table.columns, rows: table.rows.slice(0, Math.max(0, n)) };
}
