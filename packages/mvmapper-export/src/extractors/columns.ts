/**
 * Column naming for matrix-valued fields
 */

import type { CellValue, ScoreMatrix } from '../core/types/index.js';

/** Prefix of component score columns */
export const PC_PREFIX = 'PC';

/** Prefix of lag score columns */
export const LAG_PC_PREFIX = 'Lag_PC';

/**
 * `<prefix>1` .. `<prefix>k`
 */
export function numberedColumns(prefix: string, k: number): string[] {
  return Array.from({ length: k }, (_, i) => `${prefix}${i + 1}`);
}

/**
 * Copy row `index` of a matrix into `target` under the given column names
 */
export function assignMatrixRow(
  target: Record<string, CellValue>,
  names: readonly string[],
  matrix: ScoreMatrix,
  index: number
): void {
  const values = matrix.rows[index] ?? [];
  names.forEach((name, j) => {
    target[name] = values[j] ?? null;
  });
}
