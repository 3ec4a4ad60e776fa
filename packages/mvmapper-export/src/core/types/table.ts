/**
 * Tabular data model
 *
 * A table is an ordered list of column names plus rows keyed by those names.
 * Column order is significant: it drives CSV output and join layout.
 */

/**
 * A single cell. `null` marks a missing value (written as `NA`).
 */
export type CellValue = string | number | boolean | null;

/**
 * One row, keyed by column name
 */
export type TableRow = Readonly<Record<string, CellValue>>;

/**
 * Canonical table representation
 */
export interface Table {
  /** Column names in output order (no duplicates) */
  readonly columns: readonly string[];
  /** Rows; each row carries a value for every column */
  readonly rows: readonly TableRow[];
}

/**
 * Per-entity metadata as accepted from callers: either a table or a plain
 * array of records (coerced with `toTable`).
 */
export type MetadataInput = Table | readonly TableRow[];

/**
 * Result of merging extracted analysis fields with entity metadata
 */
export type ExportTable = Table;
