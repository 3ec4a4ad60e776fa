/**
 * Metadata Loader
 *
 * Reads per-entity metadata (key, lat, lon, extra columns) from CSV.
 *
 * Parsing rules:
 * - RFC 4180 quoting: quoted fields may hold commas, doubled quotes and line
 *   breaks; CRLF and LF line endings are both accepted
 * - The first record is the header; a repeated header name gets `.1`, `.2`, ...
 * - Empty cells and `NA` become `null`
 * - A column whose non-missing cells are all numeric becomes numeric, except
 *   `key`, which always stays textual
 */

import { readFileSync } from 'node:fs';
import { IOFailureError } from '../../core/errors.js';
import { KEY_COLUMN } from '../../core/table.js';
import type { CellValue, Table, TableRow } from '../../core/types/index.js';

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const MISSING_TOKENS = new Set(['', 'NA']);

/**
 * Split CSV text into records of raw field strings
 */
export function parseCsvRecords(content: string): string[][] {
  const text = content.startsWith('\uFEFF') ? content.slice(1) : content;
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;

  const endRecord = (): void => {
    record.push(field);
    // Blank lines carry no record
    if (!(record.length === 1 && record[0] === '')) {
      records.push(record);
    }
    record = [];
    field = '';
  };

  for (let i = 0; i < text.length; i++) {
    const char = text.charAt(i);

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      record.push(field);
      field = '';
    } else if (char === '\n') {
      endRecord();
    } else if (char === '\r') {
      if (text[i + 1] === '\n') i++;
      endRecord();
    } else {
      field += char;
    }
  }

  if (field !== '' || record.length > 0) {
    endRecord();
  }

  return records;
}

/**
 * Parse CSV text into a table
 */
export function parseCsv(content: string): Table {
  const [header, ...body] = parseCsvRecords(content);
  if (header === undefined) {
    return { columns: [], rows: [] };
  }

  const columns = uniqueColumnNames(header);
  const numeric = columns.map(
    (column, j) =>
      column !== KEY_COLUMN &&
      body.every((record) => {
        const raw = record[j];
        return raw === undefined || MISSING_TOKENS.has(raw) || NUMERIC_PATTERN.test(raw.trim());
      })
  );

  const rows: TableRow[] = body.map((record) => {
    const row: Record<string, CellValue> = {};
    columns.forEach((column, j) => {
      const raw = record[j];
      if (raw === undefined || MISSING_TOKENS.has(raw)) {
        row[column] = null;
      } else {
        row[column] = numeric[j] ? Number(raw.trim()) : raw;
      }
    });
    return row;
  });

  return { columns, rows };
}

function uniqueColumnNames(names: readonly string[]): string[] {
  const counts = new Map<string, number>();
  return names.map((raw) => {
    const name = raw.trim();
    const seen = counts.get(name) ?? 0;
    counts.set(name, seen + 1);
    return seen === 0 ? name : `${name}.${seen}`;
  });
}

/**
 * Read a metadata CSV file
 *
 * @throws IOFailureError when the file cannot be read
 */
export function loadMetadataFile(filePath: string): Table {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new IOFailureError(filePath, 'read', error);
  }
  return parseCsv(content);
}
