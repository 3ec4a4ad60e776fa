/**
 * Metadata Validator Tests
 *
 * - required columns are checked in order
 * - undocumented entities are counted and reported, never fatal
 */

import { describe, it, expect } from 'vitest';
import { MissingColumnError } from '../../../core/errors.js';
import {
  DEFAULT_REQUIRED_COLUMNS,
  countUndocumented,
  validateMetadata,
} from '../../../validators/metadata-validator.js';
import { createFullMetadata, createMockLogger, createPartialMetadata } from '../../utils/index.js';

describe('validateMetadata', () => {
  it('requires key, lat and lon by default', () => {
    expect(DEFAULT_REQUIRED_COLUMNS).toEqual(['key', 'lat', 'lon']);
  });

  it('returns the metadata as a table', () => {
    const logger = createMockLogger();

    const table = validateMetadata(createFullMetadata(), ['A', 'B', 'C'], { logger });

    expect(table.columns).toEqual(['key', 'lat', 'lon', 'site']);
    expect(table.rows).toHaveLength(3);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('names the first missing required column', () => {
    const metadata = [{ key: 'A', site: 'north' }];

    expect(() => validateMetadata(metadata, ['A'])).toThrow(MissingColumnError);
    expect(() => validateMetadata(metadata, ['A'])).toThrow("Metadata is missing a 'lat' column");
  });

  it('reports a missing lon column when lat is present', () => {
    try {
      validateMetadata([{ key: 'A', lat: 45.5 }], ['A']);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MissingColumnError);
      if (error instanceof MissingColumnError) {
        expect(error.column).toBe('lon');
      }
    }
  });

  it('honours a custom required column list', () => {
    const metadata = [{ key: 'A', lat: 45.5, lon: -73.6 }];

    expect(() => validateMetadata(metadata, ['A'], { required: ['key', 'site'] })).toThrow(
      "Metadata is missing a 'site' column"
    );
  });

  it('warns about analysis entities without metadata', () => {
    const logger = createMockLogger();

    validateMetadata(createPartialMetadata(), ['A', 'B', 'C'], { logger });

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith('1 individuals are not documented in the metadata', {
      missing: 1,
    });
  });
});

describe('countUndocumented', () => {
  it('matches keys by their string form', () => {
    const metadata = { columns: ['key'], rows: [{ key: 1 }, { key: 2 }] };

    expect(countUndocumented(metadata, ['1', '2', '3'])).toBe(1);
  });

  it('counts missing reference keys as undocumented', () => {
    const metadata = { columns: ['key'], rows: [{ key: null }] };

    expect(countUndocumented(metadata, [null])).toBe(1);
  });
});
