/**
 * Extraction Strategy Tests
 *
 * - dudi / dapc / spca column layouts and values
 * - dispatch on the analysis class list
 * - malformed analysis fields surface as MalformedAnalysisResultError
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import { describe, it, expect } from 'vitest';
import {
  MalformedAnalysisResultError,
  UnsupportedAnalysisTypeError,
} from '../../../core/errors.js';
import type { AnalysisObject } from '../../../core/types/index.js';
import {
  ExtractorRegistry,
  analysisClassNames,
  createDefaultRegistry,
  discriminantExtractor,
  numberedColumns,
  ordinationExtractor,
  spatialExtractor,
} from '../../../extractors/index.js';
import {
  createDiscriminant,
  createOrdination,
  createScoreMatrix,
  createSpatial,
} from '../../utils/index.js';

function expectMalformed(run: () => unknown, field: string): MalformedAnalysisResultError {
  try {
    run();
  } catch (error) {
    expect(error).toBeInstanceOf(MalformedAnalysisResultError);
    if (error instanceof MalformedAnalysisResultError) {
      expect(error.field).toBe(field);
      return error;
    }
  }
  throw new Error(`Expected a malformed '${field}' field`);
}

describe('numberedColumns', () => {
  it('numbers columns from 1', () => {
    expect(numberedColumns('PC', 3)).toEqual(['PC1', 'PC2', 'PC3']);
    expect(numberedColumns('Lag_PC', 1)).toEqual(['Lag_PC1']);
  });
});

describe('ordinationExtractor', () => {
  it('emits key and one PC column per retained axis', () => {
    const table = ordinationExtractor.extract(createOrdination());

    expect(table.columns).toEqual(['key', 'PC1', 'PC2']);
    expect(table.rows).toEqual([
      { key: 'A', PC1: 1.5, PC2: -0.2 },
      { key: 'B', PC1: 0.3, PC2: 0.8 },
      { key: 'C', PC1: -1.1, PC2: 0.4 },
    ]);
  });

  it('reports a missing score matrix', () => {
    const error = expectMalformed(
      () => ordinationExtractor.extract({ kind: 'dudi' }),
      'scores'
    );
    expect(error.message).toBe("Analysis result field 'scores' is malformed: Required");
  });

  it('reports a score row of the wrong width', () => {
    const analysis: AnalysisObject = {
      kind: 'dudi',
      scores: { rowNames: ['A', 'B'], ncol: 2, rows: [[1.5, -0.2], [0.3]] },
    };

    const error = expectMalformed(() => ordinationExtractor.extract(analysis), 'scores.rows.1');
    expect(error.reason).toBe('Expected 2 values, found 1');
  });
});

describe('discriminantExtractor', () => {
  it('adds prior group, assigned group and assignment support', () => {
    const table = discriminantExtractor.extract(createDiscriminant());

    expect(table.columns).toEqual(['key', 'PC1', 'PC2', 'grp', 'assigned_grp', 'support']);
    expect(table.rows).toEqual([
      { key: 'A', PC1: 1.5, PC2: -0.2, grp: 1, assigned_grp: 1, support: 0.9 },
      { key: 'B', PC1: 0.3, PC2: 0.8, grp: 1, assigned_grp: 2, support: 0.6 },
      { key: 'C', PC1: -1.1, PC2: 0.4, grp: 2, assigned_grp: 2, support: 0.8 },
    ]);
  });

  it('keeps group labels as given', () => {
    const analysis: AnalysisObject = {
      ...createDiscriminant(),
      groups: ['north', 'north', 'south'],
      assigned: ['north', 'south', 'south'],
    };

    const table = discriminantExtractor.extract(analysis);

    expect(table.rows.map((row) => row['assigned_grp'])).toEqual(['north', 'south', 'south']);
  });

  it('reports a missing posterior', () => {
    const { posterior: _posterior, ...rest } = createDiscriminant();

    expectMalformed(() => discriminantExtractor.extract(rest), 'posterior');
  });

  it('rejects a posterior listing other entities', () => {
    const analysis: AnalysisObject = {
      ...createDiscriminant(),
      posterior: createScoreMatrix(['A', 'C', 'B'], [[0.9, 0.1], [0.2, 0.8], [0.4, 0.6]]),
    };

    expectMalformed(() => discriminantExtractor.extract(analysis), 'posterior.rowNames');
  });

  it('reports per-entity fields of the wrong length', () => {
    const analysis: AnalysisObject = { ...createDiscriminant(), assigned: [1, 2] };

    const error = expectMalformed(() => discriminantExtractor.extract(analysis), 'assigned');
    expect(error.reason).toBe('Expected one entry per entity (3), found 2');
  });
});

describe('spatialExtractor', () => {
  it('emits score columns followed by lag score columns', () => {
    const table = spatialExtractor.extract(createSpatial());

    expect(table.columns).toEqual(['key', 'PC1', 'PC2', 'Lag_PC1', 'Lag_PC2']);
    expect(table.rows[0]).toEqual({ key: 'A', PC1: 1.5, PC2: -0.2, Lag_PC1: 0.7, Lag_PC2: 0.1 });
    expect(table.rows[2]).toEqual({ key: 'C', PC1: -1.1, PC2: 0.4, Lag_PC1: -0.4, Lag_PC2: 0.6 });
  });

  it('rejects lag scores with a different number of columns', () => {
    const analysis: AnalysisObject = {
      ...createSpatial(),
      lagScores: createScoreMatrix(['A', 'B', 'C'], [[0.7], [0.2], [-0.4]]),
    };

    const error = expectMalformed(() => spatialExtractor.extract(analysis), 'lagScores.ncol');
    expect(error.reason).toBe('Expected 2 lag columns, found 1');
  });

  it('rejects lag scores listing other entities', () => {
    const analysis: AnalysisObject = {
      ...createSpatial(),
      lagScores: createScoreMatrix(['A', 'C', 'B'], [[0.7, 0.1], [-0.4, 0.6], [0.2, 0.3]]),
    };

    expectMalformed(() => spatialExtractor.extract(analysis), 'lagScores.rowNames');
  });
});

describe('ExtractorRegistry', () => {
  it('dispatches on the first registered class of the analysis', () => {
    const registry = createDefaultRegistry();

    expect(registry.resolve(createOrdination()).className).toBe('dudi');
    expect(registry.resolve(createDiscriminant()).className).toBe('dapc');
    expect(registry.resolve({ kind: 'spca', classes: ['spca', 'list'] }).className).toBe('spca');
  });

  it('falls back to the analysis kind when no class list is given', () => {
    expect(analysisClassNames({ kind: 'dapc' })).toEqual(['dapc']);
    expect(analysisClassNames({ kind: 'dapc', classes: [] })).toEqual(['dapc']);
    expect(analysisClassNames({ kind: 'dudi', classes: ['pca', 'dudi'] })).toEqual(['pca', 'dudi']);
  });

  it('names every class of an unsupported analysis', () => {
    const registry = createDefaultRegistry();

    expect(() => registry.resolve({ kind: 'lda', classes: ['lda', 'list'] })).toThrow(
      UnsupportedAnalysisTypeError
    );
    expect(() => registry.resolve({ kind: 'lda', classes: ['lda', 'list'] })).toThrow(
      'No method available for the class lda, list'
    );
  });

  it('accepts additional strategies', () => {
    const registry = new ExtractorRegistry().register({
      className: 'lda',
      description: 'Linear discriminant analysis',
      fixedColumns: ['key'],
      extract: () => ({ columns: ['key', 'LD1'], rows: [{ key: 'A', LD1: 0.5 }] }),
    });

    expect(registry.has('lda')).toBe(true);
    expect(registry.has('dudi')).toBe(false);
    expect(registry.resolve({ kind: 'lda' }).extract({ kind: 'lda' }).rows).toEqual([
      { key: 'A', LD1: 0.5 },
    ]);
  });

  it('lists the built-in strategies in registration order', () => {
    const names = createDefaultRegistry()
      .getExtractors()
      .map((extractor) => extractor.className);

    expect(names).toEqual(['dudi', 'dapc', 'spca']);
  });
});
