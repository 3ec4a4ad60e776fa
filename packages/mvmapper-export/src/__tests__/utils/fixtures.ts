/**
 * Test Fixture Factories
 *
 * Minimal, deterministic analysis results and metadata. Each factory returns
 * a fresh object so tests can never leak mutations into each other.
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type {
  AnalysisObject,
  ScoreMatrix,
  TableRow,
} from '../../core/types/index.js';

// ============================================================================
// Matrices
// ============================================================================

export function createScoreMatrix(
  rowNames: readonly string[],
  rows: readonly (readonly number[])[]
): ScoreMatrix {
  return {
    rowNames: [...rowNames],
    ncol: rows[0]?.length ?? 1,
    rows: rows.map((row) => [...row]),
  };
}

export const ENTITY_KEYS = ['A', 'B', 'C'] as const;

/**
 * Two-component scores for A, B, C
 */
export function createScores(): ScoreMatrix {
  return createScoreMatrix(ENTITY_KEYS, [
    [1.5, -0.2],
    [0.3, 0.8],
    [-1.1, 0.4],
  ]);
}

// ============================================================================
// Analyses
// ============================================================================

export function createOrdination(): AnalysisObject {
  return { kind: 'dudi', classes: ['pca', 'dudi'], scores: createScores() };
}

/**
 * DAPC over A, B, C: prior groups 1,1,2; assigned 1,2,2; posterior maxima
 * 0.9, 0.6, 0.8
 */
export function createDiscriminant(): AnalysisObject {
  return {
    kind: 'dapc',
    scores: createScores(),
    groups: [1, 1, 2],
    assigned: [1, 2, 2],
    posterior: createScoreMatrix(ENTITY_KEYS, [
      [0.9, 0.1],
      [0.4, 0.6],
      [0.2, 0.8],
    ]),
  };
}

export function createSpatial(): AnalysisObject {
  return {
    kind: 'spca',
    scores: createScores(),
    lagScores: createScoreMatrix(ENTITY_KEYS, [
      [0.7, 0.1],
      [0.2, 0.3],
      [-0.4, 0.6],
    ]),
  };
}

// ============================================================================
// Metadata
// ============================================================================

/**
 * Locations for A and B only (C is undocumented)
 */
export function createPartialMetadata(): TableRow[] {
  return [
    { key: 'A', lat: 45.5, lon: -73.6, site: 'north' },
    { key: 'B', lat: 46.8, lon: -71.2, site: 'south, east' },
  ];
}

export function createFullMetadata(): TableRow[] {
  return [
    ...createPartialMetadata(),
    { key: 'C', lat: 44.1, lon: -70.9, site: 'coast' },
  ];
}

// ============================================================================
// Filesystem
// ============================================================================

/**
 * Fresh directory under the OS temp dir, with a cleanup callback
 */
export function createTempDir(): { readonly path: string; readonly cleanup: () => void } {
  const path = mkdtempSync(join(tmpdir(), 'mvmapper-export-'));
  return {
    path,
    cleanup: () => rmSync(path, { recursive: true, force: true }),
  };
}
