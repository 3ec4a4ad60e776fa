/**
 * Analysis result types
 *
 * Shapes of the three supported multivariate analyses once they have passed
 * schema validation (see `schemas/analysis.ts`). At the package boundary an
 * analysis is an `AnalysisObject`: anything carrying a `kind` and, optionally,
 * an ordered list of class names.
 */

/**
 * Numeric matrix with one named row per entity
 */
export interface ScoreMatrix {
  /** Entity identifiers, one per row */
  readonly rowNames: readonly string[];
  /** Number of columns (retained components, or groups for posteriors) */
  readonly ncol: number;
  /** Row-major values; every row has exactly `ncol` entries */
  readonly rows: readonly (readonly number[])[];
}

/**
 * Group label as produced by a discriminant analysis (factor level)
 */
export type GroupLabel = string | number;

/**
 * Principal-component style ordination (ade4 `dudi` family)
 */
export interface OrdinationResult {
  readonly kind: 'dudi';
  readonly classes?: readonly string[];
  /** Entity scores on the retained axes */
  readonly scores: ScoreMatrix;
}

/**
 * Discriminant analysis of principal components (adegenet `dapc`)
 */
export interface DiscriminantResult {
  readonly kind: 'dapc';
  readonly classes?: readonly string[];
  /** Entity coordinates on the discriminant functions */
  readonly scores: ScoreMatrix;
  /** Group used in the analysis, per entity */
  readonly groups: readonly GroupLabel[];
  /** Group assigned from the discriminant functions, per entity */
  readonly assigned: readonly GroupLabel[];
  /** Membership probabilities, one row per entity, one column per group */
  readonly posterior: ScoreMatrix;
}

/**
 * Spatial principal component analysis (adegenet `spca`)
 */
export interface SpatialComponentResult {
  readonly kind: 'spca';
  readonly classes?: readonly string[];
  /** Entity scores on the retained axes */
  readonly scores: ScoreMatrix;
  /** Lag vectors of the scores (mean score of each entity's neighbours) */
  readonly lagScores: ScoreMatrix;
}

export type AnalysisResult = OrdinationResult | DiscriminantResult | SpatialComponentResult;

export type AnalysisKind = AnalysisResult['kind'];

/**
 * Unvalidated analysis as supplied by a caller or a loader
 */
export interface AnalysisObject {
  readonly kind: string;
  readonly classes?: readonly string[];
  readonly [field: string]: unknown;
}
