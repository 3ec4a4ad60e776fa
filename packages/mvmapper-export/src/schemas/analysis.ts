/**
 * Analysis Result Schemas
 *
 * Zod schemas for the three supported analysis variants. Extraction strategies
 * run their input through these before touching any field; the first schema
 * issue becomes a `MalformedAnalysisResultError` naming the field's dot path.
 *
 * TYPE SAFETY: parsed values are assignable to the interfaces in
 * `core/types/analysis.ts`.
 */

import { z } from 'zod';
import { MalformedAnalysisResultError } from '../core/errors.js';
import type {
  DiscriminantResult,
  OrdinationResult,
  ScoreMatrix,
  SpatialComponentResult,
} from '../core/types/index.js';

// ============================================================================
// Building Blocks
// ============================================================================

/**
 * Numeric matrix with named rows.
 *
 * Rules: one row name per row; every row holds exactly `ncol` finite numbers;
 * at least one column.
 */
export const ScoreMatrixSchema = z
  .object({
    rowNames: z.array(z.string()),
    ncol: z.number().int().min(1, 'Matrix must have at least one column'),
    rows: z.array(z.array(z.number().finite())),
  })
  .superRefine((matrix, ctx) => {
    if (matrix.rows.length !== matrix.rowNames.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['rows'],
        message: `Expected ${matrix.rowNames.length} rows (one per row name), found ${matrix.rows.length}`,
      });
      return;
    }
    matrix.rows.forEach((row, i) => {
      if (row.length !== matrix.ncol) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rows', i],
          message: `Expected ${matrix.ncol} values, found ${row.length}`,
        });
      }
    });
  });

export const GroupLabelSchema = z.union([z.string(), z.number()]);

// ============================================================================
// Variant Schemas
// ============================================================================

export const OrdinationResultSchema: z.ZodType<OrdinationResult, z.ZodTypeDef, unknown> = z
  .object({
    scores: ScoreMatrixSchema,
  })
  .transform((fields) => ({ kind: 'dudi' as const, ...fields }));

export const DiscriminantResultSchema: z.ZodType<DiscriminantResult, z.ZodTypeDef, unknown> = z
  .object({
    scores: ScoreMatrixSchema,
    groups: z.array(GroupLabelSchema),
    assigned: z.array(GroupLabelSchema),
    posterior: ScoreMatrixSchema,
  })
  .superRefine((fields, ctx) => {
    const n = fields.scores.rowNames.length;
    const perEntity = [
      ['groups', fields.groups.length],
      ['assigned', fields.assigned.length],
      ['posterior', fields.posterior.rows.length],
    ] as const;
    for (const [field, length] of perEntity) {
      if (length !== n) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [field],
          message: `Expected one entry per entity (${n}), found ${length}`,
        });
      }
    }
    if (
      fields.posterior.rows.length === n &&
      !sameRowNames(fields.scores, fields.posterior)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['posterior', 'rowNames'],
        message: 'Posterior must list the same entities, in the same order, as the scores',
      });
    }
  })
  .transform((fields) => ({ kind: 'dapc' as const, ...fields }));

export const SpatialComponentResultSchema: z.ZodType<
  SpatialComponentResult,
  z.ZodTypeDef,
  unknown
> = z
  .object({
    scores: ScoreMatrixSchema,
    lagScores: ScoreMatrixSchema,
  })
  .superRefine((fields, ctx) => {
    if (!sameRowNames(fields.scores, fields.lagScores)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['lagScores', 'rowNames'],
        message: 'Lag scores must list the same entities, in the same order, as the scores',
      });
      return;
    }
    if (fields.lagScores.ncol !== fields.scores.ncol) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['lagScores', 'ncol'],
        message: `Expected ${fields.scores.ncol} lag columns, found ${fields.lagScores.ncol}`,
      });
    }
  })
  .transform((fields) => ({ kind: 'spca' as const, ...fields }));

function sameRowNames(a: ScoreMatrix, b: ScoreMatrix): boolean {
  return a.rowNames.length === b.rowNames.length && a.rowNames.every((name, i) => b.rowNames[i] === name);
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse an analysis object against a variant schema.
 *
 * @throws MalformedAnalysisResultError naming the first offending field
 */
export function parseAnalysisResult<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue !== undefined && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new MalformedAnalysisResultError(field, issue?.message ?? 'Invalid analysis result');
  }
  return result.data;
}
