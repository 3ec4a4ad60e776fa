/**
 * Analysis Loader
 *
 * Reads an analysis result serialised as JSON. Only the envelope is checked
 * here (a `kind` and optional `classes`); variant fields are validated by the
 * extraction strategy that handles the analysis.
 *
 * @example
 * ```json
 * {
 *   "kind": "dapc",
 *   "scores": { "rowNames": ["A", "B"], "ncol": 1, "rows": [[0.4], [-1.2]] },
 *   "groups": [1, 2],
 *   "assigned": [1, 2],
 *   "posterior": { "rowNames": ["A", "B"], "ncol": 2, "rows": [[0.9, 0.1], [0.3, 0.7]] }
 * }
 * ```
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { IOFailureError, MalformedAnalysisResultError } from '../../core/errors.js';
import type { AnalysisObject } from '../../core/types/index.js';
import { parseAnalysisResult } from '../../schemas/analysis.js';

export const AnalysisEnvelopeSchema = z
  .object({
    kind: z.string().min(1, 'Analysis kind must not be empty'),
    classes: z.array(z.string()).optional(),
  })
  .passthrough();

/**
 * Validate the envelope of a parsed JSON value
 *
 * @throws MalformedAnalysisResultError when `kind` or `classes` is invalid
 */
export function parseAnalysisJson(value: unknown): AnalysisObject {
  return parseAnalysisResult(AnalysisEnvelopeSchema, value);
}

/**
 * Read and parse an analysis JSON file
 *
 * @throws IOFailureError when the file cannot be read
 * @throws MalformedAnalysisResultError when it is not a valid analysis envelope
 */
export function loadAnalysisFile(filePath: string): AnalysisObject {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new IOFailureError(filePath, 'read', error);
  }

  let value: unknown;
  try {
    value = JSON.parse(content);
  } catch (error) {
    throw new MalformedAnalysisResultError(
      '(root)',
      `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parseAnalysisJson(value);
}
