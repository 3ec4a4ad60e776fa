/**
 * Extraction strategy contract
 */

import type { z } from 'zod';
import type { Table } from '../core/types/index.js';

/**
 * Turns one analysis variant into a per-entity table keyed by `key`.
 *
 * `extract` is pure: it validates its input, never mutates it, and either
 * returns a complete table or throws.
 */
export interface AnalysisExtractor {
  /** Analysis class handled (e.g. `dapc`) */
  readonly className: string;
  /** Human-readable label for help output */
  readonly description: string;
  /**
   * Column names every extracted table contains, besides numbered components.
   * The exporter rejects a table missing any of them (or `key`).
   */
  readonly fixedColumns: readonly string[];
  extract(analysis: unknown): Table;
}

/**
 * Pieces needed to define a strategy for a validated result type
 */
export interface ExtractorDefinition<T> {
  readonly className: string;
  readonly description: string;
  readonly fixedColumns: readonly string[];
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  readonly build: (result: T) => Table;
}
