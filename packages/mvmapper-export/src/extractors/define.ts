/**
 * Strategy factory: schema validation in front of a pure table builder
 */

import { parseAnalysisResult } from '../schemas/analysis.js';
import type { AnalysisExtractor, ExtractorDefinition } from './types.js';

export function defineExtractor<T>(definition: ExtractorDefinition<T>): AnalysisExtractor {
  const { className, description, fixedColumns, schema, build } = definition;
  return {
    className,
    description,
    fixedColumns,
    extract(analysis: unknown) {
      return build(parseAnalysisResult(schema, analysis));
    },
  };
}
