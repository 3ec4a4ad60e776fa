/**
 * Extractor Registry
 *
 * Maps analysis class names to extraction strategies. An analysis is
 * dispatched on its class list, most specific class first; the first class
 * with a registered strategy wins. New analysis types are supported by
 * registering another strategy.
 */

import { UnsupportedAnalysisTypeError } from '../core/errors.js';
import type { AnalysisObject } from '../core/types/index.js';
import { discriminantExtractor } from './discriminant.js';
import { ordinationExtractor } from './ordination.js';
import { spatialExtractor } from './spatial.js';
import type { AnalysisExtractor } from './types.js';

export class ExtractorRegistry {
  private readonly extractors = new Map<string, AnalysisExtractor>();

  constructor(extractors: readonly AnalysisExtractor[] = []) {
    for (const extractor of extractors) {
      this.register(extractor);
    }
  }

  /**
   * Register a strategy, replacing any previous one for the same class
   */
  register(extractor: AnalysisExtractor): this {
    this.extractors.set(extractor.className, extractor);
    return this;
  }

  has(className: string): boolean {
    return this.extractors.has(className);
  }

  /**
   * First registered strategy among the given class names
   */
  find(classNames: readonly string[]): AnalysisExtractor | undefined {
    for (const name of classNames) {
      const extractor = this.extractors.get(name);
      if (extractor) return extractor;
    }
    return undefined;
  }

  /**
   * Strategy for an analysis object.
   *
   * @throws UnsupportedAnalysisTypeError listing every class of the analysis
   */
  resolve(analysis: AnalysisObject): AnalysisExtractor {
    const classNames = analysisClassNames(analysis);
    const extractor = this.find(classNames);
    if (!extractor) {
      throw new UnsupportedAnalysisTypeError(classNames);
    }
    return extractor;
  }

  getExtractors(): readonly AnalysisExtractor[] {
    return Array.from(this.extractors.values());
  }
}

/**
 * Class list of an analysis: explicit `classes` when given, else its `kind`
 */
export function analysisClassNames(analysis: AnalysisObject): readonly string[] {
  if (analysis.classes !== undefined && analysis.classes.length > 0) {
    return analysis.classes;
  }
  return [analysis.kind];
}

/**
 * Registry holding the built-in dudi, dapc and spca strategies
 */
export function createDefaultRegistry(): ExtractorRegistry {
  return new ExtractorRegistry([ordinationExtractor, discriminantExtractor, spatialExtractor]);
}
