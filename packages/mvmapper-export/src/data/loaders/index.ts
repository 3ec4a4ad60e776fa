/**
 * Data Loaders
 *
 * File readers for the command-line front end: analysis results as JSON,
 * entity metadata as CSV.
 */

export {
  AnalysisEnvelopeSchema,
  parseAnalysisJson,
  loadAnalysisFile,
} from './analysis-loader.js';

export { parseCsvRecords, parseCsv, loadMetadataFile } from './metadata-loader.js';
