/**
 * CLI Library Index
 *
 * @module cli/lib
 */

export {
  loadConfig,
  findConfigFile,
  resolveOutputDir,
  ConfigError,
  DEFAULT_CONFIG,
  CONFIG_FILE_NAMES,
  type CLIConfig,
  type OutputConfig,
  type MetadataConfig,
  type LogConfig,
  type LoadConfigOptions,
} from './config.js';

export {
  CLILogger,
  createCLILogger,
  type CLILoggerConfig,
  type StructuredLogEntry,
} from './logger.js';

export { EXIT_CODES, type ExitCode } from './exit-codes.js';
