/**
 * CLI Configuration Management
 *
 * Loads configuration from .mvmapperrc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (MVMAPPER_*)
 * 3. Config file (.mvmapperrc or --config path)
 * 4. Default values
 *
 * Example .mvmapperrc:
 * ```yaml
 * version: 1
 * output:
 *   directory: ./exports
 *   write_file: true
 * metadata:
 *   required_columns: [key, lat, lon]
 * log:
 *   level: info
 *   json: false
 * ```
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { isLogLevel, type LogLevel } from '../../core/utils/logger.js';
import { DEFAULT_REQUIRED_COLUMNS } from '../../validators/metadata-validator.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface OutputConfig {
  /** Directory for synthesised output file names */
  readonly directory: string;
  /** Write a CSV file unless told otherwise */
  readonly writeFile: boolean;
}

export interface MetadataConfig {
  /** Columns the metadata must provide */
  readonly requiredColumns: readonly string[];
}

export interface LogConfig {
  readonly level: LogLevel;
  readonly json: boolean;
}

export interface CLIConfig {
  readonly version: number;
  readonly output: OutputConfig;
  readonly metadata: MetadataConfig;
  readonly log: LogConfig;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure (YAML)
 */
const ConfigFileSchema = z
  .object({
    version: z.literal(1).optional(),
    output: z
      .object({
        directory: z.string().min(1).optional(),
        write_file: z.boolean().optional(),
      })
      .strict()
      .optional(),
    metadata: z
      .object({
        required_columns: z.array(z.string().min(1)).min(1).optional(),
      })
      .strict()
      .optional(),
    log: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
        json: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Configuration could not be found or parsed
 */
export class ConfigError extends Error {
  public readonly name = 'ConfigError' as const;

  constructor(
    message: string,
    public readonly configPath: string | null
  ) {
    super(message);
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'configPath'> = {
  version: 1,
  output: {
    directory: '.',
    writeFile: true,
  },
  metadata: {
    requiredColumns: DEFAULT_REQUIRED_COLUMNS,
  },
  log: {
    level: 'info',
    json: false,
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  '.mvmapperrc',
  '.mvmapperrc.yaml',
  '.mvmapperrc.yml',
  '.mvmapperrc.json',
];

/**
 * Find config file in a directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and validate config file content
 */
function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    // YAML is a superset of JSON, so one parser covers every config name
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  // An empty file parses to null
  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ConfigError(
      `Invalid config file ${filePath}${where}: ${issue?.message ?? 'invalid'}`,
      filePath
    );
  }
  return result.data;
}

type Env = Readonly<Record<string, string | undefined>>;

function getEnvVar(env: Env, name: string): string | undefined {
  const value = env[`MVMAPPER_${name}`];
  return value === '' ? undefined : value;
}

function getEnvBool(env: Env, name: string): boolean | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvLogLevel(env: Env): LogLevel | undefined {
  const value = getEnvVar(env, 'LOG_LEVEL')?.toLowerCase();
  if (value === undefined) return undefined;
  if (!isLogLevel(value)) {
    throw new ConfigError(
      `Invalid MVMAPPER_LOG_LEVEL: ${value}. Must be one of: debug, info, warn, error`,
      null
    );
  }
  return value;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** CLI flag overrides */
  overrides?: {
    outputDir?: string;
    writeFile?: boolean;
    verbose?: boolean;
    json?: boolean;
  };
  /** Environment to read MVMAPPER_* variables from (default: process.env) */
  env?: Env;
  /** Directory to start the config file search from (default: process.cwd()) */
  cwd?: string;
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError when an explicit config file is missing or any config
 *   file is invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? getEnvVar(env, 'CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const overrides = options.overrides ?? {};
  const verboseLevel: LogLevel | undefined = overrides.verbose ? 'debug' : undefined;

  return {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    output: {
      directory:
        overrides.outputDir ??
        getEnvVar(env, 'OUTPUT_DIR') ??
        fileConfig.output?.directory ??
        DEFAULT_CONFIG.output.directory,
      writeFile:
        overrides.writeFile ??
        getEnvBool(env, 'WRITE_FILE') ??
        fileConfig.output?.write_file ??
        DEFAULT_CONFIG.output.writeFile,
    },

    metadata: {
      requiredColumns:
        fileConfig.metadata?.required_columns ?? DEFAULT_CONFIG.metadata.requiredColumns,
    },

    log: {
      level:
        verboseLevel ??
        getEnvLogLevel(env) ??
        fileConfig.log?.level ??
        DEFAULT_CONFIG.log.level,
      json: overrides.json ?? getEnvBool(env, 'JSON') ?? fileConfig.log?.json ?? DEFAULT_CONFIG.log.json,
    },

    configPath,
  };
}

/**
 * Output directory as an absolute path. A relative directory resolves
 * against the loaded config file's directory, or `cwd` when there is none.
 */
export function resolveOutputDir(config: CLIConfig, cwd: string = process.cwd()): string {
  const basePath = config.configPath ? dirname(config.configPath) : cwd;
  return resolve(basePath, config.output.directory);
}
