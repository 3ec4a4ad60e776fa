#!/usr/bin/env tsx
/**
 * mvmapper-export CLI Entry Point
 *
 * Exports dudi, dapc and spca analysis results (serialised as JSON) merged
 * with per-entity location metadata (CSV) into mvMapper input files.
 *
 * @module mvmapper-export-cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import {
  CLI_NAME,
  ConfigError,
  EXIT_CODES,
  createCLILogger,
  exportCommand,
  loadConfig,
  type CLIConfig,
  type CLILogger,
} from '../src/cli/index.js';
import { createDefaultRegistry } from '../src/extractors/registry.js';

// ============================================================================
// Global State
// ============================================================================

interface GlobalContext {
  config: CLIConfig;
  logger: CLILogger;
  startTime: number;
}

let globalContext: GlobalContext | null = null;

function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch (error) {
    console.error(
      `Cannot read package version: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return '0.0.0';
}

function parseNonNegativeInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (Number.isNaN(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

type GlobalOptions = {
  verbose?: boolean;
  json?: boolean;
  config?: string;
};

interface ExportFlags {
  outFile?: string;
  outDir?: string;
  write: boolean;
  preview?: number;
}

async function initializeContext(
  globals: GlobalOptions,
  flags: Partial<ExportFlags> = {}
): Promise<GlobalContext> {
  const startTime = Date.now();

  const config = await loadConfig({
    configPath: globals.config,
    overrides: {
      verbose: globals.verbose,
      json: globals.json,
      outputDir: flags.outDir,
      // --no-write only; the default comes from env/config
      writeFile: flags.write === false ? false : undefined,
    },
  });

  const logger = createCLILogger({
    level: config.log.level,
    json: config.log.json,
  });

  globalContext = { config, logger, startTime };
  return globalContext;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Export multivariate analysis results for mvMapper')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output logs as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .mvmapperrc)');

  program
    .command('export <analysis> <metadata>')
    .description('Merge an analysis (JSON) with entity metadata (CSV) and write mvMapper input')
    .option('-o, --out-file <path>', 'Output CSV path (default: mvmapper_data_<timestamp>.csv)')
    .option('--out-dir <dir>', 'Directory for the synthesised output file name')
    .option('--no-write', 'Do not write a file; validate and merge only')
    .option('--preview <n>', 'Print the first n merged rows', parseNonNegativeInt)
    .action(async (analysis: string, metadata: string, flags: ExportFlags) => {
      try {
        await initializeContext(program.opts<GlobalOptions>(), flags);
      } catch (error) {
        if (error instanceof ConfigError) {
          console.error(`Configuration error: ${error.message}`);
          process.exit(EXIT_CODES.CONFIG_ERROR);
        }
        throw error;
      }

      const context = getGlobalContext();
      const result = await exportCommand(
        analysis,
        metadata,
        { outFile: flags.outFile, preview: flags.preview },
        { config: context.config, logger: context.logger }
      );
      process.exit(result.exitCode);
    });

  program
    .command('types')
    .description('List supported analysis classes')
    .action(() => {
      for (const extractor of createDefaultRegistry().getExtractors()) {
        console.log(`${extractor.className.padEnd(6)} ${extractor.description}`);
      }
    });

  return program;
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (globalContext) {
      globalContext.logger.error('Command failed', {
        error: error instanceof Error ? error.message : String(error),
        duration_ms: Date.now() - globalContext.startTime,
      });
    } else {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
