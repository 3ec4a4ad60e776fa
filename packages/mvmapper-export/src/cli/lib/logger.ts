/**
 * CLI Structured Logging
 *
 * Structured JSON output for machine consumption and coloured one-line output
 * for interactive use. Implements the package `Logger` interface, so the CLI
 * hands this logger straight to the exporter and its notices come out in the
 * same format as the command's own messages.
 *
 * @module cli/lib/logger
 */

import type { LogLevel, LogMetadata, Logger } from '../../core/utils/logger.js';
import { formatCell } from '../../persistence/csv-writer.js';
import type { Table } from '../../core/types/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Structured log entry for JSON output
 */
export interface StructuredLogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly command?: string;
  readonly duration_ms?: number;
  readonly [key: string]: unknown;
}

export interface CLILoggerConfig {
  /** Minimum log level to output */
  readonly level: LogLevel;
  /** Output as JSON */
  readonly json: boolean;
  /** Service name */
  readonly service?: string;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * ANSI color codes for terminal output
 */
const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

// ============================================================================
// CLI Logger Class
// ============================================================================

export class CLILogger implements Logger {
  private readonly config: CLILoggerConfig;
  private startTime: number;
  private commandContext: string | null = null;

  constructor(config: CLILoggerConfig) {
    this.config = {
      service: 'mvmapper-export',
      ...config,
    };
    this.startTime = Date.now();
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private formatJson(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.config.service && { service: this.config.service }),
      ...(this.commandContext && { command: this.commandContext }),
      ...(metadata && Object.keys(metadata).length > 0 ? metadata : {}),
    };
    return JSON.stringify(entry);
  }

  private formatHuman(level: LogLevel, message: string, metadata?: LogMetadata): string {
    let line = `${COLORS.dim}${new Date().toISOString()}${COLORS.reset} `;
    line += `${LEVEL_COLORS[level]}${LEVEL_LABELS[level]}${COLORS.reset} `;
    line += message;

    if (metadata && Object.keys(metadata).length > 0) {
      const metaStr = Object.entries(metadata)
        .map(([key, value]) => {
          const valueStr = typeof value === 'object' ? JSON.stringify(value) : String(value);
          return `${COLORS.cyan}${key}${COLORS.reset}=${valueStr}`;
        })
        .join(' ');
      line += ` ${COLORS.dim}(${metaStr})${COLORS.reset}`;
    }

    return line;
  }

  /**
   * Render a log line without emitting it
   */
  format(level: LogLevel, message: string, metadata?: LogMetadata): string {
    return this.config.json
      ? this.formatJson(level, message, metadata)
      : this.formatHuman(level, message, metadata);
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;

    const formatted = this.format(level, message, metadata);
    switch (level) {
      case 'debug':
        console.debug(formatted);
        break;
      case 'info':
        console.info(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      case 'error':
        console.error(formatted);
        break;
    }
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  /**
   * Log command start and reset the duration timer
   */
  commandStart(command: string, options?: LogMetadata): void {
    this.commandContext = command;
    this.startTime = Date.now();
    this.info(`Starting ${command}`, options);
  }

  /**
   * Log command completion with duration
   */
  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const baseMetadata = { duration_ms: Date.now() - this.startTime, ...metadata };

    if (success) {
      this.info('Command completed', baseMetadata);
    } else {
      this.error('Command failed', baseMetadata);
    }
  }

  /**
   * Print a table preview: aligned columns for humans, one JSON array in JSON
   * mode
   */
  table(table: Table): void {
    if (this.config.json) {
      console.log(JSON.stringify(table.rows));
      return;
    }

    if (table.rows.length === 0) {
      this.info('No rows to display');
      return;
    }

    const cols = table.columns;
    const widths = cols.map((col) =>
      Math.max(col.length, ...table.rows.map((row) => formatCell(row[col]).length))
    );

    console.log(cols.map((col, i) => col.padEnd(widths[i] ?? 0)).join(' | '));
    console.log(widths.map((w) => '-'.repeat(w)).join('-+-'));
    for (const row of table.rows) {
      console.log(cols.map((col, i) => formatCell(row[col]).padEnd(widths[i] ?? 0)).join(' | '));
    }
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createCLILogger(config: Partial<CLILoggerConfig> = {}): CLILogger {
  return new CLILogger({
    level: config.level ?? 'info',
    json: config.json ?? false,
    service: config.service ?? 'mvmapper-export',
  });
}
