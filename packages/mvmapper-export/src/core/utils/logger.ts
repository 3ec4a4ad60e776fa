/**
 * Structured logging utility for mvmapper-export
 *
 * Provides structured logging with levels, timestamps, and contextual metadata.
 * Exports report through the `Logger` interface, so callers can hand in their
 * own sink (the CLI passes its `CLILogger`, tests pass spies).
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * Diagnostic sink accepted by the exporter, validator and writer
 */
export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
}

export interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

export class ConsoleLogger implements Logger {
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.config.level];
  }

  formatMessage(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const hasMetadata = metadata !== undefined && Object.keys(metadata).length > 0;

    if (this.config.pretty) {
      const metaStr = hasMetadata ? ` ${JSON.stringify(metadata)}` : '';
      return `[${timestamp}] ${level.toUpperCase()}: ${message}${metaStr}`;
    }

    // JSON format for production
    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      message,
      ...(hasMetadata ? metadata : {}),
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    console.debug(this.formatMessage('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    console.info(this.formatMessage('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    console.warn(this.formatMessage('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    console.error(this.formatMessage('error', message, metadata));
  }
}

const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level !== undefined && isLogLevel(level)) {
    return level;
  }
  return 'info';
};

// Default logger instance
export const logger: Logger = new ConsoleLogger({
  level: getLogLevel(),
  service: 'mvmapper-export',
  pretty: process.env.NODE_ENV !== 'production',
});

/**
 * Create a logger scoped to a module
 */
export function createLogger(context: { readonly module?: string }): Logger {
  return new ConsoleLogger({
    level: getLogLevel(),
    service: `mvmapper-export:${context.module ?? 'unknown'}`,
    pretty: process.env.NODE_ENV !== 'production',
  });
}
