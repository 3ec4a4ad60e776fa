/**
 * mvmapper-export Error Types
 *
 * Custom error classes for export failures. Every failure below is fatal to
 * the current export call: nothing is retried and no partial table or file is
 * produced. Incomplete metadata coverage is NOT an error (it is logged as a
 * warning and resolved by the inner join).
 */

/**
 * Discriminant for all export errors
 */
export type ExportErrorCode =
  | 'UNSUPPORTED_ANALYSIS_TYPE'
  | 'MALFORMED_ANALYSIS_RESULT'
  | 'MISSING_COLUMN'
  | 'IO_FAILURE';

/**
 * Base class for all errors raised by the exporter
 */
export abstract class MvmapperExportError extends Error {
  abstract readonly code: ExportErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Create a formatted error message for logging
   */
  toLogString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

/**
 * No extraction strategy is registered for any of the analysis' classes.
 *
 * @example
 * ```typescript
 * throw new UnsupportedAnalysisTypeError(['lda', 'list']);
 * // "No method available for the class lda, list"
 * ```
 */
export class UnsupportedAnalysisTypeError extends MvmapperExportError {
  public readonly name = 'UnsupportedAnalysisTypeError' as const;
  public readonly code = 'UNSUPPORTED_ANALYSIS_TYPE' as const;

  constructor(public readonly classNames: readonly string[]) {
    super(`No method available for the class ${classNames.join(', ')}`);
  }
}

/**
 * An analysis object lacks a field its strategy needs, or the field has the
 * wrong shape.
 */
export class MalformedAnalysisResultError extends MvmapperExportError {
  public readonly name = 'MalformedAnalysisResultError' as const;
  public readonly code = 'MALFORMED_ANALYSIS_RESULT' as const;

  /**
   * @param field - Dot path of the offending field (e.g. `scores.rows`)
   * @param reason - What is wrong with it
   */
  constructor(
    public readonly field: string,
    public readonly reason: string = 'missing'
  ) {
    super(`Analysis result field '${field}' is malformed: ${reason}`);
  }

  override toLogString(): string {
    return [super.toLogString(), `  Field: ${this.field}`].join('\n');
  }
}

/**
 * Metadata lacks one of the required columns
 */
export class MissingColumnError extends MvmapperExportError {
  public readonly name = 'MissingColumnError' as const;
  public readonly code = 'MISSING_COLUMN' as const;

  constructor(public readonly column: string) {
    super(`Metadata is missing a '${column}' column`);
  }
}

/**
 * Reading or writing a file failed
 */
export class IOFailureError extends MvmapperExportError {
  public readonly name = 'IOFailureError' as const;
  public readonly code = 'IO_FAILURE' as const;

  constructor(
    public readonly path: string,
    public readonly operation: 'read' | 'write',
    cause: unknown
  ) {
    super(
      `Failed to ${operation} ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }

  override toLogString(): string {
    return [super.toLogString(), `  Path: ${this.path}`].join('\n');
  }
}

/**
 * Type guard for any exporter error
 */
export function isMvmapperExportError(error: unknown): error is MvmapperExportError {
  return error instanceof MvmapperExportError;
}

export function isUnsupportedAnalysisTypeError(
  error: unknown
): error is UnsupportedAnalysisTypeError {
  return error instanceof UnsupportedAnalysisTypeError;
}

export function isMalformedAnalysisResultError(
  error: unknown
): error is MalformedAnalysisResultError {
  return error instanceof MalformedAnalysisResultError;
}

export function isMissingColumnError(error: unknown): error is MissingColumnError {
  return error instanceof MissingColumnError;
}

export function isIOFailureError(error: unknown): error is IOFailureError {
  return error instanceof IOFailureError;
}
