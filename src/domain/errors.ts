/**
 * Error hierarchy for ARFF loading.
 *
 * Every failure is fatal to the operation that raised it; the caller sees the
 * first problem encountered. Parser-raised errors carry the 1-based line
 * number of the offending line.
 */

/** Machine-readable error codes. */
export type ArffErrorCode =
  | 'CONFIGURATION'
  | 'UNSUPPORTED_ATTRIBUTE_TYPE'
  | 'INVALID_DATE_FORMAT'
  | 'MALFORMED_ATTRIBUTE'
  | 'MALFORMED_ROW'
  | 'DUPLICATE_ATTRIBUTE_NAME'
  | 'IO'
  | 'OUT_OF_RANGE';

/** Base class for all errors raised by this package. */
export class ArffError extends Error {
  constructor(
    message: string,
    public readonly code: ArffErrorCode,
    public readonly lineNumber?: number,
    public readonly context?: string,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ArffError';
  }

  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${String(this.lineNumber)})`;
    }
    if (this.context !== undefined && this.context !== '') {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/** Bad source address, unresolved class column, unknown column or an incompatible selection. */
export class ConfigurationError extends ArffError {
  constructor(message: string, context?: string) {
    super(message, 'CONFIGURATION', undefined, context);
    this.name = 'ConfigurationError';
  }
}

export type FormatErrorCode = Extract<
  ArffErrorCode,
  | 'UNSUPPORTED_ATTRIBUTE_TYPE'
  | 'INVALID_DATE_FORMAT'
  | 'MALFORMED_ATTRIBUTE'
  | 'MALFORMED_ROW'
  | 'DUPLICATE_ATTRIBUTE_NAME'
>;

/** The text violates the ARFF format: bad attribute declaration, date pattern or cell value. */
export class FormatError extends ArffError {
  declare readonly code: FormatErrorCode;

  constructor(message: string, code: FormatErrorCode, lineNumber?: number, context?: string) {
    super(message, code, lineNumber, context);
    this.name = 'FormatError';
  }

  /** Copy of this error pinned to a line, unless it already names one. */
  atLine(lineNumber: number, context?: string): FormatError {
    if (this.lineNumber !== undefined) return this;
    return new FormatError(this.message, this.code, lineNumber, context ?? this.context);
  }
}

/** Reading or decompressing the underlying source failed. */
export class IOError extends ArffError {
  constructor(message: string, lineNumber?: number, cause?: unknown) {
    super(message, 'IO', lineNumber, undefined, { cause });
    this.name = 'IOError';
  }

  static fromSystemError(location: string, systemError: unknown, lineNumber?: number): IOError {
    return new IOError(`Failed to read ARFF data from ${location}: ${errorMessage(systemError)}`, lineNumber, systemError);
  }
}

/** Row index or cell position outside the materialized table. */
export class OutOfRangeError extends ArffError {
  constructor(message: string) {
    super(message, 'OUT_OF_RANGE');
    this.name = 'OutOfRangeError';
  }
}

/** Human-readable message of any thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
