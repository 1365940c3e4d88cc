/**
 * Base error class for detector errors
 */
export abstract class DetectorError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;

  constructor(message: string, code: string, category: ErrorCategory) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.category = category;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error categories for classification
 */
export enum ErrorCategory {
  /**
   * Affects one file or one pattern; analysis of everything else continues
   */
  RECOVERABLE = 'recoverable',

  /**
   * The run cannot start or continue
   */
  FATAL = 'fatal'
}

/**
 * Source text is not valid Python for the revision being parsed
 */
export class ParseError extends DetectorError {
  public readonly filePath: string;
  public readonly line?: number;
  public readonly column?: number;

  constructor(filePath: string, detail: string, line?: number, column?: number) {
    const where = line !== undefined ? ` at line ${line}${column !== undefined ? `, column ${column}` : ''}` : '';
    super(`Syntax error in ${filePath}${where}: ${detail}`, 'PARSE_ERROR', ErrorCategory.RECOVERABLE);
    this.filePath = filePath;
    this.line = line;
    this.column = column;
  }
}

/**
 * A revision content provider could not produce text for a file at a ref
 */
export class ContentUnavailableError extends DetectorError {
  public readonly filePath: string;
  public readonly revision: string;
  public readonly originalError?: Error;

  constructor(filePath: string, revision: string, originalError?: Error) {
    const message = `Content of ${filePath} unavailable at ${revision}${originalError ? ` - ${originalError.message}` : ''}`;
    super(message, 'CONTENT_UNAVAILABLE', ErrorCategory.RECOVERABLE);
    this.filePath = filePath;
    this.revision = revision;
    this.originalError = originalError;
  }
}

/**
 * A generated usage pattern is not a valid regular expression
 */
export class PatternCompileError extends DetectorError {
  public readonly pattern: string;

  constructor(pattern: string, detail: string) {
    super(`Invalid usage pattern ${pattern}: ${detail}`, 'PATTERN_COMPILE_ERROR', ErrorCategory.RECOVERABLE);
    this.pattern = pattern;
  }
}

/**
 * Candidate file could not be read
 */
export class FileAccessError extends DetectorError {
  public readonly path: string;
  public readonly originalError?: Error;

  constructor(path: string, originalError?: Error) {
    const message = `Failed to read file: ${path}${originalError ? ` - ${originalError.message}` : ''}`;
    super(message, 'FILE_ACCESS_ERROR', ErrorCategory.RECOVERABLE);
    this.path = path;
    this.originalError = originalError;
  }
}

/**
 * Git reference is empty or carries characters outside the allowed set
 */
export class GitReferenceError extends DetectorError {
  public readonly ref: string;

  constructor(ref: string, reason: string) {
    super(`Invalid git reference "${ref}": ${reason}`, 'GIT_REFERENCE_ERROR', ErrorCategory.FATAL);
    this.ref = ref;
  }
}

/**
 * Configuration validation error
 */
export class ConfigurationError extends DetectorError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid configuration for '${field}': ${message}`, 'CONFIGURATION_ERROR', ErrorCategory.FATAL);
    this.field = field;
  }
}

/**
 * Checks whether an error only degrades recall
 */
export function isRecoverable(error: unknown): boolean {
  return error instanceof DetectorError && error.category === ErrorCategory.RECOVERABLE;
}
