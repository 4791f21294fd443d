/**
 * Error codes used throughout drivesort.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  | 'ClassificationConfigError'
  // Runtime errors (exit code 1)
  | 'ScanError'
  | 'CopyError'
  | 'ArchiveError'
  | 'FatalIOError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all drivesort errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('FatalIOError', 'Destination is not writable', {
 *   cause: originalError,
 *   details: { destination: '/mnt/out' }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when the category table is ambiguous or malformed.
 * Raised while the table is built, before any scanning starts.
 */
export class ClassificationConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ClassificationConfigError', message, options);
  }
}

/**
 * A directory or entry could not be read during a scan.
 * Recoverable: the scanner reports it and moves on.
 */
export class ScanError extends AppError {
  /** Path of the entry that could not be read */
  public readonly path: string;

  constructor(path: string, message: string, options: AppErrorOptions = {}) {
    super('ScanError', message, options);
    this.path = path;
  }
}

/**
 * A single file could not be copied. Recorded per file, never fatal.
 */
export class CopyError extends AppError {
  /** Source path of the file that failed */
  public readonly sourcePath: string;

  constructor(sourcePath: string, message: string, options: AppErrorOptions = {}) {
    super('CopyError', message, options);
    this.sourcePath = sourcePath;
  }
}

/**
 * The archive could not be written. Fatal for the archive only.
 */
export class ArchiveError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ArchiveError', message, options);
  }
}

/**
 * The source or destination root is unreachable. Aborts the run.
 */
export class FatalIOError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('FatalIOError', message, options);
  }
}

/**
 * Returns the `code` of a Node.js system error, if it has one.
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
