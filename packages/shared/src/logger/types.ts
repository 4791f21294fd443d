import type { RunEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout drivesort.
 * Supports both structured run events and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log(createEvent<CopyFailed>(runId, 'CopyFailed', { ... }));
 *
 * // Standard logging
 * logger.info('Scan completed');
 * logger.error(new Error('Failed'), 'Archive aborted');
 *
 * // Create a child logger with additional context
 * const childLogger = logger.child({ runId });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured run event.
   */
  log(event: RunEvent): MaybePromise<void>;

  /** Log a debug message (lowest priority, hidden unless verbose) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
