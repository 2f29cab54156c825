/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for diagnostics written while counting.
 * Diagnostics never share a stream with the report itself.
 *
 * @example
 * ```typescript
 * logger.warn('Error processing src/a.py: invalid UTF-8');
 * logger.error(new Error('Failed'), 'Scan aborted');
 * ```
 */
export interface Logger {
  /** Log a debug message (lowest priority) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   * @param error - The error that occurred
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): MaybePromise<void>;
}
