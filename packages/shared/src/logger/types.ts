/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout moonfmt.
 *
 * @example
 * ```typescript
 * logger.debug('creating a pool with 8 threads');
 * logger.error(new Error('Failed'), 'error: could not walk');
 * ```
 */
export interface Logger {
  /** Log a debug message, emitted only in verbose mode */
  debug(message: string): MaybePromise<void>;
  /**
   * Log an error, rendered with its whole cause chain on one line.
   * @param error - The error that occurred
   * @param message - Optional additional context placed before the chain
   */
  error(error: Error, message?: string): MaybePromise<void>;
}
