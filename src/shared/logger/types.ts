/**
 * Severity levels, lowest first.
 */
export type LogLevel = 'debug' | 'error';

/**
 * Interface for diagnostics throughout lgrep.
 * Matched lines are program output and never go through a logger.
 *
 * @example
 * ```typescript
 * logger.error(new NotFoundError('missing.txt'));
 *
 * // Debug lines from a directory walk carry the walk's root
 * logger.child({ root: 'src' }).debug('skipping src/fifo: not a regular file');
 * ```
 */
export interface Logger {
  /** Log a debug message (suppressed unless verbose output is on) */
  debug(message: string): void;
  /**
   * Log an error with optional message.
   * @param error - The error that occurred
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): void;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   * @param bindings - Key-value pairs to include in all child logs
   */
  child(bindings: Record<string, unknown>): Logger;
}
