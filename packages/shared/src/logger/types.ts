/**
 * Severity levels understood by gitsift loggers, lowest first.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Interface for logging throughout gitsift.
 *
 * @example
 * ```typescript
 * logger.info('Cloned repository');
 * logger.error(new Error('Failed'), 'Cleanup failed');
 *
 * // Create a child logger with additional context
 * const walkLogger = logger.child({ component: 'walker' });
 * ```
 */
export interface Logger {
  /** Log a debug message (lowest priority, hidden by default) */
  debug(message: string): void;
  /** Log an informational message */
  info(message: string): void;
  /** Log a warning message */
  warn(message: string): void;
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
