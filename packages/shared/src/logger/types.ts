export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Diagnostic logging. Standard output belongs to the command result, so
 * implementations write to standard error only.
 *
 * @example
 * ```typescript
 * const log = logger.child({ command: 'finalize' });
 * log.debug('repair pass 1 changed 2 waves');
 * log.error(err, 'plan write failed');
 * ```
 */
export interface Logger {
  /** Log a debug message (lowest priority, disabled by default) */
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
   * Create a child logger whose messages are prefixed with the bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
