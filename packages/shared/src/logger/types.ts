import type { BuildEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Interface for logging throughout cyforge.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log(createEvent(runId, { type: 'UnitSkipped', payload: { path: 'pkg/a.py' } }));
 *
 * // Standard logging
 * logger.info('Scan complete');
 * logger.error(new Error('Failed'), 'Flush failed');
 *
 * // Create a child logger with additional context
 * const workerLogger = logger.child({ worker: 2 });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured build event.
   */
  log(event: BuildEvent): MaybePromise<void>;

  /**
   * High-signal event paired with a human-readable summary.
   */
  trace(event: BuildEvent, message: string): MaybePromise<void>;

  /** Log a debug message (lowest priority, hidden unless --verbose) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All text logs from the child are prefixed with these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
