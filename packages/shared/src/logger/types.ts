import type { StagerEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout release-stager.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ ...eventBase(runId), type: 'FilesAdded', payload: { fileCount: 4 } });
 *
 * // Standard logging
 * logger.info('Checking out dist from: scm:svn:https://svn.example.org/dist/dev/foo');
 * logger.error(new Error('Failed'), 'Could not commit files to dist');
 *
 * // Create a child logger with additional context
 * const childLogger = logger.child({ workflow: 'stage' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured event.
   * @param event - The event to log
   */
  log(event: StagerEvent): MaybePromise<void>;

  /**
   * High-signal trace event with a human-readable message.
   * @param event - The event being traced
   * @param message - Human-readable description
   */
  trace(event: StagerEvent, message: string): MaybePromise<void>;

  /** Log a debug message (lowest priority, hidden unless verbose) */
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

  /**
   * Create a child logger with additional context bindings.
   * All messages from the child are prefixed with these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
