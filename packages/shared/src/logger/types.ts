import type { HarnessEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout the harness.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * logger.log({ ...eventBase(runId), type: 'RunFinished', payload: { ... } });
 * logger.info('Corpus loaded');
 * logger.child({ scenario: 'fastapi-7', strategy: 'react' }).debug('dispatching');
 * ```
 */
export interface Logger {
  /**
   * Persist a structured harness event.
   */
  log(event: HarnessEvent): MaybePromise<void>;

  /** Log a debug message; printed only when the logger is verbose */
  debug(message: string): MaybePromise<void>;
  info(message: string): MaybePromise<void>;
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger whose messages are prefixed with the given bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  /** Print debug messages */
  verbose?: boolean;
}
