/**
 * @fileoverview Shared error types for the monitor daemon.
 *
 * Each component catches errors at its own boundary; these classes let the
 * daemon tell a retryable collection failure apart from a bug.
 *
 * @module types
 */

/**
 * Custom error class for operations that exceeded their time budget.
 * This survives the error chain so it can be properly identified
 * at any level of the call stack.
 */
export class TimeoutError extends Error {
  constructor(message: string, public readonly timeoutMs: number) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Raised by the usage collector when a collection attempt fails.
 *
 * Always retryable: the daemon simply waits for the next tick.
 */
export class CollectionError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'CollectionError';
  }
}

/**
 * Raised by the event parser when a log source cannot be read.
 */
export class LogParseError extends Error {
  constructor(message: string, public readonly filePath: string) {
    super(message);
    this.name = 'LogParseError';
  }
}

/**
 * Normalizes an unknown thrown value into a readable message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
