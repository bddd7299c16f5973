/**
 * @fileoverview Promise time bounds.
 *
 * @module utils/timeout
 */

import { TimeoutError } from '../types';

/**
 * Races a promise against a timer.
 *
 * The underlying operation keeps running after a timeout; only the wait is
 * abandoned.
 *
 * @throws TimeoutError if `promise` does not settle within `timeoutMs`
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, message: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(message, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
