/**
 * @fileoverview Cancellable fixed-interval ticker.
 *
 * The daemon's worker loop suspends only at tick boundaries. Cancelling the
 * ticker wakes a pending wait immediately, which bounds shutdown latency.
 *
 * @module utils/ticker
 */

/**
 * A ticker with its own cancellation channel.
 *
 * @example
 * ```typescript
 * const ticker = new Ticker(100);
 * while (await ticker.wait()) {
 *   doWork();
 * }
 * // elsewhere: ticker.cancel();
 * ```
 */
export class Ticker {
  private readonly controller = new AbortController();

  constructor(private readonly intervalMs: number) {}

  /** Whether {@link cancel} has been called */
  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /** Signal aborted on cancellation, for callers that need to observe it */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Raises the cancellation signal. Safe to call more than once.
   */
  cancel(): void {
    this.controller.abort();
  }

  /**
   * Waits one tick, or `ms` when given.
   *
   * @returns false if the ticker was cancelled before or during the wait
   */
  wait(ms: number = this.intervalMs): Promise<boolean> {
    const signal = this.controller.signal;
    if (signal.aborted) {
      return Promise.resolve(false);
    }

    return new Promise(resolve => {
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve(false);
      };
      const timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort);
        resolve(true);
      }, ms);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}
