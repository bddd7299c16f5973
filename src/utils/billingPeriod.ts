/**
 * @fileoverview Billing period boundaries for month-to-date totals.
 *
 * @module utils/billingPeriod
 */

/**
 * Start and end of one billing period.
 */
export interface BillingPeriod {
  /** Local midnight of the billing start day */
  start: Date;
  /** Last millisecond before the next period starts */
  end: Date;
}

/**
 * Computes the billing period containing `now`.
 *
 * Periods start at local midnight on `startDay` of each month. Start days
 * are limited to 1-28 so every month has one.
 *
 * @param now - Reference time
 * @param startDay - Day of month the period starts on (1-28)
 *
 * @example
 * ```typescript
 * // startDay 15, now 2025-07-06 → 2025-06-15 00:00 .. 2025-07-14 23:59:59.999
 * const period = getBillingPeriod(new Date(2025, 6, 6), 15);
 * ```
 */
export function getBillingPeriod(now: Date, startDay: number = 1): BillingPeriod {
  const day = Math.min(Math.max(Math.trunc(startDay), 1), 28);

  let year = now.getFullYear();
  let month = now.getMonth();
  if (now.getDate() < day) {
    month -= 1;
    if (month < 0) {
      month = 11;
      year -= 1;
    }
  }

  const start = new Date(year, month, day, 0, 0, 0, 0);
  const nextStart = new Date(year, month + 1, day, 0, 0, 0, 0);
  return { start, end: new Date(nextStart.getTime() - 1) };
}

/**
 * Whether a timestamp falls inside the period (inclusive).
 */
export function isWithinPeriod(timestamp: Date, period: BillingPeriod): boolean {
  const time = timestamp.getTime();
  return time >= period.start.getTime() && time <= period.end.getTime();
}
