/**
 * @fileoverview Tests for billing period computation.
 *
 * Dates are built from local components, matching the implementation.
 *
 * @module billingPeriod.test
 */

import { describe, it, expect } from 'vitest';
import { getBillingPeriod, isWithinPeriod } from './billingPeriod';

describe('getBillingPeriod', () => {
  it('uses the calendar month for start day 1', () => {
    const period = getBillingPeriod(new Date(2025, 6, 6, 15, 30));

    expect(period.start).toEqual(new Date(2025, 6, 1));
    expect(period.end).toEqual(new Date(2025, 6, 31, 23, 59, 59, 999));
  });

  it('starts in the previous month before the start day', () => {
    const period = getBillingPeriod(new Date(2025, 6, 6), 15);

    expect(period.start).toEqual(new Date(2025, 5, 15));
    expect(period.end).toEqual(new Date(2025, 6, 14, 23, 59, 59, 999));
  });

  it('starts on the start day itself', () => {
    const period = getBillingPeriod(new Date(2025, 6, 15, 0, 0), 15);
    expect(period.start).toEqual(new Date(2025, 6, 15));
  });

  it('wraps to December of the previous year', () => {
    const period = getBillingPeriod(new Date(2025, 0, 3), 10);

    expect(period.start).toEqual(new Date(2024, 11, 10));
    expect(period.end).toEqual(new Date(2025, 0, 9, 23, 59, 59, 999));
  });

  it('clamps the start day to 1-28', () => {
    expect(getBillingPeriod(new Date(2025, 1, 28), 31).start).toEqual(new Date(2025, 1, 28));
    expect(getBillingPeriod(new Date(2025, 1, 5), 0).start).toEqual(new Date(2025, 1, 1));
  });
});

describe('isWithinPeriod', () => {
  const period = getBillingPeriod(new Date(2025, 6, 6));

  it('includes both boundaries', () => {
    expect(isWithinPeriod(period.start, period)).toBe(true);
    expect(isWithinPeriod(period.end, period)).toBe(true);
  });

  it('excludes times outside the period', () => {
    expect(isWithinPeriod(new Date(period.start.getTime() - 1), period)).toBe(false);
    expect(isWithinPeriod(new Date(2025, 7, 1), period)).toBe(false);
  });
});
