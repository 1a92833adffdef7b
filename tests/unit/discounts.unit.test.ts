import { describe, expect, it } from 'vitest';

import { calculateDiscountedAmount, type DiscountTerms } from '../../src/domain/discounts.js';

const MARCH_1 = new Date('2026-03-01T00:00:00.000Z');
const APRIL_1 = new Date('2026-04-01T00:00:00.000Z');

function percentOff(value: number, validFrom = MARCH_1, validUntil: Date | null = null): DiscountTerms {
  return { kind: 'percentage', value, validFrom, validUntil };
}

function amountOff(value: number): DiscountTerms {
  return { kind: 'fixed', value, validFrom: MARCH_1, validUntil: null };
}

describe('subscription discounts', () => {
  it('takes a percentage off the list price', () => {
    expect(calculateDiscountedAmount(9_900, [percentOff(25)], APRIL_1)).toBe(7_425);
  });

  it('applies stacked discounts in order', () => {
    expect(calculateDiscountedAmount(9_900, [percentOff(20), amountOff(500)], APRIL_1)).toBe(7_420);
    expect(calculateDiscountedAmount(9_900, [amountOff(500), percentOff(20)], APRIL_1)).toBe(7_520);
  });

  it('rounds once at the end, ties to even', () => {
    expect(calculateDiscountedAmount(999, [percentOff(12.5)], APRIL_1)).toBe(874);
    expect(calculateDiscountedAmount(1_001, [percentOff(50)], APRIL_1)).toBe(500);
  });

  it('never goes below zero', () => {
    expect(calculateDiscountedAmount(9_900, [amountOff(20_000), percentOff(10)], APRIL_1)).toBe(0);
    expect(calculateDiscountedAmount(9_900, [percentOff(100)], APRIL_1)).toBe(0);
  });

  it('skips discounts outside their validity window', () => {
    const fromMid = percentOff(25, new Date('2026-03-15T00:00:00.000Z'));
    const untilApril = percentOff(25, MARCH_1, APRIL_1);

    expect(calculateDiscountedAmount(9_900, [fromMid], MARCH_1)).toBe(9_900);
    expect(calculateDiscountedAmount(9_900, [fromMid], APRIL_1)).toBe(7_425);
    expect(calculateDiscountedAmount(9_900, [untilApril], new Date('2026-03-31T23:59:59.000Z'))).toBe(7_425);
    expect(calculateDiscountedAmount(9_900, [untilApril], APRIL_1)).toBe(9_900);
  });
});
