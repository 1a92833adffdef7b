import { describe, expect, it } from 'vitest';

import { formatMajorUnits, multiplyRate, prorate, toMinorUnits } from '../../src/domain/money.js';

describe('money arithmetic', () => {
  it('prorates an upgrade over the remaining share of the period', () => {
    expect(prorate(70_000, 120_000, 20, 30)).toBe(33_333);
    expect(prorate(50_000, 120_000, 20, 30)).toBe(46_667);
  });

  it('returns a signed credit for a downgrade', () => {
    expect(prorate(120_000, 70_000, 20, 30)).toBe(-33_333);
  });

  it('rounds ties to even', () => {
    expect(prorate(0, 5, 1, 2)).toBe(2);
    expect(prorate(0, 7, 1, 2)).toBe(4);
  });

  it('clamps the remaining time to the period and ignores empty periods', () => {
    expect(prorate(0, 100, 50, 10)).toBe(100);
    expect(prorate(0, 100, -5, 10)).toBe(0);
    expect(prorate(0, 100, 5, 0)).toBe(0);
  });

  it('converts major-unit strings using the currency exponent', () => {
    expect(toMinorUnits('12.50', 'usd')).toBe(1_250);
    expect(toMinorUnits('1500', 'JPY')).toBe(1_500);
    expect(toMinorUnits('1.2345', 'KWD')).toBe(1_234);
  });

  it('multiplies unit counts by decimal rates without float drift', () => {
    expect(multiplyRate(500, '0.01', 'USD')).toBe(500);
    expect(multiplyRate(3, '0.1', 'USD')).toBe(30);
    expect(multiplyRate(1, '0.001', 'USD')).toBe(0);
  });

  it('formats minor units back to major units', () => {
    expect(formatMajorUnits(123_456, 'USD')).toBe('1234.56');
    expect(formatMajorUnits(1_500, 'JPY')).toBe('1500');
  });
});
