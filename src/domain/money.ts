import Decimal from 'decimal.js';

const MINOR_UNIT_EXPONENTS: Record<string, number> = {
  BHD: 3,
  CLP: 0,
  ISK: 0,
  JOD: 3,
  JPY: 0,
  KRW: 0,
  KWD: 3,
  OMR: 3,
  TND: 3,
  VND: 0
};

const DEFAULT_EXPONENT = 2;

export function normalizeCurrency(currency: string): string {
  return currency.trim().toUpperCase();
}

export function minorUnitExponent(currency: string): number {
  return MINOR_UNIT_EXPONENTS[normalizeCurrency(currency)] ?? DEFAULT_EXPONENT;
}

/** Rounds a decimal amount in minor units to an integer, ties to even. */
export function roundMinor(value: Decimal.Value): number {
  return new Decimal(value).toDecimalPlaces(0, Decimal.ROUND_HALF_EVEN).toNumber();
}

/** Converts a major-unit decimal string such as "12.50" to minor units. */
export function toMinorUnits(amount: Decimal.Value, currency: string): number {
  const factor = new Decimal(10).pow(minorUnitExponent(currency));
  return roundMinor(new Decimal(amount).mul(factor));
}

export function formatMajorUnits(amountMinor: number, currency: string): string {
  const exponent = minorUnitExponent(currency);
  return new Decimal(amountMinor).div(new Decimal(10).pow(exponent)).toFixed(exponent);
}

/**
 * `(newPrice − oldPrice) × remainingDays ÷ totalDays`, in minor units,
 * half-even. A negative result is a credit.
 */
export function prorate(oldPriceMinor: number, newPriceMinor: number, remainingDays: number, totalDays: number): number {
  if (totalDays <= 0) {
    return 0;
  }

  const clampedRemaining = Math.min(Math.max(remainingDays, 0), totalDays);
  return roundMinor(
    new Decimal(newPriceMinor - oldPriceMinor)
      .mul(clampedRemaining)
      .div(totalDays)
  );
}

/** `units × rate`, where the rate is a major-unit decimal string, rounded to minor units. */
export function multiplyRate(units: Decimal.Value, ratePerUnit: string, currency: string): number {
  return toMinorUnits(new Decimal(units).mul(ratePerUnit), currency);
}

export function sumMinor(amounts: readonly number[]): number {
  return amounts.reduce((total, amount) => total + amount, 0);
}
