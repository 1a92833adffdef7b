import Decimal from 'decimal.js';

import { roundMinor } from './money.js';

export const DISCOUNT_KINDS = ['percentage', 'fixed'] as const;

export type DiscountKind = (typeof DISCOUNT_KINDS)[number];

export interface DiscountTerms {
  kind: DiscountKind;
  /** Percent off for `percentage`, minor units off for `fixed`. */
  value: number;
  validFrom: Date;
  validUntil: Date | null;
}

export function discountApplies(discount: DiscountTerms, at: Date): boolean {
  return discount.validFrom.getTime() <= at.getTime()
    && (discount.validUntil === null || at.getTime() < discount.validUntil.getTime());
}

/**
 * Applies the discounts valid at `at` in the order given, each to what the
 * previous one left, and rounds once at the end, half-even. Never below zero.
 */
export function calculateDiscountedAmount(amountMinor: number, discounts: readonly DiscountTerms[], at: Date): number {
  let remaining = new Decimal(amountMinor);
  for (const discount of discounts) {
    if (!discountApplies(discount, at)) {
      continue;
    }

    remaining = discount.kind === 'percentage'
      ? remaining.mul(new Decimal(100).minus(discount.value)).div(100)
      : remaining.minus(discount.value);
    remaining = Decimal.max(remaining, 0);
  }

  return roundMinor(remaining);
}
