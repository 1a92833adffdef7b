import Decimal from 'decimal.js';

import { RECURRING_EVENT_TYPES, type RevenueEvent } from '../repositories/revenue-event-repository.js';
import { roundMinor } from './money.js';

export interface LedgerMetricsWindow {
  from: Date;
  to: Date;
  currency: string;
}

export interface LedgerMetrics {
  currency: string;
  from: Date;
  to: Date;
  totalRevenueMinor: number;
  recurringRevenueMinor: number;
  customerCount: number;
  arpuMinor: number;
}

export function inWindow(event: RevenueEvent, from: Date, to: Date): boolean {
  const time = event.occurredAt.getTime();
  return time >= from.getTime() && time < to.getTime();
}

/** Order-independent reduction of ledger events into period totals; `to` is exclusive. */
export function reduceLedgerMetrics(events: readonly RevenueEvent[], window: LedgerMetricsWindow): LedgerMetrics {
  let totalRevenueMinor = 0;
  let recurringRevenueMinor = 0;
  const customers = new Set<string>();

  for (const event of events) {
    if (event.currency !== window.currency || !inWindow(event, window.from, window.to)) {
      continue;
    }

    totalRevenueMinor += event.amountMinor;
    if (RECURRING_EVENT_TYPES.includes(event.type)) {
      recurringRevenueMinor += event.amountMinor;
    }

    if (event.customerId !== null) {
      customers.add(event.customerId);
    }
  }

  return {
    currency: window.currency,
    from: window.from,
    to: window.to,
    totalRevenueMinor,
    recurringRevenueMinor,
    customerCount: customers.size,
    arpuMinor: customers.size === 0 ? 0 : roundMinor(new Decimal(totalRevenueMinor).div(customers.size))
  };
}
