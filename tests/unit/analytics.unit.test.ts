import { describe, expect, it } from 'vitest';

import {
  averageRevenuePerCustomer,
  churnRisk,
  customerLifetimeValue,
  monthlyRecurringRevenue,
  revenueBreakdown,
  revenueForecast
} from '../../src/domain/analytics.js';
import { reduceLedgerMetrics } from '../../src/domain/ledger-metrics.js';
import type { RevenueEvent } from '../../src/repositories/revenue-event-repository.js';

function event(overrides: Partial<RevenueEvent> & Pick<RevenueEvent, 'id' | 'type' | 'amountMinor' | 'occurredAt'>): RevenueEvent {
  return {
    tenantId: 'tenant-1',
    currency: 'USD',
    subscriptionId: null,
    customerId: null,
    invoiceId: null,
    metadata: {},
    source: 'internal',
    recordedAt: overrides.occurredAt,
    ...overrides
  };
}

function period(start: string, end: string, priceMinor: number, billingCycle: 'monthly' | 'annual' = 'monthly'): Record<string, string> {
  return { billingCycle, priceMinor: String(priceMinor), periodStart: start, periodEnd: end };
}

const at = (iso: string): Date => new Date(iso);

describe('revenue analytics', () => {
  const recurring: RevenueEvent[] = [
    event({
      id: 'created:sub-a',
      type: 'subscription-created',
      amountMinor: 2_900,
      occurredAt: at('2026-03-01T00:00:00.000Z'),
      subscriptionId: 'sub-a',
      customerId: 'cust-a',
      metadata: { ...period('2026-03-01T00:00:00.000Z', '2026-04-01T00:00:00.000Z', 2_900), stream: 'consumer' }
    }),
    event({
      id: 'created:sub-b',
      type: 'subscription-created',
      amountMinor: 1_500_000,
      occurredAt: at('2026-02-10T00:00:00.000Z'),
      subscriptionId: 'sub-b',
      customerId: 'cust-b',
      metadata: { ...period('2026-02-10T00:00:00.000Z', '2027-02-10T00:00:00.000Z', 1_500_000, 'annual'), stream: 'white-label' }
    }),
    event({
      id: 'created:sub-c',
      type: 'subscription-created',
      amountMinor: 9_900,
      occurredAt: at('2026-01-20T00:00:00.000Z'),
      subscriptionId: 'sub-c',
      customerId: 'cust-c',
      metadata: { ...period('2026-01-20T00:00:00.000Z', '2026-02-20T00:00:00.000Z', 9_900), stream: 'consumer' }
    })
  ];

  it('normalizes annual prices to a month and counts only covered periods', () => {
    const report = monthlyRecurringRevenue(recurring, at('2026-03-15T00:00:00.000Z'), 'USD');

    expect(report.mrrMinor).toBe(127_900);
    expect(report.activeSubscriptions).toBe(2);
  });

  it('counts a subscription until the period it paid for ends', () => {
    expect(monthlyRecurringRevenue(recurring, at('2026-03-31T23:59:59.000Z'), 'USD').mrrMinor).toBe(127_900);
    expect(monthlyRecurringRevenue(recurring, at('2026-04-01T00:00:00.000Z'), 'USD').mrrMinor).toBe(125_000);
  });

  it('gives the same answer for any input order and for replayed events', () => {
    const asOf = at('2026-03-15T00:00:00.000Z');
    const shuffled = [recurring[2], recurring[0], recurring[1], recurring[0]].flatMap((item) => (item === undefined ? [] : [item]));

    expect(monthlyRecurringRevenue(shuffled, asOf, 'USD')).toEqual(monthlyRecurringRevenue(recurring, asOf, 'USD'));
    expect(churnRisk(shuffled, asOf, 7, 'USD')).toEqual(churnRisk(recurring, asOf, 7, 'USD'));
  });

  it('flags customers whose renewal is overdue past the grace period', () => {
    const report = churnRisk(recurring, at('2026-03-15T00:00:00.000Z'), 7, 'USD');

    expect(report.customersTracked).toBe(3);
    expect(report.atRiskCustomerIds).toEqual(['cust-c']);
    expect(report.score).toBe(0.3333);
  });

  it('does not flag a renewal still inside the grace period', () => {
    const report = churnRisk(recurring, at('2026-02-25T00:00:00.000Z'), 7, 'USD');

    expect(report.atRiskCustomerIds).toEqual([]);
    expect(report.score).toBe(0);
  });

  it('averages revenue per paying customer inside the window', () => {
    const events = [
      event({ id: 'e1', type: 'add-on-purchase', amountMinor: 10_000, occurredAt: at('2026-03-02T00:00:00.000Z'), customerId: 'cust-a' }),
      event({ id: 'e2', type: 'add-on-purchase', amountMinor: 5_000, occurredAt: at('2026-03-03T00:00:00.000Z'), customerId: 'cust-b' }),
      event({ id: 'e3', type: 'refund', amountMinor: -1_000, occurredAt: at('2026-03-04T00:00:00.000Z'), customerId: 'cust-b' }),
      event({ id: 'e4', type: 'add-on-purchase', amountMinor: 9_999, occurredAt: at('2026-04-01T00:00:00.000Z'), customerId: 'cust-c' }),
      event({ id: 'e5', type: 'add-on-purchase', amountMinor: 7_000, occurredAt: at('2026-03-05T00:00:00.000Z'), customerId: 'cust-d', currency: 'EUR' })
    ];

    const report = averageRevenuePerCustomer(events, at('2026-03-01T00:00:00.000Z'), at('2026-04-01T00:00:00.000Z'), 'USD');

    expect(report.totalRevenueMinor).toBe(14_000);
    expect(report.customerCount).toBe(2);
    expect(report.arpuMinor).toBe(7_000);
  });

  it('projects lifetime value for an active customer over the horizon', () => {
    const events = [
      recurring[0],
      event({ id: 'refund-1', type: 'refund', amountMinor: -900, occurredAt: at('2026-03-05T00:00:00.000Z'), customerId: 'cust-a' })
    ].flatMap((item) => (item === undefined ? [] : [item]));

    const report = customerLifetimeValue(events, 'cust-a', at('2026-03-10T00:00:00.000Z'), 36, 'USD');

    expect(report.historicalMinor).toBe(2_000);
    expect(report.tenureMonths).toBe(1);
    expect(report.monthlyValueMinor).toBe(2_000);
    expect(report.projectedMinor).toBe(72_000);
  });

  it('reports zero lifetime value for an unknown customer', () => {
    expect(customerLifetimeValue(recurring, 'cust-z', at('2026-03-10T00:00:00.000Z'), 36, 'USD')).toEqual({
      customerId: 'cust-z',
      currency: 'USD',
      historicalMinor: 0,
      tenureMonths: 0,
      monthlyValueMinor: 0,
      projectedMinor: 0
    });
  });

  it('compounds the clamped growth rate forward from the current month', () => {
    const monthly = (id: string, subscriptionId: string, start: string, end: string): RevenueEvent => event({
      id,
      type: id.startsWith('created') ? 'subscription-created' : 'subscription-renewed',
      amountMinor: 10_000,
      occurredAt: at(start),
      subscriptionId,
      customerId: `cust-${subscriptionId}`,
      metadata: { ...period(start, end, 10_000), stream: 'api' }
    });

    const events = [
      monthly('created:one', 'one', '2026-01-01T00:00:00.000Z', '2026-02-01T00:00:00.000Z'),
      monthly('renewal:one:feb', 'one', '2026-02-01T00:00:00.000Z', '2026-03-01T00:00:00.000Z'),
      monthly('created:two', 'two', '2026-02-15T00:00:00.000Z', '2026-03-15T00:00:00.000Z'),
      monthly('renewal:one:mar', 'one', '2026-03-01T00:00:00.000Z', '2026-04-01T00:00:00.000Z')
    ];

    const forecast = revenueForecast(events, at('2026-03-10T00:00:00.000Z'), 2, 0.2, 'USD');

    expect(forecast.baseMrrMinor).toBe(20_000);
    expect(forecast.growthRate).toBe(0.2);
    expect(forecast.points).toEqual([
      { period: '2026-04', mrrMinor: 24_000 },
      { period: '2026-05', mrrMinor: 28_800 }
    ]);
  });

  it('breaks revenue down by the stream tag on each event', () => {
    const tagged = (id: string, type: RevenueEvent['type'], amountMinor: number, customerId: string, stream?: string): RevenueEvent => event({
      id,
      type,
      amountMinor,
      occurredAt: at('2026-03-10T00:00:00.000Z'),
      customerId,
      metadata: stream === undefined ? {} : { stream }
    });

    const breakdown = revenueBreakdown([
      tagged('e1', 'subscription-created', 2_900, 'cust-a', 'consumer'),
      tagged('e2', 'add-on-purchase', 500, 'cust-a', 'consumer'),
      tagged('e3', 'refund', -500, 'cust-a', 'consumer'),
      tagged('e4', 'setup-fee', 100_000, 'cust-b', 'white-label'),
      tagged('e5', 'subscription-created', 150_000, 'cust-b', 'white-label'),
      tagged('e6', 'usage-charge', 700, 'cust-c', 'api'),
      tagged('e7', 'migration', 1_000, 'cust-d')
    ], at('2026-03-01T00:00:00.000Z'), at('2026-04-01T00:00:00.000Z'), 'USD');

    expect(breakdown.streams).toEqual([
      { stream: 'consumer', totalMinor: 2_900, recurringMinor: 2_900, refundsMinor: -500, customerCount: 1, addOnRevenueMinor: 500 },
      { stream: 'white-label', totalMinor: 250_000, recurringMinor: 150_000, refundsMinor: 0, customerCount: 1, setupFeesMinor: 100_000 },
      { stream: 'analytics', totalMinor: 0, recurringMinor: 0, refundsMinor: 0, customerCount: 0 },
      { stream: 'api', totalMinor: 700, recurringMinor: 0, refundsMinor: 0, customerCount: 1, usageRevenueMinor: 700 }
    ]);
    expect(breakdown.untaggedMinor).toBe(1_000);
  });

  it('reduces ledger totals over a half-open window', () => {
    const metrics = reduceLedgerMetrics([
      ...recurring,
      event({ id: 'late', type: 'add-on-purchase', amountMinor: 400, occurredAt: at('2026-04-01T00:00:00.000Z'), customerId: 'cust-a' })
    ], { from: at('2026-02-01T00:00:00.000Z'), to: at('2026-04-01T00:00:00.000Z'), currency: 'USD' });

    expect(metrics.totalRevenueMinor).toBe(1_502_900);
    expect(metrics.recurringRevenueMinor).toBe(1_502_900);
    expect(metrics.customerCount).toBe(2);
    expect(metrics.arpuMinor).toBe(751_450);
  });
});
