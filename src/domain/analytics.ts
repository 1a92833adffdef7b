import Decimal from 'decimal.js';

import { RECURRING_EVENT_TYPES, type RevenueEvent } from '../repositories/revenue-event-repository.js';
import { addDays, addMonths, startOfUtcMonth, toUsagePeriod } from './clock.js';
import { inWindow } from './ledger-metrics.js';
import { roundMinor } from './money.js';
import { REVENUE_STREAMS, type RevenueStream } from './tier-catalog.js';

const DAYS_PER_MONTH = new Decimal('30.4375');
const DAY_MS = 86_400_000;
const FORECAST_LOOKBACK_MONTHS = 3;

/**
 * Every reducer here is a pure function of the event slice: input order and
 * repeated event ids do not change the result.
 */
export function canonicalEvents(events: readonly RevenueEvent[], currency: string): RevenueEvent[] {
  const byId = new Map<string, RevenueEvent>();
  for (const event of events) {
    if (event.currency === currency && !byId.has(event.id)) {
      byId.set(event.id, event);
    }
  }

  return [...byId.values()].sort((left, right) => (
    left.occurredAt.getTime() - right.occurredAt.getTime() || (left.id < right.id ? -1 : left.id > right.id ? 1 : 0)
  ));
}

interface SubscriptionSnapshot {
  subscriptionId: string;
  customerId: string | null;
  monthlyValue: Decimal;
  periodEnd: Date;
}

/** Latest recurring event per subscription at `asOf`, with its price normalized to a month. */
function subscriptionSnapshots(events: readonly RevenueEvent[], asOf: Date): SubscriptionSnapshot[] {
  const latest = new Map<string, RevenueEvent>();
  for (const event of events) {
    if (event.subscriptionId !== null && RECURRING_EVENT_TYPES.includes(event.type) && event.occurredAt.getTime() <= asOf.getTime()) {
      latest.set(event.subscriptionId, event);
    }
  }

  const snapshots: SubscriptionSnapshot[] = [];
  for (const [subscriptionId, event] of latest) {
    const price = new Decimal(event.metadata.priceMinor ?? '0');
    const periodEnd = new Date(event.metadata.periodEnd ?? event.occurredAt.toISOString());
    snapshots.push({
      subscriptionId,
      customerId: event.customerId,
      monthlyValue: event.metadata.billingCycle === 'annual' ? price.div(12) : price,
      periodEnd
    });
  }

  return snapshots.sort((left, right) => (left.subscriptionId < right.subscriptionId ? -1 : 1));
}

/**
 * Derived from ledger events alone, so a canceled or paused subscription
 * keeps counting until the period it paid for ends; the ledger records
 * payments, not lifecycle changes.
 */
function mrrAt(events: readonly RevenueEvent[], asOf: Date): number {
  const total = subscriptionSnapshots(events, asOf)
    .filter((snapshot) => snapshot.periodEnd.getTime() > asOf.getTime())
    .reduce((sum, snapshot) => sum.plus(snapshot.monthlyValue), new Decimal(0));

  return roundMinor(total);
}

export interface MrrReport {
  asOf: Date;
  currency: string;
  mrrMinor: number;
  activeSubscriptions: number;
}

/** Sum of monthly-normalized prices of subscriptions whose paid period covers `asOf`. */
export function monthlyRecurringRevenue(events: readonly RevenueEvent[], asOf: Date, currency: string): MrrReport {
  const slice = canonicalEvents(events, currency);
  const active = subscriptionSnapshots(slice, asOf).filter((snapshot) => snapshot.periodEnd.getTime() > asOf.getTime());

  return {
    asOf,
    currency,
    mrrMinor: mrrAt(slice, asOf),
    activeSubscriptions: active.length
  };
}

export interface ArpuReport {
  from: Date;
  to: Date;
  currency: string;
  totalRevenueMinor: number;
  customerCount: number;
  arpuMinor: number;
}

export function averageRevenuePerCustomer(events: readonly RevenueEvent[], from: Date, to: Date, currency: string): ArpuReport {
  const slice = canonicalEvents(events, currency).filter((event) => inWindow(event, from, to));
  const customers = new Set(slice.flatMap((event) => (event.customerId === null ? [] : [event.customerId])));
  const totalRevenueMinor = slice.reduce((sum, event) => sum + event.amountMinor, 0);

  return {
    from,
    to,
    currency,
    totalRevenueMinor,
    customerCount: customers.size,
    arpuMinor: customers.size === 0 ? 0 : roundMinor(new Decimal(totalRevenueMinor).div(customers.size))
  };
}

export interface ChurnRiskReport {
  asOf: Date;
  graceDays: number;
  customersTracked: number;
  customersAtRisk: number;
  /** At-risk share of tracked customers, four decimal places. */
  score: number;
  atRiskCustomerIds: string[];
}

/**
 * A customer is at risk when none of their subscriptions has been renewed
 * within `graceDays` past its expected renewal date.
 */
export function churnRisk(events: readonly RevenueEvent[], asOf: Date, graceDays: number, currency: string): ChurnRiskReport {
  const expectedRenewal = new Map<string, Date>();
  for (const snapshot of subscriptionSnapshots(canonicalEvents(events, currency), asOf)) {
    if (snapshot.customerId === null) {
      continue;
    }

    const current = expectedRenewal.get(snapshot.customerId);
    if (current === undefined || snapshot.periodEnd.getTime() > current.getTime()) {
      expectedRenewal.set(snapshot.customerId, snapshot.periodEnd);
    }
  }

  const atRiskCustomerIds = [...expectedRenewal.entries()]
    .filter(([, renewal]) => addDays(renewal, graceDays).getTime() <= asOf.getTime())
    .map(([customerId]) => customerId)
    .sort();

  const tracked = expectedRenewal.size;
  return {
    asOf,
    graceDays,
    customersTracked: tracked,
    customersAtRisk: atRiskCustomerIds.length,
    score: tracked === 0 ? 0 : new Decimal(atRiskCustomerIds.length).div(tracked).toDecimalPlaces(4, Decimal.ROUND_HALF_EVEN).toNumber(),
    atRiskCustomerIds
  };
}

export interface LifetimeValueReport {
  customerId: string;
  currency: string;
  historicalMinor: number;
  /** Observed tenure in months, two decimal places. */
  tenureMonths: number;
  monthlyValueMinor: number;
  projectedMinor: number;
}

/**
 * Net historical charges over observed tenure, projected to `horizonMonths`
 * of total tenure while the customer still holds a paid period.
 */
export function customerLifetimeValue(
  events: readonly RevenueEvent[],
  customerId: string,
  asOf: Date,
  horizonMonths: number,
  currency: string
): LifetimeValueReport {
  const slice = canonicalEvents(events, currency)
    .filter((event) => event.customerId === customerId && event.occurredAt.getTime() <= asOf.getTime());

  const [first] = slice;
  if (first === undefined) {
    return { customerId, currency, historicalMinor: 0, tenureMonths: 0, monthlyValueMinor: 0, projectedMinor: 0 };
  }

  const historical = slice.reduce((sum, event) => sum + event.amountMinor, 0);
  const tenureMonths = Decimal.max(
    new Decimal(asOf.getTime() - first.occurredAt.getTime()).div(DAY_MS).div(DAYS_PER_MONTH),
    1
  );
  const monthlyValue = new Decimal(historical).div(tenureMonths);

  const stillActive = subscriptionSnapshots(slice, asOf).some((snapshot) => snapshot.periodEnd.getTime() > asOf.getTime());
  const remainingMonths = stillActive ? Decimal.max(new Decimal(horizonMonths).minus(tenureMonths), 0) : new Decimal(0);

  return {
    customerId,
    currency,
    historicalMinor: historical,
    tenureMonths: tenureMonths.toDecimalPlaces(2, Decimal.ROUND_HALF_EVEN).toNumber(),
    monthlyValueMinor: roundMinor(monthlyValue),
    projectedMinor: roundMinor(new Decimal(historical).plus(monthlyValue.mul(remainingMonths)))
  };
}

export interface ForecastPoint {
  period: string;
  mrrMinor: number;
}

export interface RevenueForecast {
  asOf: Date;
  currency: string;
  baseMrrMinor: number;
  /** Mean month-over-month MRR growth, clamped to ±maxGrowth, four decimal places. */
  growthRate: number;
  points: ForecastPoint[];
}

export function revenueForecast(
  events: readonly RevenueEvent[],
  asOf: Date,
  months: number,
  maxGrowth: number,
  currency: string
): RevenueForecast {
  const slice = canonicalEvents(events, currency);
  const baseMrrMinor = mrrAt(slice, asOf);

  const rates: Decimal[] = [];
  for (let back = 0; back < FORECAST_LOOKBACK_MONTHS; back += 1) {
    const current = mrrAt(slice, addMonths(asOf, -back));
    const previous = mrrAt(slice, addMonths(asOf, -back - 1));
    if (previous > 0) {
      rates.push(new Decimal(current - previous).div(previous));
    }
  }

  const mean = rates.length === 0
    ? new Decimal(0)
    : rates.reduce((sum, rate) => sum.plus(rate), new Decimal(0)).div(rates.length);
  const growth = Decimal.min(Decimal.max(mean, -maxGrowth), maxGrowth).toDecimalPlaces(4, Decimal.ROUND_HALF_EVEN);

  const monthStart = startOfUtcMonth(asOf);
  const points: ForecastPoint[] = [];
  for (let ahead = 1; ahead <= months; ahead += 1) {
    points.push({
      period: toUsagePeriod(addMonths(monthStart, ahead)),
      mrrMinor: roundMinor(new Decimal(baseMrrMinor).mul(growth.plus(1).pow(ahead)))
    });
  }

  return { asOf, currency, baseMrrMinor, growthRate: growth.toNumber(), points };
}

interface StreamTotals {
  totalMinor: number;
  recurringMinor: number;
  refundsMinor: number;
  customerCount: number;
}

export type StreamBreakdown =
  | ({ stream: 'consumer'; addOnRevenueMinor: number } & StreamTotals)
  | ({ stream: 'white-label'; setupFeesMinor: number } & StreamTotals)
  | ({ stream: 'analytics' } & StreamTotals)
  | ({ stream: 'api'; usageRevenueMinor: number } & StreamTotals);

export interface RevenueBreakdown {
  from: Date;
  to: Date;
  currency: string;
  streams: StreamBreakdown[];
  /** Events without a recognizable stream tag. */
  untaggedMinor: number;
}

function isStream(value: string | undefined): value is RevenueStream {
  return REVENUE_STREAMS.some((stream) => stream === value);
}

/** Attribution follows each event's `stream` tag. */
export function revenueBreakdown(events: readonly RevenueEvent[], from: Date, to: Date, currency: string): RevenueBreakdown {
  const slice = canonicalEvents(events, currency).filter((event) => inWindow(event, from, to));
  const byStream = new Map<RevenueStream, RevenueEvent[]>(REVENUE_STREAMS.map((stream) => [stream, []]));
  let untaggedMinor = 0;

  for (const event of slice) {
    const stream = event.metadata.stream;
    const bucket = isStream(stream) ? byStream.get(stream) : undefined;
    if (bucket === undefined) {
      untaggedMinor += event.amountMinor;
    } else {
      bucket.push(event);
    }
  }

  const sumOf = (streamEvents: readonly RevenueEvent[], predicate: (event: RevenueEvent) => boolean): number => (
    streamEvents.filter(predicate).reduce((sum, event) => sum + event.amountMinor, 0)
  );

  const totalsOf = (streamEvents: readonly RevenueEvent[]): StreamTotals => ({
    totalMinor: sumOf(streamEvents, () => true),
    recurringMinor: sumOf(streamEvents, (event) => RECURRING_EVENT_TYPES.includes(event.type)),
    refundsMinor: sumOf(streamEvents, (event) => event.type === 'refund'),
    customerCount: new Set(streamEvents.flatMap((event) => (event.customerId === null ? [] : [event.customerId]))).size
  });

  const streams = REVENUE_STREAMS.map((stream): StreamBreakdown => {
    const streamEvents = byStream.get(stream) ?? [];
    const totals = totalsOf(streamEvents);

    switch (stream) {
      case 'consumer':
        return { stream, ...totals, addOnRevenueMinor: sumOf(streamEvents, (event) => event.type === 'add-on-purchase') };
      case 'white-label':
        return { stream, ...totals, setupFeesMinor: sumOf(streamEvents, (event) => event.type === 'setup-fee') };
      case 'analytics':
        return { stream, ...totals };
      case 'api':
        return { stream, ...totals, usageRevenueMinor: sumOf(streamEvents, (event) => event.type === 'usage-charge') };
    }
  });

  return { from, to, currency, streams, untaggedMinor };
}
