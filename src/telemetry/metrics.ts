import { metrics } from '@opentelemetry/api';

const meter = metrics.getMeter('tee-ledger');

type Attributes = Record<string, string | number>;

const httpRequestDuration = meter.createHistogram('http.server.request.duration', {
  description: 'Duration of inbound HTTP requests',
  unit: 'ms'
});

const httpRequestCount = meter.createCounter('http.server.request.count', {
  description: 'Count of inbound HTTP requests'
});

const httpErrorCount = meter.createCounter('http.server.request.errors', {
  description: 'Count of HTTP 5xx responses'
});

const dbTransactionDuration = meter.createHistogram('db.client.transaction.duration', {
  description: 'Duration of tenant-scoped database transactions',
  unit: 'ms'
});

const dbTransactionErrorCount = meter.createCounter('db.client.transaction.errors', {
  description: 'Count of rolled back database transactions'
});

const revenueEventCount = meter.createCounter('ledger.revenue_events.count', {
  description: 'Revenue events offered to the ledger, by type and whether they were new'
});

const paymentAttemptCount = meter.createCounter('billing.payment_attempts.count', {
  description: 'Payment attempts by outcome'
});

const billingCycleCount = meter.createCounter('billing.cycle.subscriptions', {
  description: 'Subscriptions handled by automated billing runs, by result'
});

const usageDroppedCount = meter.createCounter('usage.samples.dropped', {
  description: 'Usage samples that could not be metered'
});

const boundaryViolationCount = meter.createCounter('security.boundary_violations.count', {
  description: 'Rejected cross-tenant access attempts'
});

export function recordHttpRequest(attributes: Attributes, durationMs: number): void {
  httpRequestDuration.record(durationMs, attributes);
  httpRequestCount.add(1, attributes);
}

export function recordHttpError(attributes: Attributes): void {
  httpErrorCount.add(1, attributes);
}

export function recordDbTransaction(attributes: Attributes, durationMs: number): void {
  dbTransactionDuration.record(durationMs, attributes);
  if (attributes.success === 'false') {
    dbTransactionErrorCount.add(1, attributes);
  }
}

export function recordRevenueEvent(attributes: Attributes): void {
  revenueEventCount.add(1, attributes);
}

export function recordPaymentAttempt(attributes: Attributes): void {
  paymentAttemptCount.add(1, attributes);
}

export function recordBillingCycleResult(result: 'processed' | 'failed' | 'skipped', count: number): void {
  if (count > 0) {
    billingCycleCount.add(count, { result });
  }
}

export function recordUsageDropped(reason: string, samples = 1): void {
  usageDroppedCount.add(samples, { reason });
}

export function recordBoundaryViolation(resourceType: string): void {
  boundaryViolationCount.add(1, { resource_type: resourceType });
}
