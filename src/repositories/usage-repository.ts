export const USAGE_GRANULARITIES = ['minute', 'hour', 'day', 'month'] as const;

export type UsageGranularity = (typeof USAGE_GRANULARITIES)[number];

export interface UsageCounters {
  calls: number;
  bytes: number;
  errors: number;
  latencyTotalMs: number;
  latencyMaxMs: number;
}

export interface UsageBucket extends UsageCounters {
  tenantId: string;
  endpoint: string;
  granularity: UsageGranularity;
  bucketStart: Date;
}

export interface UsageBucketQuery {
  tenantId: string;
  granularity: UsageGranularity;
  from?: Date;
  to?: Date;
  endpoint?: string;
}

export interface RollUpBucketsInput {
  from: Exclude<UsageGranularity, 'month'>;
  to: Exclude<UsageGranularity, 'minute'>;
  before: Date;
}

export interface UsagePeriodMark {
  tenantId: string;
  period: string;
  billedAt: Date;
  revenueEventId: string | null;
}

export interface MarkPeriodBilledInput {
  tenantId: string;
  period: string;
  revenueEventId: string | null;
  billedAt: Date;
}

export interface UnbilledPeriod {
  tenantId: string;
  period: string;
}

export const ALERT_METRICS = ['api-calls', 'storage', 'bandwidth', 'error-rate'] as const;

export type AlertMetric = (typeof ALERT_METRICS)[number];

export interface UsageAlert {
  id: string;
  tenantId: string;
  metric: AlertMetric;
  /** Percent of the tenant's limit at which the alert fires. */
  thresholdPercent: number;
  enabled: boolean;
  createdAt: Date;
  lastTriggeredAt: Date | null;
}

export type UsageAlertInput = Omit<UsageAlert, 'lastTriggeredAt'>;

export interface UsageRepository {
  /** Adds each increment's counters to its bucket, creating the bucket when absent. */
  incrementBuckets(increments: readonly UsageBucket[]): Promise<void>;
  listBuckets(query: UsageBucketQuery): Promise<UsageBucket[]>;
  /** Merges `from` buckets that start before `before` into `to` buckets and deletes the sources. Returns the number merged. */
  rollUpBuckets(input: RollUpBucketsInput): Promise<number>;
  /** Deletes day buckets starting before `before` whose month carries a billing mark. */
  discardBilledDayBuckets(before: Date): Promise<number>;
  recordStoragePeak(tenantId: string, period: string, bytesStored: number): Promise<void>;
  getStoragePeak(tenantId: string, period: string): Promise<number>;
  /** First mark wins; later calls return the stored mark. */
  markPeriodBilled(input: MarkPeriodBilledInput): Promise<UsagePeriodMark>;
  findPeriodMark(tenantId: string, period: string): Promise<UsagePeriodMark | null>;
  /** Periods strictly before `beforePeriod` that recorded usage and carry no billing mark, oldest first. */
  listUnbilledPeriods(beforePeriod: string, tenantId?: string): Promise<UnbilledPeriod[]>;
  /** Replaces the tenant's alerts, keeping the given order. */
  replaceUsageAlerts(tenantId: string, alerts: readonly UsageAlertInput[]): Promise<UsageAlert[]>;
  listUsageAlerts(tenantId: string): Promise<UsageAlert[]>;
  markUsageAlertsTriggered(tenantId: string, alertIds: readonly string[], triggeredAt: Date): Promise<void>;
}

const HOUR_MS = 60 * 60 * 1_000;

export function truncateToGranularity(date: Date, granularity: UsageGranularity): Date {
  switch (granularity) {
    case 'minute':
      return new Date(Math.floor(date.getTime() / 60_000) * 60_000);
    case 'hour':
      return new Date(Math.floor(date.getTime() / HOUR_MS) * HOUR_MS);
    case 'day':
      return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
    case 'month':
      return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), 1));
  }
}

export function emptyCounters(): UsageCounters {
  return { calls: 0, bytes: 0, errors: 0, latencyTotalMs: 0, latencyMaxMs: 0 };
}

export function mergeCounters(target: UsageCounters, source: UsageCounters): UsageCounters {
  return {
    calls: target.calls + source.calls,
    bytes: target.bytes + source.bytes,
    errors: target.errors + source.errors,
    latencyTotalMs: target.latencyTotalMs + source.latencyTotalMs,
    latencyMaxMs: Math.max(target.latencyMaxMs, source.latencyMaxMs)
  };
}
