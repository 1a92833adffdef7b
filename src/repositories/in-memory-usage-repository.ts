import { toUsagePeriod } from '../domain/clock.js';
import {
  mergeCounters,
  truncateToGranularity,
  type MarkPeriodBilledInput,
  type RollUpBucketsInput,
  type UnbilledPeriod,
  type UsageAlert,
  type UsageAlertInput,
  type UsageBucket,
  type UsageBucketQuery,
  type UsagePeriodMark,
  type UsageRepository
} from './usage-repository.js';

function bucketKey(bucket: Pick<UsageBucket, 'tenantId' | 'endpoint' | 'granularity' | 'bucketStart'>): string {
  return `${bucket.tenantId}|${bucket.granularity}|${bucket.endpoint}|${bucket.bucketStart.toISOString()}`;
}

function periodKey(tenantId: string, period: string): string {
  return `${tenantId}|${period}`;
}

function cloneBucket(bucket: UsageBucket): UsageBucket {
  return { ...bucket, bucketStart: new Date(bucket.bucketStart) };
}

function cloneMark(mark: UsagePeriodMark): UsagePeriodMark {
  return { ...mark, billedAt: new Date(mark.billedAt) };
}

function cloneAlert(alert: UsageAlert): UsageAlert {
  return {
    ...alert,
    createdAt: new Date(alert.createdAt),
    lastTriggeredAt: alert.lastTriggeredAt === null ? null : new Date(alert.lastTriggeredAt)
  };
}

export class InMemoryUsageRepository implements UsageRepository {
  private readonly bucketsByKey = new Map<string, UsageBucket>();

  private readonly storagePeaks = new Map<string, number>();

  private readonly marksByKey = new Map<string, UsagePeriodMark>();

  private readonly alertsByTenant = new Map<string, UsageAlert[]>();

  public incrementBuckets(increments: readonly UsageBucket[]): Promise<void> {
    for (const increment of increments) {
      this.addToBucket(increment);
    }

    return Promise.resolve();
  }

  public listBuckets(query: UsageBucketQuery): Promise<UsageBucket[]> {
    const buckets = [...this.bucketsByKey.values()]
      .filter((bucket) => (
        bucket.tenantId === query.tenantId
        && bucket.granularity === query.granularity
        && (query.endpoint === undefined || bucket.endpoint === query.endpoint)
        && (query.from === undefined || bucket.bucketStart.getTime() >= query.from.getTime())
        && (query.to === undefined || bucket.bucketStart.getTime() < query.to.getTime())
      ))
      .sort((left, right) => (
        left.bucketStart.getTime() - right.bucketStart.getTime() || left.endpoint.localeCompare(right.endpoint)
      ))
      .map(cloneBucket);

    return Promise.resolve(buckets);
  }

  public rollUpBuckets(input: RollUpBucketsInput): Promise<number> {
    const sources = [...this.bucketsByKey.entries()].filter(([, bucket]) => (
      bucket.granularity === input.from && bucket.bucketStart.getTime() < input.before.getTime()
    ));

    for (const [key, bucket] of sources) {
      this.bucketsByKey.delete(key);
      this.addToBucket({
        ...bucket,
        granularity: input.to,
        bucketStart: truncateToGranularity(bucket.bucketStart, input.to)
      });
    }

    return Promise.resolve(sources.length);
  }

  public discardBilledDayBuckets(before: Date): Promise<number> {
    let discarded = 0;
    for (const [key, bucket] of this.bucketsByKey) {
      if (
        bucket.granularity === 'day'
        && bucket.bucketStart.getTime() < before.getTime()
        && this.marksByKey.has(periodKey(bucket.tenantId, toUsagePeriod(bucket.bucketStart)))
      ) {
        this.bucketsByKey.delete(key);
        discarded += 1;
      }
    }

    return Promise.resolve(discarded);
  }

  public recordStoragePeak(tenantId: string, period: string, bytesStored: number): Promise<void> {
    const key = periodKey(tenantId, period);
    this.storagePeaks.set(key, Math.max(this.storagePeaks.get(key) ?? 0, bytesStored));
    return Promise.resolve();
  }

  public getStoragePeak(tenantId: string, period: string): Promise<number> {
    return Promise.resolve(this.storagePeaks.get(periodKey(tenantId, period)) ?? 0);
  }

  public markPeriodBilled(input: MarkPeriodBilledInput): Promise<UsagePeriodMark> {
    const key = periodKey(input.tenantId, input.period);
    const existing = this.marksByKey.get(key);
    if (existing !== undefined) {
      return Promise.resolve(cloneMark(existing));
    }

    const mark: UsagePeriodMark = {
      tenantId: input.tenantId,
      period: input.period,
      billedAt: new Date(input.billedAt),
      revenueEventId: input.revenueEventId
    };

    this.marksByKey.set(key, mark);
    return Promise.resolve(cloneMark(mark));
  }

  public findPeriodMark(tenantId: string, period: string): Promise<UsagePeriodMark | null> {
    const mark = this.marksByKey.get(periodKey(tenantId, period));
    return Promise.resolve(mark === undefined ? null : cloneMark(mark));
  }

  public listUnbilledPeriods(beforePeriod: string, tenantId?: string): Promise<UnbilledPeriod[]> {
    const candidates = new Map<string, UnbilledPeriod>();

    for (const bucket of this.bucketsByKey.values()) {
      if (bucket.granularity === 'month') {
        const period = toUsagePeriod(bucket.bucketStart);
        candidates.set(periodKey(bucket.tenantId, period), { tenantId: bucket.tenantId, period });
      }
    }

    for (const key of this.storagePeaks.keys()) {
      const [peakTenantId = '', period = ''] = key.split('|');
      candidates.set(key, { tenantId: peakTenantId, period });
    }

    const unbilled = [...candidates.entries()]
      .filter(([key, candidate]) => (
        candidate.period < beforePeriod
        && (tenantId === undefined || candidate.tenantId === tenantId)
        && !this.marksByKey.has(key)
      ))
      .map(([, candidate]) => candidate)
      .sort((left, right) => left.period.localeCompare(right.period) || left.tenantId.localeCompare(right.tenantId));

    return Promise.resolve(unbilled);
  }

  public replaceUsageAlerts(tenantId: string, alerts: readonly UsageAlertInput[]): Promise<UsageAlert[]> {
    const stored = alerts.map((alert) => cloneAlert({ ...alert, tenantId, lastTriggeredAt: null }));
    this.alertsByTenant.set(tenantId, stored);
    return Promise.resolve(stored.map(cloneAlert));
  }

  public listUsageAlerts(tenantId: string): Promise<UsageAlert[]> {
    return Promise.resolve((this.alertsByTenant.get(tenantId) ?? []).map(cloneAlert));
  }

  public markUsageAlertsTriggered(tenantId: string, alertIds: readonly string[], triggeredAt: Date): Promise<void> {
    const alerts = this.alertsByTenant.get(tenantId) ?? [];
    this.alertsByTenant.set(tenantId, alerts.map((alert) => (
      alertIds.includes(alert.id) ? { ...alert, lastTriggeredAt: new Date(triggeredAt) } : alert
    )));

    return Promise.resolve();
  }

  private addToBucket(increment: UsageBucket): void {
    const key = bucketKey(increment);
    const existing = this.bucketsByKey.get(key);
    const merged: UsageBucket = existing === undefined
      ? cloneBucket(increment)
      : { ...existing, ...mergeCounters(existing, increment) };

    this.bucketsByKey.set(key, merged);
  }
}
