import { randomUUID } from 'node:crypto';

import Decimal from 'decimal.js';

import type { Principal } from '../auth/auth-context.js';
import { addDays, addMonths, startOfUtcMonth, toUsagePeriod, usagePeriodRange, type Clock } from '../domain/clock.js';
import { multiplyRate, sumMinor } from '../domain/money.js';
import { AppError } from '../errors/app-error.js';
import { NotFoundError } from '../errors/domain-errors.js';
import type { RateLimitRepository } from '../repositories/rate-limit-repository.js';
import type { Tenant, TenantRepository } from '../repositories/tenant-repository.js';
import {
  emptyCounters,
  mergeCounters,
  truncateToGranularity,
  type AlertMetric,
  type UnbilledPeriod,
  type UsageAlert,
  type UsageBucket,
  type UsageCounters,
  type UsagePeriodMark,
  type UsageRepository
} from '../repositories/usage-repository.js';
import { recordUsageDropped } from '../telemetry/metrics.js';
import type { AuditRequestContext } from './audit-service.js';
import type { SecurityService } from './security-service.js';

export const QUOTA_TYPES = ['api-calls', 'storage', 'bandwidth'] as const;

export type QuotaType = (typeof QUOTA_TYPES)[number];

const BYTES_PER_GB = 1_000_000_000;
const HOUR_ROLLUP_AFTER_DAYS = 7;
const MAX_PENDING_BUCKETS = 50_000;
const COMPACTION_INTERVAL_MS = 60 * 60 * 1_000;
export const MAX_USAGE_ALERTS = 20;
const MAX_THRESHOLD_PERCENT = 1_000;
/** Share of calls that may fail before the error-rate limit is reached. */
const ERROR_RATE_LIMIT = '0.05';

export interface UsageServiceConfig {
  flushIntervalMs: number;
  rawRetentionHours: number;
  rateWindowSeconds: number;
}

export interface CurrentUsage {
  tenantId: string;
  period: string;
  calls: number;
  bytes: number;
  errors: number;
}

export interface QuotaStatus {
  quotaType: QuotaType;
  withinLimit: boolean;
  used: number;
  limit: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  retryAfterMs: number;
  remaining: number;
  limit: number;
}

export interface OverageLine {
  quotaType: QuotaType;
  used: string;
  included: number;
  overageUnits: string;
  ratePerUnit: string;
  amountMinor: number;
}

export interface OverageStatement {
  tenantId: string;
  period: string;
  currency: string;
  lines: OverageLine[];
  totalMinor: number;
}

export interface CompactionResult {
  minuteBucketsRolledUp: number;
  hourBucketsRolledUp: number;
  dayBucketsDiscarded: number;
}

export type BreachSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface UsageAlertSpec {
  metric: AlertMetric;
  thresholdPercent: number;
  enabled?: boolean;
}

export interface ThresholdBreach {
  alertId: string;
  metric: AlertMetric;
  thresholdPercent: number;
  used: number;
  limit: number;
  percentOfLimit: number;
  severity: BreachSeverity;
  /** False when the alert already fired earlier in the same usage period. */
  firstInPeriod: boolean;
}

export function breachSeverity(percentOfLimit: number): BreachSeverity {
  if (percentOfLimit >= 100) {
    return 'critical';
  }

  if (percentOfLimit >= 90) {
    return 'high';
  }

  return percentOfLimit >= 80 ? 'medium' : 'low';
}

function percentOf(used: Decimal.Value, limit: Decimal.Value): number {
  const cap = new Decimal(limit);
  return cap.lte(0) ? 0 : new Decimal(used).div(cap).mul(100).toDecimalPlaces(2, Decimal.ROUND_HALF_EVEN).toNumber();
}

export interface UsageReport {
  usage: CurrentUsage;
  quotas: QuotaStatus[];
  droppedSamples: number;
}

function bytesToGb(bytes: number): Decimal {
  return new Decimal(bytes).div(BYTES_PER_GB);
}

function overageLine(quotaType: QuotaType, used: Decimal, included: number, rate: string, currency: string): OverageLine {
  const units = Decimal.max(used.minus(included), 0);
  return {
    quotaType,
    used: used.toString(),
    included,
    overageUnits: units.toString(),
    ratePerUnit: rate,
    amountMinor: multiplyRate(units, rate, currency)
  };
}

/**
 * Usage meter. `recordCall` only touches an in-memory buffer sharded by
 * tenant; buffered samples reach storage on the flush timer and before any
 * read that depends on them.
 */
export class UsageService {
  private pendingByTenant = new Map<string, Map<string, UsageBucket>>();

  private pendingBucketCount = 0;

  private droppedSamples = 0;

  private flushInFlight: Promise<void> | null = null;

  private timer: NodeJS.Timeout | null = null;

  private compactionTimer: NodeJS.Timeout | null = null;

  public constructor(
    private readonly usageRepository: UsageRepository,
    private readonly tenantRepository: TenantRepository,
    private readonly rateLimitRepository: RateLimitRepository,
    private readonly securityService: SecurityService,
    private readonly clock: Clock,
    private readonly config: UsageServiceConfig
  ) {}

  public start(): void {
    if (this.timer !== null) {
      return;
    }

    this.timer = setInterval(() => {
      this.flush().catch((error: unknown) => {
        console.error('usage_flush_failed', { error: error instanceof Error ? error.message : 'unknown' });
      });
    }, this.config.flushIntervalMs);
    this.timer.unref();

    this.compactionTimer = setInterval(() => {
      this.compact().catch((error: unknown) => {
        console.error('usage_compaction_failed', { error: error instanceof Error ? error.message : 'unknown' });
      });
    }, COMPACTION_INTERVAL_MS);
    this.compactionTimer.unref();
  }

  public async stop(): Promise<void> {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }

    if (this.compactionTimer !== null) {
      clearInterval(this.compactionTimer);
      this.compactionTimer = null;
    }

    await this.flush();
  }

  /** Never throws; a sample that cannot be buffered is logged and dropped. */
  public recordCall(tenantId: string, endpoint: string, statusCode: number, latencyMs: number, bytes: number): void {
    try {
      if (tenantId.length === 0 || endpoint.length === 0) {
        throw new Error('Tenant and endpoint are required.');
      }

      if (![statusCode, latencyMs, bytes].every((value) => Number.isFinite(value) && value >= 0)) {
        throw new Error('Status code, latency and bytes must be non-negative numbers.');
      }

      const bucketStart = truncateToGranularity(this.clock.now(), 'minute');
      const key = `${endpoint}|${bucketStart.toISOString()}`;
      let shard = this.pendingByTenant.get(tenantId);
      const existing = shard?.get(key);

      if (existing === undefined && this.pendingBucketCount >= MAX_PENDING_BUCKETS) {
        throw new Error('Usage buffer is full.');
      }

      if (shard === undefined) {
        shard = new Map<string, UsageBucket>();
        this.pendingByTenant.set(tenantId, shard);
      }

      const sample: UsageCounters = {
        calls: 1,
        bytes: Math.round(bytes),
        errors: statusCode >= 400 ? 1 : 0,
        latencyTotalMs: latencyMs,
        latencyMaxMs: latencyMs
      };

      if (existing === undefined) {
        shard.set(key, { tenantId, endpoint, granularity: 'minute', bucketStart, ...sample });
        this.pendingBucketCount += 1;
      } else {
        shard.set(key, { ...existing, ...mergeCounters(existing, sample) });
      }
    } catch (error) {
      this.droppedSamples += 1;
      recordUsageDropped('record');
      console.error('usage_record_failed', {
        tenantId,
        endpoint,
        error: error instanceof Error ? error.message : 'unknown'
      });
    }
  }

  public droppedSampleCount(): number {
    return this.droppedSamples;
  }

  /** Writes buffered minute samples and their month totals. Concurrent callers share one flush. */
  public async flush(): Promise<void> {
    while (this.flushInFlight !== null) {
      await this.flushInFlight;
    }

    if (this.pendingBucketCount === 0) {
      return;
    }

    const batch = this.pendingByTenant;
    this.pendingByTenant = new Map();
    this.pendingBucketCount = 0;

    this.flushInFlight = this.writeBatch(batch).finally(() => {
      this.flushInFlight = null;
    });

    await this.flushInFlight;
  }

  public async currentUsage(tenantId: string): Promise<CurrentUsage> {
    await this.requireTenant(tenantId);
    return this.usageForPeriod(tenantId, toUsagePeriod(this.clock.now()));
  }

  public async checkQuota(tenantId: string, quotaType: QuotaType): Promise<QuotaStatus> {
    const tenant = await this.requireTenant(tenantId);
    const period = toUsagePeriod(this.clock.now());

    switch (quotaType) {
      case 'api-calls': {
        const usage = await this.usageForPeriod(tenantId, period);
        return this.quotaStatus(quotaType, usage.calls, tenant.limits.maxApiCallsPerMonth);
      }
      case 'bandwidth': {
        const usage = await this.usageForPeriod(tenantId, period);
        return this.quotaStatus(quotaType, bytesToGb(usage.bytes).toNumber(), tenant.limits.maxBandwidthGb);
      }
      case 'storage': {
        const peak = await this.usageRepository.getStoragePeak(tenantId, period);
        return this.quotaStatus(quotaType, bytesToGb(peak).toNumber(), tenant.limits.maxStorageGb);
      }
    }
  }

  /** Sliding-window log per (tenant, endpoint); an allowed call is counted against the window. */
  public async checkRateLimit(tenantId: string, endpoint: string): Promise<RateLimitDecision> {
    const tenant = await this.requireTenant(tenantId);
    const limit = tenant.limits.rateLimitPerWindow;
    const windowMs = this.config.rateWindowSeconds * 1_000;
    const nowMs = this.clock.now().getTime();

    const hit = await this.rateLimitRepository.hit(`${tenantId}:${endpoint}`, nowMs, windowMs, limit);
    if (hit.allowed) {
      return { allowed: true, retryAfterMs: 0, remaining: Math.max(limit - hit.count, 0), limit };
    }

    const oldest = hit.oldestAtMs ?? nowMs;
    return { allowed: false, retryAfterMs: Math.max(oldest + windowMs - nowMs, 0), remaining: 0, limit };
  }

  /** Storage is billed on the period's peak. */
  public async recordStorage(tenantId: string, bytesStored: number): Promise<void> {
    await this.requireTenant(tenantId);
    await this.usageRepository.recordStoragePeak(tenantId, toUsagePeriod(this.clock.now()), Math.max(0, Math.round(bytesStored)));
  }

  public async calculateOverage(tenantId: string, period: string): Promise<OverageStatement> {
    const tenant = await this.requireTenant(tenantId);
    const usage = await this.usageForPeriod(tenantId, period);
    const storagePeak = await this.usageRepository.getStoragePeak(tenantId, period);
    const { limits, overageRates, currency } = tenant;

    const lines = [
      overageLine('api-calls', new Decimal(usage.calls), limits.maxApiCallsPerMonth, overageRates.apiCalls, currency),
      overageLine('storage', bytesToGb(storagePeak), limits.maxStorageGb, overageRates.storageGb, currency),
      overageLine('bandwidth', bytesToGb(usage.bytes), limits.maxBandwidthGb, overageRates.bandwidthGb, currency)
    ];

    return {
      tenantId,
      period,
      currency,
      lines,
      totalMinor: sumMinor(lines.map((line) => line.amountMinor))
    };
  }

  /** Statements for every closed period of the tenant that recorded usage and has not been billed. */
  public async pendingOverage(tenantId: string, now: Date = this.clock.now()): Promise<OverageStatement[]> {
    await this.flush();
    const periods = await this.usageRepository.listUnbilledPeriods(toUsagePeriod(now), tenantId);
    const statements: OverageStatement[] = [];

    for (const { period } of periods) {
      statements.push(await this.calculateOverage(tenantId, period));
    }

    return statements;
  }

  public async listUnbilledPeriods(now: Date = this.clock.now()): Promise<UnbilledPeriod[]> {
    await this.flush();
    return this.usageRepository.listUnbilledPeriods(toUsagePeriod(now));
  }

  public markPeriodBilled(tenantId: string, period: string, revenueEventId: string | null): Promise<UsagePeriodMark> {
    return this.usageRepository.markPeriodBilled({
      tenantId,
      period,
      revenueEventId,
      billedAt: this.clock.now()
    });
  }

  /**
   * minute → hour after the raw retention window, hour → day after a week.
   * Day buckets of a billed month are kept for one further month; month
   * buckets are never compacted.
   */
  public async compact(now: Date = this.clock.now()): Promise<CompactionResult> {
    await this.flush();

    const rawCutoff = truncateToGranularity(new Date(now.getTime() - this.config.rawRetentionHours * 3_600_000), 'hour');
    const hourCutoff = truncateToGranularity(addDays(now, -HOUR_ROLLUP_AFTER_DAYS), 'day');
    const dayCutoff = addMonths(startOfUtcMonth(now), -1);

    const minuteBucketsRolledUp = await this.usageRepository.rollUpBuckets({ from: 'minute', to: 'hour', before: rawCutoff });
    const hourBucketsRolledUp = await this.usageRepository.rollUpBuckets({ from: 'hour', to: 'day', before: hourCutoff });
    const dayBucketsDiscarded = await this.usageRepository.discardBilledDayBuckets(dayCutoff);

    const result = { minuteBucketsRolledUp, hourBucketsRolledUp, dayBucketsDiscarded };
    console.log('usage_compacted', result);
    return result;
  }

  public async getUsageReport(principal: Principal, tenantId: string, context: AuditRequestContext | null = null): Promise<UsageReport> {
    await this.securityService.authorize('usage.read', principal, { tenantId, resourceType: 'usage' }, context);

    const usage = await this.currentUsage(tenantId);
    const quotas: QuotaStatus[] = [];
    for (const quotaType of QUOTA_TYPES) {
      quotas.push(await this.checkQuota(tenantId, quotaType));
    }

    return { usage, quotas, droppedSamples: this.droppedSamples };
  }

  public async getOverageStatement(
    principal: Principal,
    tenantId: string,
    period: string,
    context: AuditRequestContext | null = null
  ): Promise<OverageStatement> {
    await this.securityService.authorize('usage.read', principal, { tenantId, resourceType: 'usage_overage', resourceId: period }, context);
    return this.calculateOverage(tenantId, period);
  }

  public async listUsageBuckets(
    principal: Principal,
    tenantId: string,
    query: { granularity: UsageBucket['granularity']; from?: Date; to?: Date },
    context: AuditRequestContext | null = null
  ): Promise<UsageBucket[]> {
    await this.securityService.authorize('usage.read', principal, { tenantId, resourceType: 'usage' }, context);
    await this.flush();
    return this.usageRepository.listBuckets({ tenantId, ...query });
  }

  public async configureUsageAlerts(
    principal: Principal,
    tenantId: string,
    specs: readonly UsageAlertSpec[],
    context: AuditRequestContext | null = null
  ): Promise<UsageAlert[]> {
    await this.securityService.authorize('usage.manage_alerts', principal, { tenantId, resourceType: 'usage_alerts' }, context);
    await this.requireTenant(tenantId);

    if (specs.length > MAX_USAGE_ALERTS) {
      throw new AppError(400, 'USAGE_ALERTS_INVALID', `A tenant configures at most ${MAX_USAGE_ALERTS} usage alerts.`);
    }

    const seen = new Set<string>();
    for (const spec of specs) {
      if (!Number.isFinite(spec.thresholdPercent) || spec.thresholdPercent <= 0 || spec.thresholdPercent > MAX_THRESHOLD_PERCENT) {
        throw new AppError(400, 'USAGE_ALERTS_INVALID', `Alert thresholds lie above 0 and at most ${MAX_THRESHOLD_PERCENT} percent.`);
      }

      const key = `${spec.metric}:${spec.thresholdPercent}`;
      if (seen.has(key)) {
        throw new AppError(400, 'USAGE_ALERTS_INVALID', `Duplicate ${spec.metric} alert at ${spec.thresholdPercent} percent.`);
      }

      seen.add(key);
    }

    const createdAt = this.clock.now();
    const alerts = await this.usageRepository.replaceUsageAlerts(tenantId, specs.map((spec) => ({
      id: randomUUID(),
      tenantId,
      metric: spec.metric,
      thresholdPercent: spec.thresholdPercent,
      enabled: spec.enabled ?? true,
      createdAt
    })));

    console.log('usage_alerts_configured', { tenantId, alerts: alerts.length, userId: principal.userId });
    return alerts;
  }

  public async getUsageAlerts(principal: Principal, tenantId: string, context: AuditRequestContext | null = null): Promise<UsageAlert[]> {
    await this.securityService.authorize('usage.read', principal, { tenantId, resourceType: 'usage_alerts' }, context);
    await this.requireTenant(tenantId);
    return this.usageRepository.listUsageAlerts(tenantId);
  }

  /**
   * Compares current-period usage against every enabled alert. An alert is
   * stamped and logged the first time it fires in a period; later checks in
   * the same period still report it.
   */
  public async checkUsageThresholds(tenantId: string): Promise<ThresholdBreach[]> {
    await this.requireTenant(tenantId);
    const alerts = (await this.usageRepository.listUsageAlerts(tenantId)).filter((alert) => alert.enabled);
    if (alerts.length === 0) {
      return [];
    }

    const now = this.clock.now();
    const period = toUsagePeriod(now);
    const measured = new Map<AlertMetric, { used: number; limit: number; percentOfLimit: number }>();
    const breaches: ThresholdBreach[] = [];

    for (const alert of alerts) {
      let measurement = measured.get(alert.metric);
      if (measurement === undefined) {
        measurement = await this.measure(tenantId, alert.metric);
        measured.set(alert.metric, measurement);
      }

      if (measurement.percentOfLimit < alert.thresholdPercent) {
        continue;
      }

      breaches.push({
        alertId: alert.id,
        metric: alert.metric,
        thresholdPercent: alert.thresholdPercent,
        ...measurement,
        severity: breachSeverity(measurement.percentOfLimit),
        firstInPeriod: alert.lastTriggeredAt === null || toUsagePeriod(alert.lastTriggeredAt) !== period
      });
    }

    const fresh = breaches.filter((breach) => breach.firstInPeriod);
    if (fresh.length > 0) {
      await this.usageRepository.markUsageAlertsTriggered(tenantId, fresh.map((breach) => breach.alertId), now);
      for (const breach of fresh) {
        console.warn('usage_threshold_crossed', {
          tenantId,
          alertId: breach.alertId,
          metric: breach.metric,
          thresholdPercent: breach.thresholdPercent,
          percentOfLimit: breach.percentOfLimit,
          severity: breach.severity
        });
      }
    }

    return breaches;
  }

  public async getThresholdBreaches(
    principal: Principal,
    tenantId: string,
    context: AuditRequestContext | null = null
  ): Promise<ThresholdBreach[]> {
    await this.securityService.authorize('usage.read', principal, { tenantId, resourceType: 'usage_alerts' }, context);
    return this.checkUsageThresholds(tenantId);
  }

  private async measure(tenantId: string, metric: AlertMetric): Promise<{ used: number; limit: number; percentOfLimit: number }> {
    if (metric === 'error-rate') {
      const usage = await this.usageForPeriod(tenantId, toUsagePeriod(this.clock.now()));
      const rate = usage.calls === 0 ? new Decimal(0) : new Decimal(usage.errors).div(usage.calls);
      return {
        used: rate.toDecimalPlaces(4, Decimal.ROUND_HALF_EVEN).toNumber(),
        limit: new Decimal(ERROR_RATE_LIMIT).toNumber(),
        percentOfLimit: percentOf(rate, ERROR_RATE_LIMIT)
      };
    }

    const quota = await this.checkQuota(tenantId, metric);
    return { used: quota.used, limit: quota.limit, percentOfLimit: percentOf(quota.used, quota.limit) };
  }

  private quotaStatus(quotaType: QuotaType, used: number, limit: number): QuotaStatus {
    return { quotaType, withinLimit: used <= limit, used, limit };
  }

  private async usageForPeriod(tenantId: string, period: string): Promise<CurrentUsage> {
    await this.flush();
    const { start, end } = usagePeriodRange(period);
    const buckets = await this.usageRepository.listBuckets({ tenantId, granularity: 'month', from: start, to: end });
    const totals = buckets.reduce<UsageCounters>((accumulator, bucket) => mergeCounters(accumulator, bucket), emptyCounters());

    return {
      tenantId,
      period,
      calls: totals.calls,
      bytes: totals.bytes,
      errors: totals.errors
    };
  }

  private async requireTenant(tenantId: string): Promise<Tenant> {
    const tenant = await this.tenantRepository.findTenantById(tenantId);
    if (tenant === null) {
      throw new NotFoundError('TENANT_NOT_FOUND', 'Tenant not found.');
    }

    return tenant;
  }

  private async writeBatch(batch: Map<string, Map<string, UsageBucket>>): Promise<void> {
    const increments: UsageBucket[] = [];
    for (const shard of batch.values()) {
      for (const minute of shard.values()) {
        increments.push(minute, {
          ...minute,
          granularity: 'month',
          bucketStart: truncateToGranularity(minute.bucketStart, 'month')
        });
      }
    }

    try {
      await this.usageRepository.incrementBuckets(increments);
    } catch (error) {
      const samples = increments
        .filter((bucket) => bucket.granularity === 'minute')
        .reduce((total, bucket) => total + bucket.calls, 0);

      this.droppedSamples += samples;
      recordUsageDropped('flush', samples);
      console.error('usage_flush_failed', {
        buckets: increments.length / 2,
        samples,
        error: error instanceof Error ? error.message : 'unknown'
      });
    }
  }
}
