import type { Pool } from 'pg';

import { getSingleRow, withTransaction } from '../db/pg-helpers.js';
import type {
  AlertMetric,
  MarkPeriodBilledInput,
  RollUpBucketsInput,
  UnbilledPeriod,
  UsageAlert,
  UsageAlertInput,
  UsageBucket,
  UsageBucketQuery,
  UsageGranularity,
  UsagePeriodMark,
  UsageRepository
} from './usage-repository.js';

interface UsageBucketRow {
  tenant_id: string;
  endpoint: string;
  granularity: UsageGranularity;
  bucket_start: Date;
  calls: string;
  bytes: string;
  errors: string;
  latency_total_ms: string;
  latency_max_ms: string;
}

interface UsagePeriodMarkRow {
  tenant_id: string;
  period: string;
  billed_at: Date;
  revenue_event_id: string | null;
}

interface UsageAlertRow {
  id: string;
  tenant_id: string;
  metric: AlertMetric;
  threshold_percent: string;
  enabled: boolean;
  created_at: Date;
  last_triggered_at: Date | null;
}

function mapAlert(row: UsageAlertRow): UsageAlert {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    metric: row.metric,
    thresholdPercent: Number(row.threshold_percent),
    enabled: row.enabled,
    createdAt: row.created_at,
    lastTriggeredAt: row.last_triggered_at
  };
}

function mapBucket(row: UsageBucketRow): UsageBucket {
  return {
    tenantId: row.tenant_id,
    endpoint: row.endpoint,
    granularity: row.granularity,
    bucketStart: row.bucket_start,
    calls: Number(row.calls),
    bytes: Number(row.bytes),
    errors: Number(row.errors),
    latencyTotalMs: Number(row.latency_total_ms),
    latencyMaxMs: Number(row.latency_max_ms)
  };
}

function mapMark(row: UsagePeriodMarkRow): UsagePeriodMark {
  return {
    tenantId: row.tenant_id,
    period: row.period,
    billedAt: row.billed_at,
    revenueEventId: row.revenue_event_id
  };
}

const UPSERT_COUNTERS = `
  ON CONFLICT (tenant_id, granularity, endpoint, bucket_start)
  DO UPDATE SET calls = usage_buckets.calls + EXCLUDED.calls,
                bytes = usage_buckets.bytes + EXCLUDED.bytes,
                errors = usage_buckets.errors + EXCLUDED.errors,
                latency_total_ms = usage_buckets.latency_total_ms + EXCLUDED.latency_total_ms,
                latency_max_ms = GREATEST(usage_buckets.latency_max_ms, EXCLUDED.latency_max_ms)
`;

export class PostgresUsageRepository implements UsageRepository {
  public constructor(private readonly pool: Pool) {}

  public async incrementBuckets(increments: readonly UsageBucket[]): Promise<void> {
    if (increments.length === 0) {
      return;
    }

    await withTransaction(this.pool, null, async (client) => {
      for (const increment of increments) {
        await client.query(
          `
          INSERT INTO usage_buckets (
            tenant_id, endpoint, granularity, bucket_start, calls, bytes, errors, latency_total_ms, latency_max_ms
          )
          VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
          ${UPSERT_COUNTERS}
          `,
          [
            increment.tenantId,
            increment.endpoint,
            increment.granularity,
            increment.bucketStart,
            increment.calls,
            increment.bytes,
            increment.errors,
            increment.latencyTotalMs,
            increment.latencyMaxMs
          ]
        );
      }
    });
  }

  public async listBuckets(query: UsageBucketQuery): Promise<UsageBucket[]> {
    return withTransaction(this.pool, query.tenantId, async (client) => {
      const result = await client.query<UsageBucketRow>(
        `
        SELECT *
        FROM usage_buckets
        WHERE tenant_id = $1
          AND granularity = $2
          AND ($3::text IS NULL OR endpoint = $3)
          AND ($4::timestamptz IS NULL OR bucket_start >= $4)
          AND ($5::timestamptz IS NULL OR bucket_start < $5)
        ORDER BY bucket_start ASC, endpoint ASC
        `,
        [query.tenantId, query.granularity, query.endpoint ?? null, query.from ?? null, query.to ?? null]
      );

      return result.rows.map(mapBucket);
    });
  }

  public async rollUpBuckets(input: RollUpBucketsInput): Promise<number> {
    return withTransaction(this.pool, null, async (client) => {
      const result = await client.query<{ moved: number }>(
        `
        WITH moved AS (
          DELETE FROM usage_buckets
          WHERE granularity = $1 AND bucket_start < $3
          RETURNING *
        ),
        merged AS (
          INSERT INTO usage_buckets (
            tenant_id, endpoint, granularity, bucket_start, calls, bytes, errors, latency_total_ms, latency_max_ms
          )
          SELECT tenant_id, endpoint, $2, date_trunc($2, bucket_start, 'UTC'),
                 SUM(calls), SUM(bytes), SUM(errors), SUM(latency_total_ms), MAX(latency_max_ms)
          FROM moved
          GROUP BY tenant_id, endpoint, date_trunc($2, bucket_start, 'UTC')
          ${UPSERT_COUNTERS}
          RETURNING 1
        )
        SELECT COUNT(*)::int AS moved FROM moved
        `,
        [input.from, input.to, input.before]
      );

      return getSingleRow(result.rows)?.moved ?? 0;
    });
  }

  public async discardBilledDayBuckets(before: Date): Promise<number> {
    return withTransaction(this.pool, null, async (client) => {
      const result = await client.query(
        `
        DELETE FROM usage_buckets b
        USING usage_period_marks m
        WHERE b.granularity = 'day'
          AND b.bucket_start < $1
          AND m.tenant_id = b.tenant_id
          AND m.period = to_char(b.bucket_start AT TIME ZONE 'UTC', 'YYYY-MM')
        `,
        [before]
      );

      return result.rowCount ?? 0;
    });
  }

  public async recordStoragePeak(tenantId: string, period: string, bytesStored: number): Promise<void> {
    await withTransaction(this.pool, tenantId, async (client) => {
      await client.query(
        `
        INSERT INTO usage_storage_peaks (tenant_id, period, peak_bytes)
        VALUES ($1, $2, $3)
        ON CONFLICT (tenant_id, period)
        DO UPDATE SET peak_bytes = GREATEST(usage_storage_peaks.peak_bytes, EXCLUDED.peak_bytes)
        `,
        [tenantId, period, bytesStored]
      );
    });
  }

  public async getStoragePeak(tenantId: string, period: string): Promise<number> {
    return withTransaction(this.pool, tenantId, async (client) => {
      const result = await client.query<{ peak_bytes: string }>(
        'SELECT peak_bytes FROM usage_storage_peaks WHERE tenant_id = $1 AND period = $2',
        [tenantId, period]
      );

      const row = getSingleRow(result.rows);
      return row === null ? 0 : Number(row.peak_bytes);
    });
  }

  public async markPeriodBilled(input: MarkPeriodBilledInput): Promise<UsagePeriodMark> {
    return withTransaction(this.pool, input.tenantId, async (client) => {
      await client.query(
        `
        INSERT INTO usage_period_marks (tenant_id, period, billed_at, revenue_event_id)
        VALUES ($1, $2, $3, $4)
        ON CONFLICT (tenant_id, period) DO NOTHING
        `,
        [input.tenantId, input.period, input.billedAt, input.revenueEventId]
      );

      const result = await client.query<UsagePeriodMarkRow>(
        'SELECT * FROM usage_period_marks WHERE tenant_id = $1 AND period = $2',
        [input.tenantId, input.period]
      );

      const row = getSingleRow(result.rows);
      if (row === null) {
        throw new Error('Failed to mark usage period as billed.');
      }

      return mapMark(row);
    });
  }

  public async findPeriodMark(tenantId: string, period: string): Promise<UsagePeriodMark | null> {
    return withTransaction(this.pool, tenantId, async (client) => {
      const result = await client.query<UsagePeriodMarkRow>(
        'SELECT * FROM usage_period_marks WHERE tenant_id = $1 AND period = $2',
        [tenantId, period]
      );

      const row = getSingleRow(result.rows);
      return row === null ? null : mapMark(row);
    });
  }

  public async listUnbilledPeriods(beforePeriod: string, tenantId?: string): Promise<UnbilledPeriod[]> {
    return withTransaction(this.pool, tenantId ?? null, async (client) => {
      const result = await client.query<{ tenant_id: string; period: string }>(
        `
        WITH periods AS (
          SELECT tenant_id, to_char(bucket_start AT TIME ZONE 'UTC', 'YYYY-MM') AS period
          FROM usage_buckets
          WHERE granularity = 'month'
          UNION
          SELECT tenant_id, period
          FROM usage_storage_peaks
        )
        SELECT p.tenant_id, p.period
        FROM periods p
        LEFT JOIN usage_period_marks m
          ON m.tenant_id = p.tenant_id AND m.period = p.period
        WHERE m.tenant_id IS NULL
          AND p.period < $1
          AND ($2::uuid IS NULL OR p.tenant_id = $2)
        ORDER BY p.period ASC, p.tenant_id ASC
        `,
        [beforePeriod, tenantId ?? null]
      );

      return result.rows.map((row) => ({ tenantId: row.tenant_id, period: row.period }));
    });
  }

  public async replaceUsageAlerts(tenantId: string, alerts: readonly UsageAlertInput[]): Promise<UsageAlert[]> {
    return withTransaction(this.pool, tenantId, async (client) => {
      await client.query('DELETE FROM usage_alerts WHERE tenant_id = $1', [tenantId]);

      const stored: UsageAlert[] = [];
      for (const [position, alert] of alerts.entries()) {
        const result = await client.query<UsageAlertRow>(
          `
          INSERT INTO usage_alerts (id, tenant_id, position, metric, threshold_percent, enabled, created_at)
          VALUES ($1, $2, $3, $4, $5, $6, $7)
          RETURNING *
          `,
          [alert.id, tenantId, position, alert.metric, alert.thresholdPercent, alert.enabled, alert.createdAt]
        );

        const row = getSingleRow(result.rows);
        if (row === null) {
          throw new Error('Failed to store usage alert.');
        }

        stored.push(mapAlert(row));
      }

      return stored;
    });
  }

  public async listUsageAlerts(tenantId: string): Promise<UsageAlert[]> {
    return withTransaction(this.pool, tenantId, async (client) => {
      const result = await client.query<UsageAlertRow>(
        'SELECT * FROM usage_alerts WHERE tenant_id = $1 ORDER BY position ASC',
        [tenantId]
      );

      return result.rows.map(mapAlert);
    });
  }

  public async markUsageAlertsTriggered(tenantId: string, alertIds: readonly string[], triggeredAt: Date): Promise<void> {
    await withTransaction(this.pool, tenantId, async (client) => {
      await client.query(
        'UPDATE usage_alerts SET last_triggered_at = $3 WHERE tenant_id = $1 AND id = ANY($2::uuid[])',
        [tenantId, [...alertIds], triggeredAt]
      );
    });
  }
}
