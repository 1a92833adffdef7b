import type { Pool, PoolClient } from 'pg';

import { getSingleRow, withTransaction } from '../db/pg-helpers.js';
import type {
  AppendRevenueEventResult,
  NewRevenueEvent,
  RevenueEvent,
  RevenueEventQuery,
  RevenueEventRepository,
  RevenueEventType,
  RevenueSource
} from './revenue-event-repository.js';

interface RevenueEventRow {
  id: string;
  tenant_id: string;
  type: RevenueEventType;
  amount_minor: string;
  currency: string;
  occurred_at: Date;
  subscription_id: string | null;
  customer_id: string | null;
  invoice_id: string | null;
  metadata: Record<string, string>;
  source: RevenueSource;
  recorded_at: Date;
}

function mapEvent(row: RevenueEventRow): RevenueEvent {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    type: row.type,
    amountMinor: Number.parseInt(row.amount_minor, 10),
    currency: row.currency,
    occurredAt: row.occurred_at,
    subscriptionId: row.subscription_id,
    customerId: row.customer_id,
    invoiceId: row.invoice_id,
    metadata: row.metadata,
    source: row.source,
    recordedAt: row.recorded_at
  };
}

async function selectById(client: PoolClient, eventId: string): Promise<RevenueEvent | null> {
  const result = await client.query<RevenueEventRow>(
    `
    SELECT e.*
    FROM revenue_event_keys k
    JOIN revenue_events e
      ON e.tenant_id = k.tenant_id
     AND e.occurred_at = k.occurred_at
     AND e.id = k.id
    WHERE k.id = $1
    `,
    [eventId]
  );

  const row = getSingleRow(result.rows);
  return row === null ? null : mapEvent(row);
}

/**
 * The log is range-partitioned by `occurred_at` and keyed by tenant, so the
 * global uniqueness of event ids lives in `revenue_event_keys`.
 */
export class PostgresRevenueEventRepository implements RevenueEventRepository {
  public constructor(private readonly pool: Pool) {}

  public async append(event: NewRevenueEvent): Promise<AppendRevenueEventResult> {
    return withTransaction(this.pool, event.tenantId, async (client) => {
      const claimed = await client.query<{ id: string }>(
        `
        INSERT INTO revenue_event_keys (id, tenant_id, occurred_at)
        VALUES ($1, $2, $3)
        ON CONFLICT (id) DO NOTHING
        RETURNING id
        `,
        [event.id, event.tenantId, event.occurredAt]
      );

      if (claimed.rows.length === 0) {
        const existing = await selectById(client, event.id);
        if (existing === null) {
          throw new Error(`Revenue event key ${event.id} exists without an event row.`);
        }

        return { inserted: false, event: existing };
      }

      const result = await client.query<RevenueEventRow>(
        `
        INSERT INTO revenue_events (
          id, tenant_id, type, amount_minor, currency, occurred_at,
          subscription_id, customer_id, invoice_id, metadata, source, recorded_at
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10::jsonb, $11, NOW())
        RETURNING *
        `,
        [
          event.id,
          event.tenantId,
          event.type,
          event.amountMinor,
          event.currency,
          event.occurredAt,
          event.subscriptionId,
          event.customerId,
          event.invoiceId,
          JSON.stringify(event.metadata),
          event.source
        ]
      );

      const row = getSingleRow(result.rows);
      if (row === null) {
        throw new Error('Failed to append revenue event.');
      }

      return { inserted: true, event: mapEvent(row) };
    });
  }

  public async findById(eventId: string): Promise<RevenueEvent | null> {
    return withTransaction(this.pool, null, (client) => selectById(client, eventId));
  }

  public async query(filter: RevenueEventQuery): Promise<RevenueEvent[]> {
    return withTransaction(this.pool, filter.tenantId ?? null, async (client) => {
      const conditions: string[] = [];
      const parameters: Array<Date | string | string[]> = [];

      const push = (clause: (placeholder: string) => string, value: Date | string | string[]): void => {
        parameters.push(value);
        conditions.push(clause(`$${parameters.length}`));
      };

      if (filter.tenantId !== undefined) {
        push((p) => `tenant_id = ${p}`, filter.tenantId);
      }
      if (filter.types !== undefined) {
        push((p) => `type = ANY(${p}::text[])`, [...filter.types]);
      }
      if (filter.from !== undefined) {
        push((p) => `occurred_at >= ${p}`, filter.from);
      }
      if (filter.to !== undefined) {
        push((p) => `occurred_at < ${p}`, filter.to);
      }
      if (filter.subscriptionId !== undefined) {
        push((p) => `subscription_id = ${p}`, filter.subscriptionId);
      }
      if (filter.customerId !== undefined) {
        push((p) => `customer_id = ${p}`, filter.customerId);
      }

      const whereClause = conditions.length === 0 ? '' : `WHERE ${conditions.join(' AND ')}`;
      const result = await client.query<RevenueEventRow>(
        `
        SELECT *
        FROM revenue_events
        ${whereClause}
        ORDER BY occurred_at ASC, id ASC
        `,
        parameters
      );

      return result.rows.map(mapEvent);
    });
  }
}
