import { randomUUID } from 'node:crypto';

import type { Pool } from 'pg';

import { getSingleRow, withTransaction } from '../db/pg-helpers.js';
import type {
  AuditLogEvent,
  AuditLogRepository,
  CreateAuditLogEventInput,
  ListAuditLogEventsInput
} from './audit-log-repository.js';

interface AuditLogRow {
  id: string;
  tenant_id: string | null;
  actor_user_id: string | null;
  action: string;
  target_type: string | null;
  target_id: string | null;
  metadata: Record<string, unknown>;
  trace_id: string | null;
  ip_address: string | null;
  user_agent: string | null;
  created_at: Date;
}

function mapAuditLogRow(row: AuditLogRow): AuditLogEvent {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    actorUserId: row.actor_user_id,
    action: row.action,
    targetType: row.target_type,
    targetId: row.target_id,
    metadata: row.metadata,
    traceId: row.trace_id,
    ipAddress: row.ip_address,
    userAgent: row.user_agent,
    createdAt: row.created_at
  };
}

export class PostgresAuditLogRepository implements AuditLogRepository {
  public constructor(private readonly pool: Pool) {}

  public async createEvent(input: CreateAuditLogEventInput): Promise<AuditLogEvent> {
    return withTransaction(this.pool, input.tenantId, async (client) => {
      const result = await client.query<AuditLogRow>(
        `
        INSERT INTO audit_log_events (
          id,
          tenant_id,
          actor_user_id,
          action,
          target_type,
          target_id,
          metadata,
          trace_id,
          ip_address,
          user_agent,
          created_at
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb, $8, $9, $10, NOW())
        RETURNING *
        `,
        [
          randomUUID(),
          input.tenantId,
          input.actorUserId,
          input.action,
          input.targetType ?? null,
          input.targetId ?? null,
          JSON.stringify(input.metadata ?? {}),
          input.traceId ?? null,
          input.ipAddress ?? null,
          input.userAgent ?? null
        ]
      );

      const row = getSingleRow(result.rows);
      if (row === null) {
        throw new Error('Failed to create audit log event.');
      }

      return mapAuditLogRow(row);
    });
  }

  public async listEvents(input: ListAuditLogEventsInput): Promise<AuditLogEvent[]> {
    return withTransaction(this.pool, input.tenantId, async (client) => {
      const parameters: Array<Date | number | string | string[]> = [input.limit, input.tenantId];
      let whereClause = 'tenant_id = $2';

      if (input.actions !== undefined) {
        parameters.push([...input.actions]);
        whereClause = `${whereClause} AND action = ANY($${parameters.length}::text[])`;
      }

      if (input.after !== undefined) {
        parameters.push(input.after.createdAt);
        parameters.push(input.after.id);
        whereClause = `${whereClause} AND (created_at, id) < ($${parameters.length - 1}::timestamptz, $${parameters.length}::uuid)`;
      }

      const result = await client.query<AuditLogRow>(
        `
        SELECT *
        FROM audit_log_events
        WHERE ${whereClause}
        ORDER BY created_at DESC, id DESC
        LIMIT $1
        `,
        parameters
      );

      return result.rows.map(mapAuditLogRow);
    });
  }
}
