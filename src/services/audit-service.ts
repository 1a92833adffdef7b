import type { Request } from 'express';

import type { AuditLogRepository, CreateAuditLogEventInput } from '../repositories/audit-log-repository.js';

export type AuditEventInput = CreateAuditLogEventInput;

export interface AuditRequestContext {
  traceId: string | null;
  ipAddress: string | null;
  userAgent: string | null;
}

function dropUndefined(metadata: Record<string, unknown> | undefined): Record<string, unknown> {
  if (metadata === undefined) {
    return {};
  }

  return Object.fromEntries(Object.entries(metadata).filter(([, value]) => value !== undefined));
}

export function getAuditRequestContext(request: Request): AuditRequestContext {
  const traceId = typeof request.res?.locals.traceId === 'string'
    ? request.res.locals.traceId
    : null;

  const userAgent = request.header('user-agent');

  return {
    traceId,
    ipAddress: typeof request.ip === 'string' && request.ip.length > 0 ? request.ip : null,
    userAgent: typeof userAgent === 'string' && userAgent.length > 0 ? userAgent : null
  };
}

export class AuditService {
  public constructor(private readonly repository: AuditLogRepository) {}

  public async record(event: AuditEventInput): Promise<void> {
    await this.repository.createEvent({
      ...event,
      metadata: dropUndefined(event.metadata)
    });
  }

  /** For trails written after the business change has committed; a failed write is logged, not raised. */
  public async recordSafely(event: AuditEventInput): Promise<void> {
    try {
      await this.record(event);
    } catch (error) {
      console.error('audit_log_write_failed', {
        action: event.action,
        tenantId: event.tenantId,
        error: error instanceof Error ? error.message : 'unknown'
      });
    }
  }
}
