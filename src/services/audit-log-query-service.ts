import { Buffer } from 'node:buffer';

import { z } from 'zod';

import type { Principal } from '../auth/auth-context.js';
import { AppError } from '../errors/app-error.js';
import type { AuditLogEvent, AuditLogListCursor, AuditLogRepository } from '../repositories/audit-log-repository.js';
import type { AuditRequestContext } from './audit-service.js';
import type { SecurityService } from './security-service.js';

export interface AuditLogQueryServiceConfig {
  listDefaultLimit: number;
  listMaxLimit: number;
}

export interface AuditLogListPage {
  events: AuditLogEvent[];
  nextCursor: string | null;
}

export interface AuditLogListQuery {
  limit?: number;
  cursor?: string;
  actions?: readonly string[];
}

const cursorSchema = z.object({
  createdAt: z.string().datetime(),
  id: z.string().min(1)
});

function parseCursor(cursor?: string): AuditLogListCursor | undefined {
  if (cursor === undefined || cursor.length === 0) {
    return undefined;
  }

  try {
    const parsed = cursorSchema.safeParse(JSON.parse(Buffer.from(cursor, 'base64url').toString('utf8')));
    return parsed.success ? { createdAt: new Date(parsed.data.createdAt), id: parsed.data.id } : undefined;
  } catch {
    return undefined;
  }
}

function encodeCursor(cursor: AuditLogListCursor): string {
  return Buffer.from(
    JSON.stringify({
      createdAt: cursor.createdAt.toISOString(),
      id: cursor.id
    })
  ).toString('base64url');
}

export class AuditLogQueryService {
  public constructor(
    private readonly auditLogRepository: AuditLogRepository,
    private readonly securityService: SecurityService,
    private readonly config: AuditLogQueryServiceConfig
  ) {}

  public async listEvents(
    principal: Principal,
    tenantId: string,
    query: AuditLogListQuery = {},
    context: AuditRequestContext | null = null
  ): Promise<AuditLogListPage> {
    await this.securityService.authorize('audit_log.read', principal, { tenantId, resourceType: 'audit_log' }, context);

    const normalizedLimit = this.normalizeLimit(query.limit);
    const parsedCursor = parseCursor(query.cursor);

    if (query.cursor !== undefined && parsedCursor === undefined) {
      throw new AppError(400, 'PAGINATION_CURSOR_INVALID', 'Cursor is invalid.');
    }

    const events = await this.auditLogRepository.listEvents({
      tenantId,
      limit: normalizedLimit,
      ...(query.actions === undefined ? {} : { actions: query.actions }),
      ...(parsedCursor === undefined ? {} : { after: parsedCursor })
    });

    const last = events.at(-1);

    return {
      events,
      nextCursor: events.length < normalizedLimit || last === undefined
        ? null
        : encodeCursor({
            createdAt: last.createdAt,
            id: last.id
          })
    };
  }

  private normalizeLimit(limit?: number): number {
    if (limit === undefined) {
      return this.config.listDefaultLimit;
    }

    if (!Number.isInteger(limit) || limit <= 0) {
      throw new AppError(400, 'PAGINATION_LIMIT_INVALID', 'Limit must be a positive integer.');
    }

    return Math.min(limit, this.config.listMaxLimit);
  }
}
