import { randomUUID } from 'node:crypto';

import type {
  AuditLogEvent,
  AuditLogListCursor,
  AuditLogRepository,
  CreateAuditLogEventInput,
  ListAuditLogEventsInput
} from './audit-log-repository.js';

function cloneEvent(event: AuditLogEvent): AuditLogEvent {
  return {
    ...event,
    metadata: { ...event.metadata },
    createdAt: new Date(event.createdAt)
  };
}

function isBefore(event: AuditLogEvent, cursor: AuditLogListCursor): boolean {
  if (event.createdAt.getTime() !== cursor.createdAt.getTime()) {
    return event.createdAt.getTime() < cursor.createdAt.getTime();
  }

  return event.id.localeCompare(cursor.id) < 0;
}

export class InMemoryAuditLogRepository implements AuditLogRepository {
  private readonly events: AuditLogEvent[] = [];

  public createEvent(input: CreateAuditLogEventInput): Promise<AuditLogEvent> {
    const event: AuditLogEvent = {
      id: randomUUID(),
      tenantId: input.tenantId,
      actorUserId: input.actorUserId,
      action: input.action,
      targetType: input.targetType ?? null,
      targetId: input.targetId ?? null,
      metadata: input.metadata ?? {},
      traceId: input.traceId ?? null,
      ipAddress: input.ipAddress ?? null,
      userAgent: input.userAgent ?? null,
      createdAt: new Date()
    };

    this.events.push(event);
    return Promise.resolve(cloneEvent(event));
  }

  public listEvents(input: ListAuditLogEventsInput): Promise<AuditLogEvent[]> {
    const { after, actions } = input;
    const events = this.events
      .filter((event) => (
        event.tenantId === input.tenantId
        && (actions === undefined || actions.includes(event.action))
        && (after === undefined || isBefore(event, after))
      ))
      .sort((left, right) => (
        right.createdAt.getTime() - left.createdAt.getTime() || right.id.localeCompare(left.id)
      ))
      .slice(0, input.limit)
      .map(cloneEvent);

    return Promise.resolve(events);
  }
}
