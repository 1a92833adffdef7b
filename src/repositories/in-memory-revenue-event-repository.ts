import type {
  AppendRevenueEventResult,
  NewRevenueEvent,
  RevenueEvent,
  RevenueEventQuery,
  RevenueEventRepository
} from './revenue-event-repository.js';

function cloneEvent(event: RevenueEvent): RevenueEvent {
  return {
    ...event,
    metadata: { ...event.metadata },
    occurredAt: new Date(event.occurredAt),
    recordedAt: new Date(event.recordedAt)
  };
}

export function compareRevenueEvents(left: RevenueEvent, right: RevenueEvent): number {
  if (left.occurredAt.getTime() !== right.occurredAt.getTime()) {
    return left.occurredAt.getTime() - right.occurredAt.getTime();
  }

  return left.id.localeCompare(right.id);
}

export function matchesRevenueQuery(event: RevenueEvent, filter: RevenueEventQuery): boolean {
  return (filter.tenantId === undefined || event.tenantId === filter.tenantId)
    && (filter.types === undefined || filter.types.includes(event.type))
    && (filter.from === undefined || event.occurredAt.getTime() >= filter.from.getTime())
    && (filter.to === undefined || event.occurredAt.getTime() < filter.to.getTime())
    && (filter.subscriptionId === undefined || event.subscriptionId === filter.subscriptionId)
    && (filter.customerId === undefined || event.customerId === filter.customerId);
}

/** Append-only: there is deliberately no update or delete. */
export class InMemoryRevenueEventRepository implements RevenueEventRepository {
  private readonly eventsById = new Map<string, RevenueEvent>();

  public append(event: NewRevenueEvent): Promise<AppendRevenueEventResult> {
    const existing = this.eventsById.get(event.id);
    if (existing !== undefined) {
      return Promise.resolve({ inserted: false, event: cloneEvent(existing) });
    }

    const stored: RevenueEvent = {
      ...event,
      recordedAt: new Date()
    };

    this.eventsById.set(stored.id, cloneEvent(stored));
    return Promise.resolve({ inserted: true, event: cloneEvent(stored) });
  }

  public findById(eventId: string): Promise<RevenueEvent | null> {
    const event = this.eventsById.get(eventId);
    return Promise.resolve(event === undefined ? null : cloneEvent(event));
  }

  public query(filter: RevenueEventQuery): Promise<RevenueEvent[]> {
    const events = [...this.eventsById.values()]
      .filter((event) => matchesRevenueQuery(event, filter))
      .sort(compareRevenueEvents)
      .map(cloneEvent);

    return Promise.resolve(events);
  }
}
