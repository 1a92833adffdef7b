import type { Principal } from '../auth/auth-context.js';
import { KeyedMutex } from '../concurrency/keyed-mutex.js';
import type { Clock } from '../domain/clock.js';
import { reduceLedgerMetrics, type LedgerMetrics } from '../domain/ledger-metrics.js';
import { normalizeCurrency } from '../domain/money.js';
import { REVENUE_STREAMS, type RevenueStream } from '../domain/tier-catalog.js';
import { AppError } from '../errors/app-error.js';
import { DuplicateError, NotFoundError } from '../errors/domain-errors.js';
import {
  RECURRING_EVENT_TYPES,
  type NewRevenueEvent,
  type RevenueEvent,
  type RevenueEventQuery,
  type RevenueEventRepository,
  type RevenueEventType,
  type RevenueSource
} from '../repositories/revenue-event-repository.js';
import { recordRevenueEvent } from '../telemetry/metrics.js';
import type { AuditRequestContext, AuditService } from './audit-service.js';
import type { SecurityService } from './security-service.js';

const SIGNED_EVENT_TYPES: readonly RevenueEventType[] = ['subscription-prorated', 'migration'];
const RECURRING_METADATA_KEYS = ['billingCycle', 'priceMinor', 'periodStart', 'periodEnd'] as const;

export const MANUAL_EVENT_TYPES = ['refund', 'migration', 'add-on-purchase', 'setup-fee'] as const;

export type ManualEventType = (typeof MANUAL_EVENT_TYPES)[number];

export interface RecordRevenueEventInput {
  id: string;
  tenantId: string;
  type: RevenueEventType;
  amountMinor: number;
  currency: string;
  occurredAt: Date;
  stream: RevenueStream;
  subscriptionId?: string | null;
  customerId?: string | null;
  invoiceId?: string | null;
  metadata?: Record<string, string>;
  source: RevenueSource;
}

export interface RecordRevenueEventResult {
  recorded: boolean;
  event: RevenueEvent;
}

export interface ManualEntryInput {
  id: string;
  type: ManualEventType;
  amountMinor: number;
  currency: string;
  stream: RevenueStream;
  reason: string;
  occurredAt?: Date;
  customerId?: string | null;
  subscriptionId?: string | null;
  /** The event this entry corrects; it must belong to the same tenant. */
  offsetsEventId?: string | null;
}

export interface MetricsRequest {
  tenantId?: string;
  from: Date;
  to: Date;
  currency: string;
}

function invalid(message: string, details?: unknown): AppError {
  return new AppError(400, 'REVENUE_EVENT_INVALID', message, details);
}

function sameMetadata(left: Record<string, string>, right: Record<string, string>): boolean {
  const leftKeys = Object.keys(left).sort();
  const rightKeys = Object.keys(right).sort();
  return leftKeys.length === rightKeys.length
    && leftKeys.every((key, index) => key === rightKeys[index] && left[key] === right[key]);
}

export function samePayload(stored: RevenueEvent, candidate: NewRevenueEvent): boolean {
  return stored.tenantId === candidate.tenantId
    && stored.type === candidate.type
    && stored.amountMinor === candidate.amountMinor
    && stored.currency === candidate.currency
    && stored.occurredAt.getTime() === candidate.occurredAt.getTime()
    && stored.subscriptionId === candidate.subscriptionId
    && stored.customerId === candidate.customerId
    && stored.invoiceId === candidate.invoiceId
    && stored.source === candidate.source
    && sameMetadata(stored.metadata, candidate.metadata);
}

function toNewEvent(input: RecordRevenueEventInput): NewRevenueEvent {
  const id = input.id.trim();
  if (id.length === 0 || id.length > 200) {
    throw invalid('Revenue event id must be between 1 and 200 characters.');
  }

  if (!Number.isSafeInteger(input.amountMinor)) {
    throw invalid('Amounts are integer minor units.');
  }

  if (input.type === 'refund' && input.amountMinor > 0) {
    throw invalid('Refunds are recorded as zero or negative amounts.');
  }

  if (input.type !== 'refund' && !SIGNED_EVENT_TYPES.includes(input.type) && input.amountMinor < 0) {
    throw invalid(`Amounts of '${input.type}' events cannot be negative.`);
  }

  if (!REVENUE_STREAMS.includes(input.stream)) {
    throw invalid('Unknown revenue stream.');
  }

  const metadata: Record<string, string> = { ...input.metadata, stream: input.stream };
  if (RECURRING_EVENT_TYPES.includes(input.type)) {
    const missing = RECURRING_METADATA_KEYS.filter((key) => metadata[key] === undefined);
    if (missing.length > 0) {
      throw invalid('Recurring revenue events must describe the billing period.', { missing });
    }
  }

  return {
    id,
    tenantId: input.tenantId,
    type: input.type,
    amountMinor: input.amountMinor,
    currency: normalizeCurrency(input.currency),
    occurredAt: new Date(input.occurredAt),
    subscriptionId: input.subscriptionId ?? null,
    customerId: input.customerId ?? null,
    invoiceId: input.invoiceId ?? null,
    metadata,
    source: input.source
  };
}

/**
 * Append-only, idempotent revenue log. Writes are serialized per event id
 * and nowhere else; every figure it reports is reduced from the log.
 */
export class RevenueLedgerService {
  private readonly eventLocks = new KeyedMutex();

  public constructor(
    private readonly repository: RevenueEventRepository,
    private readonly securityService: SecurityService,
    private readonly auditService: AuditService,
    private readonly clock: Clock
  ) {}

  /**
   * Replaying an id with an identical payload is a successful no-op
   * (`recorded: false`); the same id with a different payload is a conflict.
   */
  public async record(input: RecordRevenueEventInput): Promise<RecordRevenueEventResult> {
    const candidate = toNewEvent(input);

    return this.eventLocks.runExclusive(candidate.id, async () => {
      const { inserted, event } = await this.repository.append(candidate);

      if (!inserted && !samePayload(event, candidate)) {
        throw new DuplicateError('REVENUE_EVENT_CONFLICT', 'A different revenue event was already recorded under this id.', {
          eventId: candidate.id
        });
      }

      recordRevenueEvent({ type: event.type, source: event.source, inserted: inserted ? 'true' : 'false' });
      if (inserted) {
        console.log('revenue_event_recorded', {
          eventId: event.id,
          tenantId: event.tenantId,
          type: event.type,
          amountMinor: event.amountMinor,
          currency: event.currency
        });
      }

      return { recorded: inserted, event };
    });
  }

  public findEvent(eventId: string): Promise<RevenueEvent | null> {
    return this.repository.findById(eventId);
  }

  public query(filter: RevenueEventQuery): Promise<RevenueEvent[]> {
    return this.repository.query(filter);
  }

  public async metrics(request: MetricsRequest): Promise<LedgerMetrics> {
    const currency = normalizeCurrency(request.currency);
    const events = await this.repository.query({
      ...(request.tenantId === undefined ? {} : { tenantId: request.tenantId }),
      from: request.from,
      to: request.to
    });

    return reduceLedgerMetrics(events, { from: request.from, to: request.to, currency });
  }

  public async recordManualEntry(
    principal: Principal,
    tenantId: string,
    entry: ManualEntryInput,
    context: AuditRequestContext | null = null
  ): Promise<RecordRevenueEventResult> {
    await this.securityService.authorize('revenue.record_manual', principal, { tenantId, resourceType: 'revenue_event', resourceId: entry.id }, context);

    const reason = entry.reason.trim();
    if (reason.length === 0) {
      throw invalid('Manual entries require a reason.');
    }

    const metadata: Record<string, string> = { reason, enteredBy: principal.userId };
    if (entry.offsetsEventId !== undefined && entry.offsetsEventId !== null) {
      const original = await this.repository.findById(entry.offsetsEventId);
      if (original === null || original.tenantId !== tenantId) {
        throw new NotFoundError('REVENUE_EVENT_NOT_FOUND', 'The event being corrected does not exist in this tenant.');
      }

      const offsets = Math.sign(entry.amountMinor) === -Math.sign(original.amountMinor)
        && Math.abs(entry.amountMinor) <= Math.abs(original.amountMinor)
        && normalizeCurrency(entry.currency) === original.currency;
      if (!offsets) {
        throw invalid('A correction must offset the original event in its currency without exceeding it.');
      }

      metadata.offsetsEventId = original.id;
    }

    // A retry without `occurredAt` replays the time stamped on the first write.
    const stored = entry.occurredAt === undefined ? await this.repository.findById(entry.id.trim()) : null;
    const occurredAt = entry.occurredAt ?? (stored !== null && stored.tenantId === tenantId ? stored.occurredAt : this.clock.now());

    const result = await this.record({
      id: entry.id,
      tenantId,
      type: entry.type,
      amountMinor: entry.amountMinor,
      currency: entry.currency,
      occurredAt,
      stream: entry.stream,
      customerId: entry.customerId ?? null,
      subscriptionId: entry.subscriptionId ?? null,
      invoiceId: null,
      metadata,
      source: 'manual'
    });

    if (result.recorded) {
      await this.auditService.recordSafely({
        tenantId,
        actorUserId: principal.userId,
        action: 'revenue.manual_entry',
        targetType: 'revenue_event',
        targetId: result.event.id,
        metadata: { type: entry.type, amountMinor: entry.amountMinor, currency: result.event.currency, reason },
        ...context
      });
    }

    return result;
  }

  public async queryForTenant(
    principal: Principal,
    tenantId: string,
    filter: Omit<RevenueEventQuery, 'tenantId'>,
    context: AuditRequestContext | null = null
  ): Promise<RevenueEvent[]> {
    await this.securityService.authorize('revenue.read', principal, { tenantId, resourceType: 'revenue_event' }, context);
    return this.repository.query({ ...filter, tenantId });
  }

  public async metricsForTenant(
    principal: Principal,
    tenantId: string,
    request: Omit<MetricsRequest, 'tenantId'>,
    context: AuditRequestContext | null = null
  ): Promise<LedgerMetrics> {
    await this.securityService.authorize('revenue.read', principal, { tenantId, resourceType: 'revenue_metrics' }, context);
    return this.metrics({ ...request, tenantId });
  }
}
