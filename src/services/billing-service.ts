import type { Principal } from '../auth/auth-context.js';
import { runBounded, TimeoutError, withTimeout } from '../concurrency/bounded.js';
import { KeyedMutex } from '../concurrency/keyed-mutex.js';
import { addMinutes, type Clock } from '../domain/clock.js';
import { normalizeCurrency } from '../domain/money.js';
import { addBillingCycle, type RevenueStream } from '../domain/tier-catalog.js';
import { AppError } from '../errors/app-error.js';
import { DuplicateError, InvalidStateTransition, NotFoundError, PaymentDeclined, PaymentProcessorError } from '../errors/domain-errors.js';
import type { PaymentProcessor } from '../payments/payment-processor.js';
import type {
  BillingRepository,
  Customer,
  Invoice,
  InvoiceChanges,
  InvoiceLineItem,
  InvoiceStatus,
  LineItemEventType
} from '../repositories/billing-repository.js';
import type { RevenueEvent } from '../repositories/revenue-event-repository.js';
import type { Subscription } from '../repositories/subscription-repository.js';
import { recordBillingCycleResult, recordPaymentAttempt } from '../telemetry/metrics.js';
import type { AuditRequestContext, AuditService } from './audit-service.js';
import type { RevenueLedgerService } from './revenue-ledger-service.js';
import type { SecurityService } from './security-service.js';
import { discountedPriceMinor, type CreateSubscriptionSpec, type SubscriptionService } from './subscription-service.js';
import type { OverageStatement, UsageService } from './usage-service.js';

/** Recorded as the dunning failure reason when the processor outcome stayed unknown. */
export const AMBIGUOUS_FAILURE = 'processor_error';

export interface BillingServiceConfig {
  maxAttempts: number;
  retryBaseMinutes: number;
  concurrency: number;
  paymentTimeoutMs: number;
  /** Extra attempts, under the same idempotency key, after an ambiguous outcome. */
  ambiguousRetries: number;
}

export interface PaymentRequest {
  amountMinor: number;
  currency: string;
  paymentMethodToken: string;
  idempotencyKey: string;
  metadata: Record<string, string>;
  customerReference?: string | null;
}

export type PaymentOutcome =
  | { status: 'succeeded'; processorReference: string | null }
  | { status: 'declined'; reason: string; processorReference: string | null }
  | { status: 'error'; message: string };

export interface CreateCustomerSpec {
  email: string;
  name: string;
  metadata?: Record<string, string>;
}

export interface StartSubscriptionSpec extends CreateSubscriptionSpec {
  setupFeeMinor?: number;
}

export interface StartSubscriptionResult {
  subscription: Subscription;
  events: RevenueEvent[];
}

export interface ChangeTierResult {
  subscription: Subscription;
  prorationMinor: number;
  event: RevenueEvent;
}

export interface OneOffChargeSpec {
  customerId: string;
  type: 'setup-fee' | 'add-on-purchase';
  amountMinor: number;
  currency: string;
  stream: RevenueStream;
  description: string;
  paymentMethodToken: string;
  idempotencyKey: string;
  subscriptionId?: string | null;
}

export interface RefundSpec {
  eventId: string;
  /** Scopes the refund; a retry under the same key returns the recorded refund. */
  idempotencyKey: string;
  /** Defaults to the full refundable remainder. */
  amountMinor?: number;
  reason: string;
}

export interface InvoiceItemSpec {
  description: string;
  amountMinor: number;
  quantity: number;
  eventType: Exclude<LineItemEventType, 'subscription-renewed'>;
  stream: RevenueStream;
}

export interface CreateInvoiceSpec {
  customerId: string;
  subscriptionId?: string | null;
  currency: string;
  items: InvoiceItemSpec[];
  dueAt: Date;
}

export interface BillingCycleOptions {
  signal?: AbortSignal;
  now?: Date;
}

export interface BillingCycleResult {
  processed: string[];
  failed: string[];
  requiresIntervention: string[];
  skipped: string[];
  resumedPauses: number;
  overdueInvoices: number;
  usagePeriodsClosed: number;
}

export interface ClosedUsagePeriod {
  tenantId: string;
  period: string;
  totalMinor: number;
  status: 'billed' | 'no-charge' | 'unpaid' | 'no-payment-method';
}

type RenewalOutcome = 'processed' | 'failed' | 'requires-intervention';

const PERIOD_METADATA_KEYS = ['billingCycle', 'priceMinor', 'listPriceMinor', 'periodStart', 'periodEnd'] as const;

function periodMetadata(
  subscription: Pick<Subscription, 'billingCycle' | 'priceMinor' | 'tierId'>,
  periodStart: Date,
  periodEnd: Date
): Record<string, string> {
  return {
    billingCycle: subscription.billingCycle,
    priceMinor: String(subscription.priceMinor),
    periodStart: periodStart.toISOString(),
    periodEnd: periodEnd.toISOString(),
    tierId: subscription.tierId
  };
}

/** `priceMinor` in period metadata is what was billed; the list price rides along when a discount changed it. */
function listPriceMetadata(listPriceMinor: number, billedPriceMinor: number): Record<string, string> {
  return listPriceMinor === billedPriceMinor ? {} : { listPriceMinor: String(listPriceMinor) };
}

function lineEventId(invoice: Invoice, line: InvoiceLineItem, index: number): string {
  return line.metadata.revenueEventId ?? `invoice:${invoice.id}:${index}`;
}

function streamOf(metadata: Record<string, string>, fallback: RevenueStream): RevenueStream {
  const stream = metadata.stream;
  return stream === 'consumer' || stream === 'white-label' || stream === 'analytics' || stream === 'api' ? stream : fallback;
}

function assertAmount(amountMinor: number, field: string): void {
  if (!Number.isSafeInteger(amountMinor) || amountMinor < 0) {
    throw new AppError(400, 'AMOUNT_INVALID', `${field} must be a non-negative integer amount of minor units.`);
  }
}

/**
 * Drives payments, invoices and the automated renewal cycle. It is the only
 * component that talks to the payment processor, and every settled charge
 * reaches the ledger under an id derived from what was charged.
 */
export class BillingService {
  private readonly paymentLocks = new KeyedMutex();

  public constructor(
    private readonly billingRepository: BillingRepository,
    private readonly subscriptionService: SubscriptionService,
    private readonly usageService: UsageService,
    private readonly ledger: RevenueLedgerService,
    private readonly securityService: SecurityService,
    private readonly auditService: AuditService,
    private readonly paymentProcessor: PaymentProcessor,
    private readonly clock: Clock,
    private readonly config: BillingServiceConfig
  ) {}

  public async createCustomer(
    principal: Principal,
    tenantId: string,
    spec: CreateCustomerSpec,
    context: AuditRequestContext | null = null
  ): Promise<Customer> {
    await this.securityService.authorize('customers.manage', principal, { tenantId, resourceType: 'customer' }, context);

    const customer = await this.billingRepository.createCustomer({
      tenantId,
      email: spec.email.trim(),
      name: spec.name.trim(),
      metadata: spec.metadata ?? {}
    });

    await this.auditService.recordSafely({
      tenantId,
      actorUserId: principal.userId,
      action: 'customer.created',
      targetType: 'customer',
      targetId: customer.id,
      ...context
    });

    return customer;
  }

  public async listCustomers(principal: Principal, tenantId: string, context: AuditRequestContext | null = null): Promise<Customer[]> {
    await this.securityService.authorize('customers.read', principal, { tenantId, resourceType: 'customer' }, context);
    return this.billingRepository.listCustomers(tenantId);
  }

  /** Timeouts and thrown processor errors are ambiguous and come back as `error`. */
  public async processPayment(request: PaymentRequest): Promise<PaymentOutcome> {
    const outcome = await this.attemptCharge(request);
    recordPaymentAttempt({ status: outcome.status });
    return outcome;
  }

  public async startSubscription(
    principal: Principal,
    tenantId: string,
    spec: StartSubscriptionSpec,
    context: AuditRequestContext | null = null
  ): Promise<StartSubscriptionResult> {
    await this.securityService.authorize('subscriptions.manage', principal, { tenantId, resourceType: 'subscription' }, context);

    const setupFeeMinor = spec.setupFeeMinor ?? 0;
    assertAmount(setupFeeMinor, 'setupFeeMinor');

    const events: RevenueEvent[] = [];
    const subscription = await this.subscriptionService.createSubscription(tenantId, spec, async (draft) => {
      const customer = await this.requireCustomer(tenantId, draft.customerId);
      const firstCharge = draft.trialEndsAt === null ? draft.priceMinor : 0;
      const amountMinor = firstCharge + setupFeeMinor;
      if (amountMinor === 0) {
        return;
      }

      const reference = await this.chargeOrThrow({
        amountMinor,
        currency: draft.currency,
        paymentMethodToken: draft.paymentMethodToken,
        idempotencyKey: `start:${draft.id}`,
        customerReference: customer.metadata.processorCustomerId ?? null,
        metadata: { tenantId, subscriptionId: draft.id }
      });

      const common = {
        tenantId,
        currency: draft.currency,
        occurredAt: this.clock.now(),
        stream: draft.stream,
        subscriptionId: draft.id,
        customerId: draft.customerId,
        invoiceId: null,
        source: 'payment-processor' as const
      };

      if (firstCharge > 0) {
        const created = await this.ledger.record({
          ...common,
          id: `created:${draft.id}`,
          type: 'subscription-created',
          amountMinor: firstCharge,
          metadata: {
            ...periodMetadata(draft, draft.currentPeriodStart, draft.currentPeriodEnd),
            processorReference: reference ?? ''
          }
        });
        events.push(created.event);
      }

      if (setupFeeMinor > 0) {
        const setup = await this.ledger.record({
          ...common,
          id: `setup:${draft.id}`,
          type: 'setup-fee',
          amountMinor: setupFeeMinor,
          metadata: { processorReference: reference ?? '' }
        });
        events.push(setup.event);
      }
    });

    await this.auditService.recordSafely({
      tenantId,
      actorUserId: principal.userId,
      action: 'subscription.started',
      targetType: 'subscription',
      targetId: subscription.id,
      metadata: { tierId: subscription.tierId, priceMinor: subscription.priceMinor, setupFeeMinor },
      ...context
    });

    return { subscription, events };
  }

  /** Positive proration is charged; a downgrade is recorded as a signed credit. */
  public async changeSubscriptionTier(
    principal: Principal,
    tenantId: string,
    subscriptionId: string,
    newTierId: string,
    context: AuditRequestContext | null = null
  ): Promise<ChangeTierResult> {
    await this.subscriptionService.authorizeSubscription('subscriptions.manage', principal, tenantId, subscriptionId, context);

    const result = await this.subscriptionService.changeTier(subscriptionId, newTierId, async (settlement) => {
      const { subscription, newTier, newPriceMinor, billedPriceMinor, prorationMinor, changedAt } = settlement;
      const eventId = `proration:${subscription.id}:${changedAt.toISOString()}`;

      let processorReference: string | null = null;
      if (prorationMinor > 0) {
        const customer = await this.requireCustomer(tenantId, subscription.customerId);
        processorReference = await this.chargeOrThrow({
          amountMinor: prorationMinor,
          currency: subscription.currency,
          paymentMethodToken: subscription.paymentMethodToken,
          idempotencyKey: eventId,
          customerReference: customer.metadata.processorCustomerId ?? null,
          metadata: { tenantId, subscriptionId: subscription.id, toTierId: newTier.id }
        });
      }

      const { event } = await this.ledger.record({
        id: eventId,
        tenantId,
        type: 'subscription-prorated',
        amountMinor: prorationMinor,
        currency: subscription.currency,
        occurredAt: changedAt,
        stream: newTier.stream,
        subscriptionId: subscription.id,
        customerId: subscription.customerId,
        invoiceId: null,
        source: prorationMinor > 0 ? 'payment-processor' : 'internal',
        metadata: {
          ...periodMetadata({ ...subscription, tierId: newTier.id, priceMinor: billedPriceMinor }, subscription.currentPeriodStart, subscription.currentPeriodEnd),
          ...listPriceMetadata(newPriceMinor, billedPriceMinor),
          fromTierId: subscription.tierId,
          previousPriceMinor: String(subscription.priceMinor),
          processorReference: processorReference ?? ''
        }
      });

      return event;
    });

    await this.auditService.recordSafely({
      tenantId,
      actorUserId: principal.userId,
      action: 'subscription.tier_changed',
      targetType: 'subscription',
      targetId: subscriptionId,
      metadata: { tierId: result.subscription.tierId, prorationMinor: result.prorationMinor },
      ...context
    });

    return { subscription: result.subscription, prorationMinor: result.prorationMinor, event: result.settled };
  }

  public async chargeOneOff(
    principal: Principal,
    tenantId: string,
    spec: OneOffChargeSpec,
    context: AuditRequestContext | null = null
  ): Promise<RevenueEvent> {
    await this.securityService.authorize('payments.charge', principal, { tenantId, resourceType: 'payment' }, context);
    assertAmount(spec.amountMinor, 'amountMinor');

    const customer = await this.requireCustomer(tenantId, spec.customerId);
    const eventId = `oneoff:${tenantId}:${spec.idempotencyKey}`;
    const currency = normalizeCurrency(spec.currency);

    return this.paymentLocks.runExclusive(eventId, async () => {
      const existing = await this.ledger.findEvent(eventId);
      if (existing !== null) {
        const sameCharge = existing.type === spec.type
          && existing.amountMinor === spec.amountMinor
          && existing.currency === currency
          && existing.customerId === customer.id;
        if (!sameCharge) {
          throw new DuplicateError('REVENUE_EVENT_CONFLICT', 'A different charge was already recorded under this idempotency key.', { eventId });
        }

        return existing;
      }

      const processorReference = await this.chargeOrThrow({
        amountMinor: spec.amountMinor,
        currency,
        paymentMethodToken: spec.paymentMethodToken,
        idempotencyKey: eventId,
        customerReference: customer.metadata.processorCustomerId ?? null,
        metadata: { tenantId, type: spec.type }
      });

      const { event } = await this.ledger.record({
        id: eventId,
        tenantId,
        type: spec.type,
        amountMinor: spec.amountMinor,
        currency,
        occurredAt: this.clock.now(),
        stream: spec.stream,
        subscriptionId: spec.subscriptionId ?? null,
        customerId: customer.id,
        invoiceId: null,
        source: 'payment-processor',
        metadata: { description: spec.description, processorReference: processorReference ?? '' }
      });

      return event;
    });
  }

  /** Refunds are offsetting events; the original is never touched. */
  public async refund(
    principal: Principal,
    tenantId: string,
    spec: RefundSpec,
    context: AuditRequestContext | null = null
  ): Promise<RevenueEvent> {
    await this.securityService.authorize('payments.refund', principal, { tenantId, resourceType: 'revenue_event', resourceId: spec.eventId }, context);

    const original = await this.ledger.findEvent(spec.eventId);
    if (original === null || original.tenantId !== tenantId) {
      throw new NotFoundError('REVENUE_EVENT_NOT_FOUND', 'Revenue event not found in this tenant.');
    }

    const processorReference = original.metadata.processorReference;
    if (original.amountMinor <= 0 || processorReference === undefined || processorReference.length === 0) {
      throw new AppError(400, 'REFUND_NOT_APPLICABLE', 'Only settled charges can be refunded.');
    }

    const eventId = `refund:${original.id}:${spec.idempotencyKey}`;
    const { event, replayed } = await this.paymentLocks.runExclusive(`refund:${original.id}`, async () => {
      const existing = await this.ledger.findEvent(eventId);
      if (existing !== null) {
        if (spec.amountMinor !== undefined && -existing.amountMinor !== spec.amountMinor) {
          throw new DuplicateError('REVENUE_EVENT_CONFLICT', 'A different refund was already recorded under this idempotency key.', { eventId });
        }

        return { event: existing, replayed: true };
      }

      const previous = (await this.ledger.query({ tenantId, types: ['refund'] }))
        .filter((refund) => refund.metadata.refundOf === original.id);
      const refundedMinor = previous.reduce((total, refund) => total - refund.amountMinor, 0);
      const refundable = original.amountMinor - refundedMinor;
      const amountMinor = spec.amountMinor ?? refundable;
      if (!Number.isSafeInteger(amountMinor) || amountMinor <= 0 || amountMinor > refundable) {
        throw new AppError(400, 'REFUND_AMOUNT_INVALID', 'The refund must be positive and within the refundable remainder.', { refundable });
      }

      const result = await this.paymentProcessor.refund({
        processorReference,
        amountMinor,
        currency: original.currency,
        idempotencyKey: eventId
      });
      recordPaymentAttempt({ status: result.status, kind: 'refund' });

      if (result.status !== 'succeeded') {
        throw new PaymentProcessorError('The refund was not confirmed by the payment processor.', result.processorReference);
      }

      const recorded = await this.ledger.record({
        id: eventId,
        tenantId,
        type: 'refund',
        amountMinor: -amountMinor,
        currency: original.currency,
        occurredAt: this.clock.now(),
        stream: streamOf(original.metadata, 'consumer'),
        subscriptionId: original.subscriptionId,
        customerId: original.customerId,
        invoiceId: original.invoiceId,
        source: 'payment-processor',
        metadata: { refundOf: original.id, reason: spec.reason, processorReference: result.processorReference ?? '' }
      });

      return { event: recorded.event, replayed: false };
    });

    if (replayed) {
      return event;
    }

    await this.auditService.recordSafely({
      tenantId,
      actorUserId: principal.userId,
      action: 'payment.refunded',
      targetType: 'revenue_event',
      targetId: original.id,
      metadata: { amountMinor: -event.amountMinor, reason: spec.reason },
      ...context
    });

    return event;
  }

  public async createInvoice(
    principal: Principal,
    tenantId: string,
    spec: CreateInvoiceSpec,
    context: AuditRequestContext | null = null
  ): Promise<Invoice> {
    await this.securityService.authorize('invoices.manage', principal, { tenantId, resourceType: 'invoice' }, context);

    if (spec.items.length === 0) {
      throw new AppError(400, 'INVOICE_EMPTY', 'Invoices need at least one line item.');
    }

    const customer = await this.requireCustomer(tenantId, spec.customerId);
    const currency = normalizeCurrency(spec.currency);
    const lineItems = spec.items.map((item): InvoiceLineItem => {
      assertAmount(item.amountMinor, 'amountMinor');
      if (!Number.isInteger(item.quantity) || item.quantity < 1) {
        throw new AppError(400, 'QUANTITY_INVALID', 'Quantities are positive integers.');
      }

      return {
        description: item.description,
        amountMinor: item.amountMinor,
        currency,
        quantity: item.quantity,
        eventType: item.eventType,
        metadata: { stream: item.stream }
      };
    });

    const invoice = await this.billingRepository.createInvoice({
      tenantId,
      customerId: customer.id,
      subscriptionId: spec.subscriptionId ?? null,
      currency,
      lineItems,
      dueAt: spec.dueAt
    });

    await this.auditService.recordSafely({
      tenantId,
      actorUserId: principal.userId,
      action: 'invoice.created',
      targetType: 'invoice',
      targetId: invoice.id,
      metadata: { totalMinor: invoice.totalMinor, currency },
      ...context
    });

    return invoice;
  }

  public async listInvoices(
    principal: Principal,
    tenantId: string,
    statuses?: readonly InvoiceStatus[],
    context: AuditRequestContext | null = null
  ): Promise<Invoice[]> {
    await this.securityService.authorize('invoices.read', principal, { tenantId, resourceType: 'invoice' }, context);
    return this.billingRepository.listInvoices(tenantId, statuses);
  }

  public async sendInvoice(
    principal: Principal,
    tenantId: string,
    invoiceId: string,
    context: AuditRequestContext | null = null
  ): Promise<Invoice> {
    const invoice = await this.authorizeInvoice('invoices.manage', principal, tenantId, invoiceId, context);
    if (invoice.status !== 'draft') {
      throw new InvalidStateTransition('invoice', invoice.status, 'sent');
    }

    return this.updateInvoice(invoice, { status: 'sent', sentAt: this.clock.now() });
  }

  /** Settles a sent or overdue invoice; each line item becomes one revenue event. */
  public async payInvoice(
    principal: Principal,
    tenantId: string,
    invoiceId: string,
    paymentMethodToken: string,
    context: AuditRequestContext | null = null
  ): Promise<Invoice> {
    const invoice = await this.authorizeInvoice('payments.charge', principal, tenantId, invoiceId, context);
    if (invoice.status !== 'sent' && invoice.status !== 'overdue') {
      throw new InvalidStateTransition('invoice', invoice.status, 'paid');
    }

    const customer = await this.requireCustomer(tenantId, invoice.customerId);
    const processorReference = await this.chargeOrThrow({
      amountMinor: invoice.totalMinor,
      currency: invoice.currency,
      paymentMethodToken,
      idempotencyKey: `invoice:${invoice.id}`,
      customerReference: customer.metadata.processorCustomerId ?? null,
      metadata: { tenantId, invoiceId: invoice.id }
    });

    const paid = await this.settleInvoice(invoice, processorReference);
    await this.auditService.recordSafely({
      tenantId,
      actorUserId: principal.userId,
      action: 'invoice.paid',
      targetType: 'invoice',
      targetId: invoice.id,
      metadata: { totalMinor: invoice.totalMinor },
      ...context
    });

    return paid;
  }

  public async markOverdueInvoices(now: Date = this.clock.now()): Promise<Invoice[]> {
    const due = await this.billingRepository.listSentInvoicesDueBefore(now);
    const marked: Invoice[] = [];

    for (const invoice of due) {
      try {
        marked.push(await this.updateInvoice(invoice, { status: 'overdue', overdueAt: now }));
      } catch (error) {
        console.error('invoice_overdue_failed', {
          invoiceId: invoice.id,
          tenantId: invoice.tenantId,
          error: error instanceof Error ? error.message : 'unknown'
        });
      }
    }

    return marked;
  }

  /**
   * One pass over due renewals. Subscriptions are processed in parallel
   * batches; an aborted signal stops new subscriptions from starting and
   * reports them as skipped, as are renewals of tenants that are not active.
   */
  public async runAutomatedBillingCycle(options: BillingCycleOptions = {}): Promise<BillingCycleResult> {
    const now = options.now ?? this.clock.now();
    const resumed = await this.subscriptionService.resumeExpiredPauses(now);
    const overdue = await this.markOverdueInvoices(now);
    const { billable, held } = await this.partitionByTenantStatus(await this.subscriptionService.listDueForRenewal(now));

    const run = await runBounded(
      billable,
      this.config.concurrency,
      async (subscription) => this.renewSafely(subscription, now),
      options.signal
    );

    const idsWith = (outcome: RenewalOutcome): string[] => run.completed
      .filter(({ result }) => result === outcome)
      .map(({ item }) => item.id);

    const closed = options.signal?.aborted === true ? [] : await this.closeUsagePeriods(now);

    const result: BillingCycleResult = {
      processed: idsWith('processed'),
      failed: idsWith('failed'),
      requiresIntervention: idsWith('requires-intervention'),
      skipped: [...held, ...run.skipped].map((subscription) => subscription.id),
      resumedPauses: resumed.length,
      overdueInvoices: overdue.length,
      usagePeriodsClosed: closed.length
    };

    recordBillingCycleResult('processed', result.processed.length);
    recordBillingCycleResult('failed', result.failed.length + result.requiresIntervention.length);
    recordBillingCycleResult('skipped', result.skipped.length);
    console.log('billing_cycle_completed', {
      processed: result.processed.length,
      failed: result.failed.length,
      requiresIntervention: result.requiresIntervention.length,
      skipped: result.skipped.length,
      aborted: options.signal?.aborted === true
    });

    return result;
  }

  public async runBillingCycleFor(principal: Principal, options: BillingCycleOptions = {}): Promise<BillingCycleResult> {
    await this.securityService.authorizePlatform('billing.run_cycle', principal);
    return this.runAutomatedBillingCycle(options);
  }

  /**
   * Bills closed usage periods of tenants with no current subscription,
   * charging the customer of the tenant's most recent subscription.
   * Tenants with a current subscription are billed with its renewal.
   */
  public async closeUsagePeriods(now: Date = this.clock.now()): Promise<ClosedUsagePeriod[]> {
    const unbilled = await this.usageService.listUnbilledPeriods(now);
    const closed: ClosedUsagePeriod[] = [];

    for (const { tenantId, period } of unbilled) {
      try {
        const outcome = await this.closeUsagePeriod(tenantId, period, now);
        if (outcome !== null) {
          closed.push(outcome);
        }
      } catch (error) {
        console.error('usage_period_close_failed', {
          tenantId,
          period,
          error: error instanceof Error ? error.message : 'unknown'
        });
      }
    }

    return closed;
  }

  private async closeUsagePeriod(tenantId: string, period: string, now: Date): Promise<ClosedUsagePeriod | null> {
    if ((await this.subscriptionService.listCurrentSubscriptions(tenantId)).length > 0) {
      return null;
    }

    const statement = await this.usageService.calculateOverage(tenantId, period);
    if (statement.totalMinor === 0) {
      await this.usageService.markPeriodBilled(tenantId, period, null);
      return { tenantId, period, totalMinor: 0, status: 'no-charge' };
    }

    const latest = (await this.subscriptionService.listAllSubscriptions(tenantId)).at(-1);
    if (latest === undefined) {
      console.warn('usage_overage_unbillable', { tenantId, period, totalMinor: statement.totalMinor });
      return { tenantId, period, totalMinor: statement.totalMinor, status: 'no-payment-method' };
    }

    const invoice = await this.openInvoice(latest, this.usageLines([statement], latest.stream), now);
    const outcome = await this.chargeWithRetries({
      amountMinor: invoice.totalMinor,
      currency: invoice.currency,
      paymentMethodToken: latest.paymentMethodToken,
      idempotencyKey: `usage:${tenantId}:${period}`,
      metadata: { tenantId, invoiceId: invoice.id, usagePeriod: period }
    });

    if (outcome.status === 'succeeded') {
      await this.settleInvoice(invoice, outcome.processorReference);
      return { tenantId, period, totalMinor: statement.totalMinor, status: 'billed' };
    }

    console.warn('usage_overage_unpaid', { tenantId, period, invoiceId: invoice.id, status: outcome.status });
    return { tenantId, period, totalMinor: statement.totalMinor, status: 'unpaid' };
  }

  private async partitionByTenantStatus(due: readonly Subscription[]): Promise<{ billable: Subscription[]; held: Subscription[] }> {
    const activeByTenant = new Map<string, boolean>();
    const billable: Subscription[] = [];
    const held: Subscription[] = [];

    for (const subscription of due) {
      let active = activeByTenant.get(subscription.tenantId);
      if (active === undefined) {
        active = await this.securityService.tenantIsActive(subscription.tenantId);
        activeByTenant.set(subscription.tenantId, active);
      }

      if (active) {
        billable.push(subscription);
      } else {
        console.warn('billing_renewal_held', { subscriptionId: subscription.id, tenantId: subscription.tenantId });
        held.push(subscription);
      }
    }

    return { billable, held };
  }

  private async renewSafely(subscription: Subscription, now: Date): Promise<RenewalOutcome> {
    try {
      return await this.renew(subscription, now);
    } catch (error) {
      console.error('billing_renewal_failed', {
        subscriptionId: subscription.id,
        tenantId: subscription.tenantId,
        error: error instanceof Error ? error.message : 'unknown'
      });
      return 'failed';
    }
  }

  private async renew(subscription: Subscription, now: Date): Promise<RenewalOutcome> {
    const invoice = await this.renewalInvoice(subscription, now);

    // A retry after an ambiguous outcome must reuse the key of the attempt it repeats.
    const { failedAttempts, lastFailureReason } = subscription.dunning;
    const attempt = failedAttempts > 0 && lastFailureReason === AMBIGUOUS_FAILURE ? failedAttempts : failedAttempts + 1;
    const periodKey = `${subscription.id}:${subscription.currentPeriodEnd.toISOString()}`;

    const outcome: PaymentOutcome = invoice.totalMinor === 0
      ? { status: 'succeeded', processorReference: null }
      : await this.chargeWithRetries({
          amountMinor: invoice.totalMinor,
          currency: invoice.currency,
          paymentMethodToken: subscription.paymentMethodToken,
          idempotencyKey: `renewal:${periodKey}:attempt-${attempt}`,
          metadata: { tenantId: subscription.tenantId, subscriptionId: subscription.id, invoiceId: invoice.id }
        });

    if (outcome.status === 'succeeded') {
      await this.settleInvoice(invoice, outcome.processorReference);
      await this.subscriptionService.advancePeriod(subscription.id, subscription.currentPeriodEnd);
      return 'processed';
    }

    const failed = await this.subscriptionService.recordPaymentFailure(subscription.id, {
      reason: outcome.status === 'declined' ? outcome.reason : AMBIGUOUS_FAILURE,
      invoiceId: invoice.id,
      maxAttempts: this.config.maxAttempts,
      retryBaseMinutes: this.config.retryBaseMinutes
    });

    if (failed.dunning.requiresManualIntervention) {
      await this.updateInvoice(invoice, { status: 'overdue', overdueAt: now });
      return 'requires-intervention';
    }

    return 'failed';
  }

  /** The open dunning invoice when retrying, otherwise a new sent invoice for the next period. */
  private async renewalInvoice(subscription: Subscription, now: Date): Promise<Invoice> {
    const dunningInvoiceId = subscription.dunning.invoiceId;
    if (dunningInvoiceId !== null) {
      const open = await this.billingRepository.findInvoiceById(dunningInvoiceId);
      if (open !== null && (open.status === 'sent' || open.status === 'overdue')) {
        return open;
      }
    }

    const periodStart = subscription.currentPeriodEnd;
    const periodEnd = addBillingCycle(periodStart, subscription.billingCycle);
    const billedPriceMinor = discountedPriceMinor(subscription, periodStart);
    const lines: InvoiceLineItem[] = [{
      description: `${subscription.tierId} ${subscription.billingCycle} renewal`,
      amountMinor: billedPriceMinor,
      currency: subscription.currency,
      quantity: 1,
      eventType: 'subscription-renewed',
      metadata: {
        ...periodMetadata({ ...subscription, priceMinor: billedPriceMinor }, periodStart, periodEnd),
        ...listPriceMetadata(subscription.priceMinor, billedPriceMinor),
        stream: subscription.stream,
        revenueEventId: `renewal:${subscription.id}:${periodStart.toISOString()}`
      }
    }];

    if (await this.isPrimarySubscription(subscription)) {
      const statements = (await this.usageService.pendingOverage(subscription.tenantId, now))
        .filter((statement) => statement.currency === subscription.currency);
      lines.push(...this.usageLines(statements, subscription.stream));
    }

    return this.openInvoice(subscription, lines, now);
  }

  /** Overage is billed once per tenant, on its oldest current subscription. */
  private async isPrimarySubscription(subscription: Subscription): Promise<boolean> {
    const [primary] = await this.subscriptionService.listCurrentSubscriptions(subscription.tenantId);
    return primary?.id === subscription.id;
  }

  /** Zero-amount periods are carried as zero lines so settling marks them billed. */
  private usageLines(statements: readonly OverageStatement[], stream: RevenueStream): InvoiceLineItem[] {
    return statements.map((statement) => ({
      description: `Usage overage ${statement.period}`,
      amountMinor: statement.totalMinor,
      currency: statement.currency,
      quantity: 1,
      eventType: 'usage-charge',
      metadata: {
        stream,
        usagePeriod: statement.period,
        revenueEventId: `usage:${statement.tenantId}:${statement.period}`
      }
    }));
  }

  private async openInvoice(subscription: Subscription, lineItems: InvoiceLineItem[], now: Date): Promise<Invoice> {
    const retryWindowMinutes = this.config.retryBaseMinutes * (2 ** this.config.maxAttempts - 1);
    const draft = await this.billingRepository.createInvoice({
      tenantId: subscription.tenantId,
      customerId: subscription.customerId,
      subscriptionId: subscription.id,
      currency: subscription.currency,
      lineItems,
      dueAt: addMinutes(now, retryWindowMinutes)
    });

    return this.updateInvoice(draft, { status: 'sent', sentAt: now });
  }

  /**
   * Marks the invoice paid and appends one event per line. Usage periods
   * on the invoice are marked billed; a dunning invoice of a subscription
   * also rolls its period forward.
   */
  private async settleInvoice(invoice: Invoice, processorReference: string | null): Promise<Invoice> {
    const paidAt = this.clock.now();
    const subscription = invoice.subscriptionId === null
      ? null
      : await this.subscriptionService.findSubscription(invoice.subscriptionId);

    for (const [index, line] of invoice.lineItems.entries()) {
      const eventId = lineEventId(invoice, line, index);
      const isRecurring = line.eventType === 'subscription-renewed';
      const metadata: Record<string, string> = { description: line.description, processorReference: processorReference ?? '' };
      for (const key of isRecurring ? PERIOD_METADATA_KEYS : []) {
        const value = line.metadata[key];
        if (value !== undefined) {
          metadata[key] = value;
        }
      }

      const usagePeriod = line.metadata.usagePeriod;
      if (usagePeriod !== undefined) {
        metadata.usagePeriod = usagePeriod;
      }

      if (line.amountMinor * line.quantity > 0 || isRecurring) {
        await this.ledger.record({
          id: eventId,
          tenantId: invoice.tenantId,
          type: line.eventType,
          amountMinor: line.amountMinor * line.quantity,
          currency: invoice.currency,
          occurredAt: paidAt,
          stream: streamOf(line.metadata, subscription?.stream ?? 'consumer'),
          subscriptionId: invoice.subscriptionId,
          customerId: invoice.customerId,
          invoiceId: invoice.id,
          source: processorReference === null ? 'internal' : 'payment-processor',
          metadata
        });
      }

      if (usagePeriod !== undefined) {
        await this.usageService.markPeriodBilled(invoice.tenantId, usagePeriod, line.amountMinor > 0 ? eventId : null);
      }
    }

    const paid = await this.updateInvoice(invoice, { status: 'paid', paidAt, processorReference });

    if (subscription !== null && subscription.status === 'active' && subscription.dunning.invoiceId === invoice.id) {
      await this.subscriptionService.advancePeriod(subscription.id, subscription.currentPeriodEnd);
    }

    console.log('invoice_paid', { invoiceId: invoice.id, tenantId: invoice.tenantId, totalMinor: invoice.totalMinor });
    return paid;
  }

  private async chargeOrThrow(request: PaymentRequest): Promise<string | null> {
    const outcome = await this.chargeWithRetries(request);
    if (outcome.status === 'declined') {
      throw new PaymentDeclined(outcome.reason, outcome.processorReference);
    }

    if (outcome.status === 'error') {
      throw new PaymentProcessorError(outcome.message);
    }

    return outcome.processorReference;
  }

  /** Ambiguous outcomes are retried under the same idempotency key. */
  private async chargeWithRetries(request: PaymentRequest): Promise<PaymentOutcome> {
    let outcome = await this.processPayment(request);
    for (let retry = 0; outcome.status === 'error' && retry < this.config.ambiguousRetries; retry += 1) {
      outcome = await this.processPayment(request);
    }

    return outcome;
  }

  private async attemptCharge(request: PaymentRequest): Promise<PaymentOutcome> {
    try {
      const result = await withTimeout(this.paymentProcessor.charge({
        amountMinor: request.amountMinor,
        currency: normalizeCurrency(request.currency),
        paymentMethodToken: request.paymentMethodToken,
        customerReference: request.customerReference ?? null,
        idempotencyKey: request.idempotencyKey,
        metadata: request.metadata
      }), this.config.paymentTimeoutMs);

      if (result.status === 'succeeded') {
        return { status: 'succeeded', processorReference: result.processorReference };
      }

      if (result.status === 'declined') {
        return { status: 'declined', reason: result.declineReason ?? 'declined', processorReference: result.processorReference };
      }

      return { status: 'error', message: 'The payment processor reported an error.' };
    } catch (error) {
      const message = error instanceof TimeoutError
        ? `No answer from the payment processor within ${error.timeoutMs}ms.`
        : error instanceof Error ? error.message : 'unknown';

      console.warn('payment_attempt_ambiguous', { idempotencyKey: request.idempotencyKey, error: message });
      return { status: 'error', message };
    }
  }

  private async requireCustomer(tenantId: string, customerId: string): Promise<Customer> {
    const customer = await this.billingRepository.findCustomerById(customerId);
    if (customer === null || customer.tenantId !== tenantId) {
      throw new NotFoundError('CUSTOMER_NOT_FOUND', 'Customer not found in this tenant.');
    }

    return customer;
  }

  private async authorizeInvoice(
    action: 'invoices.manage' | 'payments.charge',
    principal: Principal,
    tenantId: string,
    invoiceId: string,
    context: AuditRequestContext | null
  ): Promise<Invoice> {
    const invoice = await this.billingRepository.findInvoiceById(invoiceId);
    if (invoice === null) {
      throw new NotFoundError('INVOICE_NOT_FOUND', 'Invoice not found.');
    }

    await this.securityService.authorize(action, principal, { tenantId: invoice.tenantId, resourceType: 'invoice', resourceId: invoice.id }, context);
    if (invoice.tenantId !== tenantId) {
      throw new NotFoundError('INVOICE_NOT_FOUND', 'Invoice not found.');
    }

    return invoice;
  }

  private async updateInvoice(invoice: Invoice, changes: InvoiceChanges): Promise<Invoice> {
    const updated = await this.billingRepository.updateInvoice({
      invoiceId: invoice.id,
      expectedVersion: invoice.version,
      changes
    });

    if (updated === null) {
      throw new NotFoundError('INVOICE_NOT_FOUND', 'Invoice not found.');
    }

    return updated;
  }
}
