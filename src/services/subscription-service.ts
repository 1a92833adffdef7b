import { randomUUID } from 'node:crypto';

import type { Principal } from '../auth/auth-context.js';
import { KeyedMutex } from '../concurrency/keyed-mutex.js';
import { addDays, addMinutes, wholeDaysBetween, type Clock } from '../domain/clock.js';
import { calculateDiscountedAmount, type DiscountKind } from '../domain/discounts.js';
import { prorate } from '../domain/money.js';
import { addBillingCycle, type BillingCycle, type SubscriptionTier, type TierCatalog } from '../domain/tier-catalog.js';
import { AppError } from '../errors/app-error.js';
import { DuplicateError, InvalidStateTransition, NotFoundError } from '../errors/domain-errors.js';
import type { BillingRepository } from '../repositories/billing-repository.js';
import {
  emptyDunningState,
  type CancellationReason,
  type CreateSubscriptionInput,
  type ListSubscriptionsFilter,
  type Subscription,
  type SubscriptionChanges,
  type SubscriptionDiscount,
  type SubscriptionRepository,
  type SubscriptionStatus
} from '../repositories/subscription-repository.js';
import type { AuditRequestContext, AuditService } from './audit-service.js';
import type { SecurityService } from './security-service.js';

const SUBSCRIPTION_TRANSITIONS: Record<SubscriptionStatus, readonly SubscriptionStatus[]> = {
  active: ['paused', 'canceled'],
  paused: ['active', 'canceled'],
  canceled: []
};

export const MAX_PAUSE_DAYS = 365;

export const MAX_DISCOUNTS_PER_SUBSCRIPTION = 5;

export interface CreateSubscriptionSpec {
  id?: string;
  customerId: string;
  tierId: string;
  billingCycle: BillingCycle;
  paymentMethodToken: string;
  /** Overrides the catalog price, e.g. for negotiated contracts. */
  priceMinor?: number;
  trialDays?: number;
}

export type SubscriptionDraft = CreateSubscriptionInput & { id: string };

export interface ApplyDiscountSpec {
  name: string;
  kind: DiscountKind;
  value: number;
  /** Defaults to now. */
  validFrom?: Date;
  validUntil?: Date | null;
}

export interface TierChangeSettlement {
  subscription: Subscription;
  newTier: SubscriptionTier;
  newPriceMinor: number;
  /** `newPriceMinor` after the subscription's discounts. */
  billedPriceMinor: number;
  prorationMinor: number;
  changedAt: Date;
}

export interface TierChangeResult<T> {
  subscription: Subscription;
  previousPriceMinor: number;
  prorationMinor: number;
  settled: T;
}

export interface PaymentFailureInput {
  reason: string;
  invoiceId: string | null;
  maxAttempts: number;
  retryBaseMinutes: number;
}

/** `base × 2^(attempt − 1)` minutes after the failed attempt. */
export function nextRetryAt(failedAt: Date, attempt: number, retryBaseMinutes: number): Date {
  return addMinutes(failedAt, retryBaseMinutes * 2 ** (attempt - 1));
}

/** What the subscription charges for a period starting at `at`. */
export function discountedPriceMinor(subscription: Pick<Subscription, 'priceMinor' | 'discounts'>, at: Date): number {
  return calculateDiscountedAmount(subscription.priceMinor, subscription.discounts, at);
}

function assertDiscountTerms(spec: ApplyDiscountSpec, validFrom: Date): void {
  const valueValid = spec.kind === 'percentage'
    ? Number.isFinite(spec.value) && spec.value > 0 && spec.value <= 100
    : Number.isSafeInteger(spec.value) && spec.value > 0;
  if (!valueValid) {
    throw new AppError(400, 'DISCOUNT_INVALID', 'Percentage discounts are above 0 and at most 100; fixed discounts are positive integer minor units.');
  }

  if (spec.validUntil !== undefined && spec.validUntil !== null && spec.validUntil.getTime() <= validFrom.getTime()) {
    throw new AppError(400, 'DISCOUNT_INVALID', 'validUntil must fall after validFrom.');
  }
}

/**
 * Lifecycle of per-tenant subscriptions. Transitions on one subscription are
 * serialized by a keyed mutex in-process and by the stored `version` across
 * processes; different subscriptions never wait on each other.
 */
export class SubscriptionService {
  private readonly locks = new KeyedMutex();

  public constructor(
    private readonly repository: SubscriptionRepository,
    private readonly billingRepository: BillingRepository,
    private readonly tierCatalog: TierCatalog,
    private readonly securityService: SecurityService,
    private readonly auditService: AuditService,
    private readonly clock: Clock
  ) {}

  /**
   * `settle` runs after validation and before the subscription is stored,
   * serialized per (tenant, customer, tier family); when it throws, nothing is created.
   */
  public async createSubscription(
    tenantId: string,
    spec: CreateSubscriptionSpec,
    settle: (draft: SubscriptionDraft) => Promise<void> = async () => undefined
  ): Promise<Subscription> {
    const tier = this.requireTier(spec.tierId);
    const customer = await this.billingRepository.findCustomerById(spec.customerId);
    if (customer === null || customer.tenantId !== tenantId) {
      throw new NotFoundError('CUSTOMER_NOT_FOUND', 'Customer not found in this tenant.');
    }

    const priceMinor = spec.priceMinor ?? tier.priceMinor[spec.billingCycle];
    if (!Number.isSafeInteger(priceMinor) || priceMinor < 0) {
      throw new AppError(400, 'SUBSCRIPTION_PRICE_INVALID', 'Subscription prices are non-negative integer minor units.');
    }

    return this.locks.runExclusive(`create:${tenantId}:${customer.id}:${tier.family}`, async () => {
      const holding = await this.repository.listSubscriptions(tenantId, { customerId: customer.id, statuses: ['active', 'paused'] });
      const conflict = holding.find((subscription) => subscription.tierFamily === tier.family);
      if (conflict !== undefined) {
        throw new DuplicateError('SUBSCRIPTION_ALREADY_ACTIVE', `Customer already holds a ${tier.family} subscription.`, {
          subscriptionId: conflict.id
        });
      }

      const now = this.clock.now();
      const trialEndsAt = spec.trialDays === undefined || spec.trialDays === 0 ? null : addDays(now, spec.trialDays);
      const draft: SubscriptionDraft = {
        id: spec.id ?? randomUUID(),
        tenantId,
        customerId: customer.id,
        tierId: tier.id,
        tierFamily: tier.family,
        billingCycle: spec.billingCycle,
        priceMinor,
        currency: tier.currency,
        stream: tier.stream,
        paymentMethodToken: spec.paymentMethodToken,
        status: 'active',
        trialEndsAt,
        currentPeriodStart: now,
        currentPeriodEnd: trialEndsAt ?? addBillingCycle(now, spec.billingCycle),
        pausedAt: null,
        pauseResumesAt: null,
        canceledAt: null,
        cancellationReason: null,
        dunning: emptyDunningState(),
        discounts: []
      };

      await settle(draft);
      const subscription = await this.repository.createSubscription(draft);

      console.log('subscription_created', {
        subscriptionId: subscription.id,
        tenantId,
        tierId: tier.id,
        priceMinor,
        trialEndsAt
      });

      return subscription;
    });
  }

  public async getSubscription(
    principal: Principal,
    tenantId: string,
    subscriptionId: string,
    context: AuditRequestContext | null = null
  ): Promise<Subscription> {
    return this.authorizeSubscription('subscriptions.read', principal, tenantId, subscriptionId, context);
  }

  public async listSubscriptions(
    principal: Principal,
    tenantId: string,
    filter: ListSubscriptionsFilter = {},
    context: AuditRequestContext | null = null
  ): Promise<Subscription[]> {
    await this.securityService.authorize('subscriptions.read', principal, { tenantId, resourceType: 'subscription' }, context);
    return this.repository.listSubscriptions(tenantId, filter);
  }

  public async findSubscription(subscriptionId: string): Promise<Subscription | null> {
    return this.repository.findSubscriptionById(subscriptionId);
  }

  public listDueForRenewal(now: Date): Promise<Subscription[]> {
    return this.repository.listDueForRenewal(now);
  }

  /** Active and paused subscriptions of a tenant, oldest first. */
  public listCurrentSubscriptions(tenantId: string): Promise<Subscription[]> {
    return this.repository.listSubscriptions(tenantId, { statuses: ['active', 'paused'] });
  }

  public listAllSubscriptions(tenantId: string): Promise<Subscription[]> {
    return this.repository.listSubscriptions(tenantId);
  }

  /**
   * Moves to another tier of the same family. `settle` runs inside the
   * subscription lock before the change is stored; when it throws, nothing changes.
   */
  public async changeTier<T>(
    subscriptionId: string,
    newTierId: string,
    settle: (settlement: TierChangeSettlement) => Promise<T>
  ): Promise<TierChangeResult<T>> {
    return this.locks.runExclusive(subscriptionId, async () => {
      const subscription = await this.requireSubscription(subscriptionId);
      if (subscription.status !== 'active') {
        throw new InvalidStateTransition('subscription', subscription.status, 'active');
      }

      const newTier = this.requireTier(newTierId);
      if (newTier.family !== subscription.tierFamily || newTier.currency !== subscription.currency) {
        throw new AppError(400, 'TIER_FAMILY_MISMATCH', 'Tier changes stay within the subscription\'s tier family and currency.');
      }

      if (newTier.id === subscription.tierId) {
        throw new AppError(400, 'TIER_UNCHANGED', 'The subscription is already on this tier.');
      }

      const changedAt = this.clock.now();
      const newPriceMinor = newTier.priceMinor[subscription.billingCycle];
      // Nothing was paid for a trial, so there is nothing to prorate against.
      const inTrial = subscription.trialEndsAt !== null && subscription.trialEndsAt.getTime() > changedAt.getTime();
      const billedPriceMinor = calculateDiscountedAmount(newPriceMinor, subscription.discounts, changedAt);
      const prorationMinor = inTrial ? 0 : prorate(
        discountedPriceMinor(subscription, changedAt),
        billedPriceMinor,
        wholeDaysBetween(changedAt, subscription.currentPeriodEnd),
        wholeDaysBetween(subscription.currentPeriodStart, subscription.currentPeriodEnd)
      );

      const settled = await settle({ subscription, newTier, newPriceMinor, billedPriceMinor, prorationMinor, changedAt });

      const updated = await this.update(subscription, {
        tierId: newTier.id,
        priceMinor: newPriceMinor,
        stream: newTier.stream
      });

      console.log('subscription_tier_changed', {
        subscriptionId,
        tenantId: subscription.tenantId,
        fromTierId: subscription.tierId,
        toTierId: newTier.id,
        prorationMinor
      });

      return { subscription: updated, previousPriceMinor: subscription.priceMinor, prorationMinor, settled };
    });
  }

  public async applyDiscount(
    principal: Principal,
    tenantId: string,
    subscriptionId: string,
    spec: ApplyDiscountSpec,
    context: AuditRequestContext | null = null
  ): Promise<{ subscription: Subscription; discount: SubscriptionDiscount }> {
    await this.authorizeSubscription('subscriptions.manage', principal, tenantId, subscriptionId, context);

    const appliedAt = this.clock.now();
    const validFrom = spec.validFrom ?? appliedAt;
    assertDiscountTerms(spec, validFrom);

    const discount: SubscriptionDiscount = {
      id: randomUUID(),
      name: spec.name.trim(),
      kind: spec.kind,
      value: spec.value,
      validFrom,
      validUntil: spec.validUntil ?? null,
      appliedAt
    };

    const subscription = await this.locks.runExclusive(subscriptionId, async () => {
      const current = await this.requireSubscription(subscriptionId);
      if (current.status === 'canceled') {
        throw new AppError(409, 'SUBSCRIPTION_CANCELED', 'Canceled subscriptions take no discounts.');
      }

      if (current.discounts.length >= MAX_DISCOUNTS_PER_SUBSCRIPTION) {
        throw new AppError(409, 'DISCOUNT_LIMIT_REACHED', `A subscription carries at most ${MAX_DISCOUNTS_PER_SUBSCRIPTION} discounts.`);
      }

      return this.update(current, { discounts: [...current.discounts, discount] });
    });

    console.log('subscription_discount_applied', {
      subscriptionId,
      tenantId: subscription.tenantId,
      discountId: discount.id,
      kind: discount.kind,
      value: discount.value
    });

    await this.audit(principal, subscription, 'subscription.discount_applied', {
      discountId: discount.id,
      kind: discount.kind,
      value: discount.value
    }, context);

    return { subscription, discount };
  }

  public async removeDiscount(
    principal: Principal,
    tenantId: string,
    subscriptionId: string,
    discountId: string,
    context: AuditRequestContext | null = null
  ): Promise<Subscription> {
    await this.authorizeSubscription('subscriptions.manage', principal, tenantId, subscriptionId, context);

    const subscription = await this.locks.runExclusive(subscriptionId, async () => {
      const current = await this.requireSubscription(subscriptionId);
      const remaining = current.discounts.filter((discount) => discount.id !== discountId);
      if (remaining.length === current.discounts.length) {
        throw new NotFoundError('DISCOUNT_NOT_FOUND', 'Discount not found on this subscription.');
      }

      return this.update(current, { discounts: remaining });
    });

    console.log('subscription_discount_removed', { subscriptionId, tenantId: subscription.tenantId, discountId });
    await this.audit(principal, subscription, 'subscription.discount_removed', { discountId }, context);
    return subscription;
  }

  public async pauseSubscription(
    principal: Principal,
    tenantId: string,
    subscriptionId: string,
    durationDays: number,
    context: AuditRequestContext | null = null
  ): Promise<Subscription> {
    if (!Number.isInteger(durationDays) || durationDays < 1 || durationDays > MAX_PAUSE_DAYS) {
      throw new AppError(400, 'PAUSE_DURATION_INVALID', `Pauses last between 1 and ${MAX_PAUSE_DAYS} days.`);
    }

    await this.authorizeSubscription('subscriptions.manage', principal, tenantId, subscriptionId, context);

    const paused = await this.transition(subscriptionId, 'paused', () => {
      const now = this.clock.now();
      return { pausedAt: now, pauseResumesAt: addDays(now, durationDays) };
    });

    await this.audit(principal, paused, 'subscription.paused', { durationDays }, context);
    return paused;
  }

  public async resumeSubscription(
    principal: Principal,
    tenantId: string,
    subscriptionId: string,
    context: AuditRequestContext | null = null
  ): Promise<Subscription> {
    await this.authorizeSubscription('subscriptions.manage', principal, tenantId, subscriptionId, context);

    const resumed = await this.transition(subscriptionId, 'active', (subscription) => this.resumeChanges(subscription, this.clock.now()));
    await this.audit(principal, resumed, 'subscription.resumed', {}, context);
    return resumed;
  }

  /** Resumes every pause whose duration has run out, as of its scheduled end. A failed resume is logged and left for the next run. */
  public async resumeExpiredPauses(now: Date = this.clock.now()): Promise<Subscription[]> {
    const due = await this.repository.listPausesDueToResume(now);
    const resumed: Subscription[] = [];

    for (const candidate of due) {
      try {
        resumed.push(await this.transition(candidate.id, 'active', (current) => (
          this.resumeChanges(current, current.pauseResumesAt ?? now)
        )));
      } catch (error) {
        console.error('subscription_resume_failed', {
          subscriptionId: candidate.id,
          tenantId: candidate.tenantId,
          error: error instanceof Error ? error.message : 'unknown'
        });
      }
    }

    return resumed;
  }

  public async cancelSubscription(
    principal: Principal,
    tenantId: string,
    subscriptionId: string,
    reason: CancellationReason,
    context: AuditRequestContext | null = null
  ): Promise<Subscription> {
    await this.authorizeSubscription('subscriptions.cancel', principal, tenantId, subscriptionId, context);

    const canceled = await this.transition(subscriptionId, 'canceled', () => ({
      canceledAt: this.clock.now(),
      cancellationReason: reason,
      pausedAt: null,
      pauseResumesAt: null,
      dunning: emptyDunningState()
    }));

    await this.audit(principal, canceled, 'subscription.canceled', { reason }, context);
    return canceled;
  }

  /**
   * Rolls the billing period forward once the period ending at
   * `expectedPeriodEnd` is paid. A second call for the same period is a no-op.
   */
  public async advancePeriod(subscriptionId: string, expectedPeriodEnd: Date): Promise<Subscription> {
    return this.locks.runExclusive(subscriptionId, async () => {
      const subscription = await this.requireSubscription(subscriptionId);
      if (subscription.currentPeriodEnd.getTime() !== expectedPeriodEnd.getTime()) {
        return subscription;
      }

      if (subscription.status !== 'active') {
        throw new InvalidStateTransition('subscription', subscription.status, 'active');
      }

      return this.update(subscription, {
        currentPeriodStart: subscription.currentPeriodEnd,
        currentPeriodEnd: addBillingCycle(subscription.currentPeriodEnd, subscription.billingCycle),
        trialEndsAt: null,
        dunning: emptyDunningState()
      });
    });
  }

  public async recordPaymentFailure(subscriptionId: string, failure: PaymentFailureInput): Promise<Subscription> {
    return this.locks.runExclusive(subscriptionId, async () => {
      const subscription = await this.requireSubscription(subscriptionId);
      const failedAt = this.clock.now();
      const failedAttempts = subscription.dunning.failedAttempts + 1;
      const exhausted = failedAttempts >= failure.maxAttempts;

      const updated = await this.update(subscription, {
        dunning: {
          failedAttempts,
          nextAttemptAt: exhausted ? null : nextRetryAt(failedAt, failedAttempts, failure.retryBaseMinutes),
          requiresManualIntervention: exhausted,
          invoiceId: failure.invoiceId ?? subscription.dunning.invoiceId,
          lastFailureReason: failure.reason
        }
      });

      if (exhausted) {
        console.warn('subscription_dunning_escalated', {
          subscriptionId,
          tenantId: subscription.tenantId,
          failedAttempts,
          invoiceId: updated.dunning.invoiceId
        });
      }

      return updated;
    });
  }

  public async clearDunning(subscriptionId: string): Promise<Subscription> {
    return this.locks.runExclusive(subscriptionId, async () => {
      const subscription = await this.requireSubscription(subscriptionId);
      return this.update(subscription, { dunning: emptyDunningState() });
    });
  }

  private resumeChanges(subscription: Subscription, resumedAt: Date): SubscriptionChanges {
    const pausedMs = subscription.pausedAt === null
      ? 0
      : Math.max(0, resumedAt.getTime() - subscription.pausedAt.getTime());

    return {
      pausedAt: null,
      pauseResumesAt: null,
      currentPeriodEnd: new Date(subscription.currentPeriodEnd.getTime() + pausedMs)
    };
  }

  private async transition(
    subscriptionId: string,
    next: SubscriptionStatus,
    changesFor: (subscription: Subscription) => SubscriptionChanges
  ): Promise<Subscription> {
    return this.locks.runExclusive(subscriptionId, async () => {
      const subscription = await this.requireSubscription(subscriptionId);
      if (!SUBSCRIPTION_TRANSITIONS[subscription.status].includes(next)) {
        throw new InvalidStateTransition('subscription', subscription.status, next);
      }

      const updated = await this.update(subscription, { ...changesFor(subscription), status: next });
      console.log('subscription_status_changed', {
        subscriptionId,
        tenantId: subscription.tenantId,
        from: subscription.status,
        to: next
      });

      return updated;
    });
  }

  private async update(subscription: Subscription, changes: SubscriptionChanges): Promise<Subscription> {
    const updated = await this.repository.updateSubscription({
      subscriptionId: subscription.id,
      expectedVersion: subscription.version,
      changes
    });

    if (updated === null) {
      throw new NotFoundError('SUBSCRIPTION_NOT_FOUND', 'Subscription not found.');
    }

    return updated;
  }

  private async requireSubscription(subscriptionId: string): Promise<Subscription> {
    const subscription = await this.repository.findSubscriptionById(subscriptionId);
    if (subscription === null) {
      throw new NotFoundError('SUBSCRIPTION_NOT_FOUND', 'Subscription not found.');
    }

    return subscription;
  }

  private requireTier(tierId: string): SubscriptionTier {
    const tier = this.tierCatalog.find(tierId);
    if (tier === null) {
      throw new AppError(400, 'TIER_INVALID', `Unknown tier '${tierId}'.`);
    }

    return tier;
  }

  /** Authorizes against the tenant that actually owns the subscription. */
  public async authorizeSubscription(
    action: 'subscriptions.read' | 'subscriptions.manage' | 'subscriptions.cancel',
    principal: Principal,
    tenantId: string,
    subscriptionId: string,
    context: AuditRequestContext | null
  ): Promise<Subscription> {
    const subscription = await this.requireSubscription(subscriptionId);
    await this.securityService.authorize(action, principal, {
      tenantId: subscription.tenantId,
      resourceType: 'subscription',
      resourceId: subscription.id
    }, context);

    if (subscription.tenantId !== tenantId) {
      throw new NotFoundError('SUBSCRIPTION_NOT_FOUND', 'Subscription not found.');
    }

    return subscription;
  }

  private async audit(
    principal: Principal,
    subscription: Subscription,
    action: string,
    metadata: Record<string, unknown>,
    context: AuditRequestContext | null
  ): Promise<void> {
    await this.auditService.recordSafely({
      tenantId: subscription.tenantId,
      actorUserId: principal.userId,
      action,
      targetType: 'subscription',
      targetId: subscription.id,
      metadata: { ...metadata, status: subscription.status },
      ...context
    });
  }
}
