import type { DiscountTerms } from '../domain/discounts.js';
import type { BillingCycle, RevenueStream } from '../domain/tier-catalog.js';

export const SUBSCRIPTION_STATUSES = ['active', 'paused', 'canceled'] as const;

export type SubscriptionStatus = (typeof SUBSCRIPTION_STATUSES)[number];

export const CANCELLATION_REASONS = [
  'user_requested',
  'payment_failed',
  'fraudulent',
  'price',
  'feature_lack',
  'competitor',
  'business_closure',
  'downgrade',
  'duplicate',
  'other'
] as const;

export type CancellationReason = (typeof CANCELLATION_REASONS)[number];

export interface DunningState {
  failedAttempts: number;
  nextAttemptAt: Date | null;
  requiresManualIntervention: boolean;
  invoiceId: string | null;
  lastFailureReason: string | null;
}

export interface SubscriptionDiscount extends DiscountTerms {
  id: string;
  name: string;
  appliedAt: Date;
}

export interface Subscription {
  id: string;
  tenantId: string;
  customerId: string;
  tierId: string;
  tierFamily: string;
  billingCycle: BillingCycle;
  priceMinor: number;
  currency: string;
  stream: RevenueStream;
  paymentMethodToken: string;
  status: SubscriptionStatus;
  trialEndsAt: Date | null;
  currentPeriodStart: Date;
  currentPeriodEnd: Date;
  pausedAt: Date | null;
  pauseResumesAt: Date | null;
  canceledAt: Date | null;
  cancellationReason: CancellationReason | null;
  dunning: DunningState;
  /** Applied in order on each charge; `priceMinor` stays the list price. */
  discounts: SubscriptionDiscount[];
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export type CreateSubscriptionInput = Omit<Subscription, 'id' | 'version' | 'createdAt' | 'updatedAt'> & {
  id?: string;
};

export type SubscriptionChanges = Partial<Omit<
  Subscription,
  'id' | 'tenantId' | 'customerId' | 'version' | 'createdAt' | 'updatedAt'
>>;

export interface UpdateSubscriptionInput {
  subscriptionId: string;
  expectedVersion: number;
  changes: SubscriptionChanges;
}

export interface ListSubscriptionsFilter {
  customerId?: string;
  statuses?: readonly SubscriptionStatus[];
}

export interface SubscriptionRepository {
  /** Rejects with DuplicateError while another non-canceled subscription holds the same (tenant, customer, family). */
  createSubscription(input: CreateSubscriptionInput): Promise<Subscription>;
  findSubscriptionById(subscriptionId: string): Promise<Subscription | null>;
  listSubscriptions(tenantId: string, filter?: ListSubscriptionsFilter): Promise<Subscription[]>;
  /** Rejects with ConcurrentModificationError when `expectedVersion` is stale. */
  updateSubscription(input: UpdateSubscriptionInput): Promise<Subscription | null>;
  listDueForRenewal(now: Date): Promise<Subscription[]>;
  listPausesDueToResume(now: Date): Promise<Subscription[]>;
}

export function emptyDunningState(): DunningState {
  return {
    failedAttempts: 0,
    nextAttemptAt: null,
    requiresManualIntervention: false,
    invoiceId: null,
    lastFailureReason: null
  };
}
