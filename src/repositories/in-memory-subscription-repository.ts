import { randomUUID } from 'node:crypto';

import { ConcurrentModificationError, DuplicateError } from '../errors/domain-errors.js';
import type {
  CreateSubscriptionInput,
  ListSubscriptionsFilter,
  Subscription,
  SubscriptionRepository,
  UpdateSubscriptionInput
} from './subscription-repository.js';

function cloneDate(value: Date | null): Date | null {
  return value === null ? null : new Date(value);
}

function cloneSubscription(subscription: Subscription): Subscription {
  return {
    ...subscription,
    trialEndsAt: cloneDate(subscription.trialEndsAt),
    currentPeriodStart: new Date(subscription.currentPeriodStart),
    currentPeriodEnd: new Date(subscription.currentPeriodEnd),
    pausedAt: cloneDate(subscription.pausedAt),
    pauseResumesAt: cloneDate(subscription.pauseResumesAt),
    canceledAt: cloneDate(subscription.canceledAt),
    dunning: {
      ...subscription.dunning,
      nextAttemptAt: cloneDate(subscription.dunning.nextAttemptAt)
    },
    discounts: subscription.discounts.map((discount) => ({
      ...discount,
      validFrom: new Date(discount.validFrom),
      validUntil: cloneDate(discount.validUntil),
      appliedAt: new Date(discount.appliedAt)
    })),
    createdAt: new Date(subscription.createdAt),
    updatedAt: new Date(subscription.updatedAt)
  };
}

function compareByCreation(left: Subscription, right: Subscription): number {
  if (left.createdAt.getTime() !== right.createdAt.getTime()) {
    return left.createdAt.getTime() - right.createdAt.getTime();
  }

  return left.id.localeCompare(right.id);
}

export class InMemorySubscriptionRepository implements SubscriptionRepository {
  private readonly subscriptionsById = new Map<string, Subscription>();

  public createSubscription(input: CreateSubscriptionInput): Promise<Subscription> {
    const conflict = [...this.subscriptionsById.values()].find((subscription) => (
      subscription.tenantId === input.tenantId
      && subscription.customerId === input.customerId
      && subscription.tierFamily === input.tierFamily
      && subscription.status !== 'canceled'
    ));

    if (conflict !== undefined) {
      return Promise.reject(new DuplicateError(
        'SUBSCRIPTION_ALREADY_ACTIVE',
        `Customer already holds a ${input.tierFamily} subscription.`,
        { subscriptionId: conflict.id }
      ));
    }

    const now = new Date();
    const subscription: Subscription = {
      ...input,
      id: input.id ?? randomUUID(),
      version: 1,
      createdAt: now,
      updatedAt: now
    };

    this.subscriptionsById.set(subscription.id, cloneSubscription(subscription));
    return Promise.resolve(cloneSubscription(subscription));
  }

  public findSubscriptionById(subscriptionId: string): Promise<Subscription | null> {
    const subscription = this.subscriptionsById.get(subscriptionId);
    return Promise.resolve(subscription === undefined ? null : cloneSubscription(subscription));
  }

  public listSubscriptions(tenantId: string, filter: ListSubscriptionsFilter = {}): Promise<Subscription[]> {
    const subscriptions = [...this.subscriptionsById.values()]
      .filter((subscription) => (
        subscription.tenantId === tenantId
        && (filter.customerId === undefined || subscription.customerId === filter.customerId)
        && (filter.statuses === undefined || filter.statuses.includes(subscription.status))
      ))
      .sort(compareByCreation)
      .map(cloneSubscription);

    return Promise.resolve(subscriptions);
  }

  public updateSubscription(input: UpdateSubscriptionInput): Promise<Subscription | null> {
    const existing = this.subscriptionsById.get(input.subscriptionId);
    if (existing === undefined) {
      return Promise.resolve(null);
    }

    if (existing.version !== input.expectedVersion) {
      return Promise.reject(new ConcurrentModificationError('subscription', input.subscriptionId));
    }

    const updated: Subscription = {
      ...existing,
      ...input.changes,
      version: existing.version + 1,
      updatedAt: new Date()
    };

    this.subscriptionsById.set(updated.id, cloneSubscription(updated));
    return Promise.resolve(cloneSubscription(updated));
  }

  public listDueForRenewal(now: Date): Promise<Subscription[]> {
    const due = [...this.subscriptionsById.values()]
      .filter((subscription) => (
        subscription.status === 'active'
        && subscription.currentPeriodEnd.getTime() <= now.getTime()
        && !subscription.dunning.requiresManualIntervention
        && (subscription.dunning.nextAttemptAt === null || subscription.dunning.nextAttemptAt.getTime() <= now.getTime())
      ))
      .sort(compareByCreation)
      .map(cloneSubscription);

    return Promise.resolve(due);
  }

  public listPausesDueToResume(now: Date): Promise<Subscription[]> {
    const due = [...this.subscriptionsById.values()]
      .filter((subscription) => (
        subscription.status === 'paused'
        && subscription.pauseResumesAt !== null
        && subscription.pauseResumesAt.getTime() <= now.getTime()
      ))
      .sort(compareByCreation)
      .map(cloneSubscription);

    return Promise.resolve(due);
  }
}
