import { randomUUID } from 'node:crypto';

import type { Pool } from 'pg';

import { getSingleRow, isUniqueViolation, withTransaction } from '../db/pg-helpers.js';
import type { DiscountKind } from '../domain/discounts.js';
import type { BillingCycle, RevenueStream } from '../domain/tier-catalog.js';
import { ConcurrentModificationError, DuplicateError } from '../errors/domain-errors.js';
import type {
  CancellationReason,
  CreateSubscriptionInput,
  ListSubscriptionsFilter,
  Subscription,
  SubscriptionDiscount,
  SubscriptionRepository,
  SubscriptionStatus,
  UpdateSubscriptionInput
} from './subscription-repository.js';

/** JSONB keeps dates as ISO strings. */
interface StoredDiscount {
  id: string;
  name: string;
  kind: DiscountKind;
  value: number;
  validFrom: string;
  validUntil: string | null;
  appliedAt: string;
}

interface SubscriptionRow {
  id: string;
  tenant_id: string;
  customer_id: string;
  tier_id: string;
  tier_family: string;
  billing_cycle: BillingCycle;
  price_minor: string;
  currency: string;
  stream: RevenueStream;
  payment_method_token: string;
  status: SubscriptionStatus;
  trial_ends_at: Date | null;
  current_period_start: Date;
  current_period_end: Date;
  paused_at: Date | null;
  pause_resumes_at: Date | null;
  canceled_at: Date | null;
  cancellation_reason: CancellationReason | null;
  dunning_failed_attempts: number;
  dunning_next_attempt_at: Date | null;
  dunning_requires_intervention: boolean;
  dunning_invoice_id: string | null;
  dunning_last_failure_reason: string | null;
  discounts: StoredDiscount[];
  version: number;
  created_at: Date;
  updated_at: Date;
}

function mapDiscount(stored: StoredDiscount): SubscriptionDiscount {
  return {
    id: stored.id,
    name: stored.name,
    kind: stored.kind,
    value: stored.value,
    validFrom: new Date(stored.validFrom),
    validUntil: stored.validUntil === null ? null : new Date(stored.validUntil),
    appliedAt: new Date(stored.appliedAt)
  };
}

function mapSubscription(row: SubscriptionRow): Subscription {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    customerId: row.customer_id,
    tierId: row.tier_id,
    tierFamily: row.tier_family,
    billingCycle: row.billing_cycle,
    priceMinor: Number.parseInt(row.price_minor, 10),
    currency: row.currency,
    stream: row.stream,
    paymentMethodToken: row.payment_method_token,
    status: row.status,
    trialEndsAt: row.trial_ends_at,
    currentPeriodStart: row.current_period_start,
    currentPeriodEnd: row.current_period_end,
    pausedAt: row.paused_at,
    pauseResumesAt: row.pause_resumes_at,
    canceledAt: row.canceled_at,
    cancellationReason: row.cancellation_reason,
    dunning: {
      failedAttempts: row.dunning_failed_attempts,
      nextAttemptAt: row.dunning_next_attempt_at,
      requiresManualIntervention: row.dunning_requires_intervention,
      invoiceId: row.dunning_invoice_id,
      lastFailureReason: row.dunning_last_failure_reason
    },
    discounts: row.discounts.map(mapDiscount),
    version: row.version,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

function rowValues(subscription: Omit<Subscription, 'version' | 'createdAt' | 'updatedAt'>): unknown[] {
  return [
    subscription.id,
    subscription.tenantId,
    subscription.customerId,
    subscription.tierId,
    subscription.tierFamily,
    subscription.billingCycle,
    subscription.priceMinor,
    subscription.currency,
    subscription.stream,
    subscription.paymentMethodToken,
    subscription.status,
    subscription.trialEndsAt,
    subscription.currentPeriodStart,
    subscription.currentPeriodEnd,
    subscription.pausedAt,
    subscription.pauseResumesAt,
    subscription.canceledAt,
    subscription.cancellationReason,
    subscription.dunning.failedAttempts,
    subscription.dunning.nextAttemptAt,
    subscription.dunning.requiresManualIntervention,
    subscription.dunning.invoiceId,
    subscription.dunning.lastFailureReason,
    JSON.stringify(subscription.discounts)
  ];
}

export class PostgresSubscriptionRepository implements SubscriptionRepository {
  public constructor(private readonly pool: Pool) {}

  public async createSubscription(input: CreateSubscriptionInput): Promise<Subscription> {
    try {
      return await withTransaction(this.pool, input.tenantId, async (client) => {
        const result = await client.query<SubscriptionRow>(
          `
          INSERT INTO subscriptions (
            id, tenant_id, customer_id, tier_id, tier_family, billing_cycle, price_minor, currency,
            stream, payment_method_token, status, trial_ends_at, current_period_start, current_period_end,
            paused_at, pause_resumes_at, canceled_at, cancellation_reason,
            dunning_failed_attempts, dunning_next_attempt_at, dunning_requires_intervention,
            dunning_invoice_id, dunning_last_failure_reason, discounts, version, created_at, updated_at
          )
          VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18,
                  $19, $20, $21, $22, $23, $24, 1, NOW(), NOW())
          RETURNING *
          `,
          rowValues({ ...input, id: input.id ?? randomUUID() })
        );

        const row = getSingleRow(result.rows);
        if (row === null) {
          throw new Error('Failed to create subscription.');
        }

        return mapSubscription(row);
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateError('SUBSCRIPTION_ALREADY_ACTIVE', `Customer already holds a ${input.tierFamily} subscription.`);
      }

      throw error;
    }
  }

  public async findSubscriptionById(subscriptionId: string): Promise<Subscription | null> {
    return withTransaction(this.pool, null, async (client) => {
      const result = await client.query<SubscriptionRow>('SELECT * FROM subscriptions WHERE id = $1', [subscriptionId]);
      const row = getSingleRow(result.rows);
      return row === null ? null : mapSubscription(row);
    });
  }

  public async listSubscriptions(tenantId: string, filter: ListSubscriptionsFilter = {}): Promise<Subscription[]> {
    return withTransaction(this.pool, tenantId, async (client) => {
      const result = await client.query<SubscriptionRow>(
        `
        SELECT *
        FROM subscriptions
        WHERE tenant_id = $1
          AND ($2::uuid IS NULL OR customer_id = $2)
          AND ($3::text[] IS NULL OR status = ANY($3::text[]))
        ORDER BY created_at ASC, id ASC
        `,
        [tenantId, filter.customerId ?? null, filter.statuses === undefined ? null : [...filter.statuses]]
      );

      return result.rows.map(mapSubscription);
    });
  }

  public async updateSubscription(input: UpdateSubscriptionInput): Promise<Subscription | null> {
    return withTransaction(this.pool, null, async (client) => {
      const current = await client.query<SubscriptionRow>(
        'SELECT * FROM subscriptions WHERE id = $1 FOR UPDATE',
        [input.subscriptionId]
      );

      const existingRow = getSingleRow(current.rows);
      if (existingRow === null) {
        return null;
      }

      if (existingRow.version !== input.expectedVersion) {
        throw new ConcurrentModificationError('subscription', input.subscriptionId);
      }

      const merged: Subscription = { ...mapSubscription(existingRow), ...input.changes };
      const result = await client.query<SubscriptionRow>(
        `
        UPDATE subscriptions
        SET tier_id = $4,
            tier_family = $5,
            billing_cycle = $6,
            price_minor = $7,
            currency = $8,
            stream = $9,
            payment_method_token = $10,
            status = $11,
            trial_ends_at = $12,
            current_period_start = $13,
            current_period_end = $14,
            paused_at = $15,
            pause_resumes_at = $16,
            canceled_at = $17,
            cancellation_reason = $18,
            dunning_failed_attempts = $19,
            dunning_next_attempt_at = $20,
            dunning_requires_intervention = $21,
            dunning_invoice_id = $22,
            dunning_last_failure_reason = $23,
            discounts = $24,
            version = version + 1,
            updated_at = NOW()
        WHERE id = $1 AND tenant_id = $2 AND customer_id = $3 AND version = $25
        RETURNING *
        `,
        [...rowValues(merged), input.expectedVersion]
      );

      const row = getSingleRow(result.rows);
      if (row === null) {
        throw new ConcurrentModificationError('subscription', input.subscriptionId);
      }

      return mapSubscription(row);
    });
  }

  public async listDueForRenewal(now: Date): Promise<Subscription[]> {
    return withTransaction(this.pool, null, async (client) => {
      const result = await client.query<SubscriptionRow>(
        `
        SELECT *
        FROM subscriptions
        WHERE status = 'active'
          AND current_period_end <= $1
          AND dunning_requires_intervention = FALSE
          AND (dunning_next_attempt_at IS NULL OR dunning_next_attempt_at <= $1)
        ORDER BY created_at ASC, id ASC
        `,
        [now]
      );

      return result.rows.map(mapSubscription);
    });
  }

  public async listPausesDueToResume(now: Date): Promise<Subscription[]> {
    return withTransaction(this.pool, null, async (client) => {
      const result = await client.query<SubscriptionRow>(
        `
        SELECT *
        FROM subscriptions
        WHERE status = 'paused'
          AND pause_resumes_at IS NOT NULL
          AND pause_resumes_at <= $1
        ORDER BY created_at ASC, id ASC
        `,
        [now]
      );

      return result.rows.map(mapSubscription);
    });
  }
}
