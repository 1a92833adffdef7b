import { afterEach, describe, expect, it, vi } from 'vitest';

import type { Principal } from '../../src/auth/auth-context.js';
import { ConcurrentModificationError } from '../../src/errors/domain-errors.js';
import type { Subscription } from '../../src/repositories/subscription-repository.js';
import { createTestRuntime, platformPrincipal, principalFor, seedTenant, type TestRuntime } from '../helpers/create-test-runtime.js';

describe('automated billing cycle', () => {
  let test: TestRuntime;

  afterEach(async () => {
    vi.restoreAllMocks();
    await test.runtime.close();
  });

  async function subscribe(
    slug: string,
    tierId: string,
    paymentMethodToken: string,
    extra: { trialDays?: number } = {}
  ): Promise<{ owner: Principal; tenantId: string; subscription: Subscription }> {
    const { tenant, owner } = await seedTenant(test, { slug, type: 'golf-course' });
    const { billingService } = test.runtime.services;
    const customer = await billingService.createCustomer(owner, tenant.id, { email: `billing@${slug}.test`, name: slug });
    const { subscription } = await billingService.startSubscription(owner, tenant.id, {
      customerId: customer.id,
      tierId,
      billingCycle: 'monthly',
      paymentMethodToken,
      ...extra
    });

    return { owner, tenantId: tenant.id, subscription };
  }

  function renewalKeys(subscriptionId: string): string[] {
    return test.processor.charges
      .map((charge) => charge.request.idempotencyKey)
      .filter((key) => key.startsWith(`renewal:${subscriptionId}:`));
  }

  it('renews due subscriptions and rolls the period forward', async () => {
    test = await createTestRuntime({ start: '2026-03-01T00:00:00.000Z' });
    const { subscription, tenantId } = await subscribe('golf-club-42', 'professional', 'pm_club_42');

    test.clock.set('2026-04-01T00:00:00.000Z');
    const result = await test.runtime.services.billingService.runAutomatedBillingCycle();

    expect(result.processed).toEqual([subscription.id]);
    expect(result.failed).toEqual([]);

    const renewed = await test.runtime.services.subscriptionService.findSubscription(subscription.id);
    expect(renewed?.currentPeriodStart.toISOString()).toBe('2026-04-01T00:00:00.000Z');
    expect(renewed?.currentPeriodEnd.toISOString()).toBe('2026-05-01T00:00:00.000Z');

    const events = await test.runtime.services.ledger.query({ tenantId, types: ['subscription-renewed'] });
    expect(events.map((event) => [event.id, event.amountMinor, event.metadata.periodEnd])).toEqual([
      [`renewal:${subscription.id}:2026-04-01T00:00:00.000Z`, 9_900, '2026-05-01T00:00:00.000Z']
    ]);

    const second = await test.runtime.services.billingService.runAutomatedBillingCycle();
    expect(second.processed).toEqual([]);
  });

  it('bills the first period when a trial ends', async () => {
    test = await createTestRuntime({ start: '2026-03-01T00:00:00.000Z' });
    const { subscription } = await subscribe('golf-club-42', 'starter', 'pm_club_42', { trialDays: 14 });

    test.clock.set('2026-03-15T00:00:00.000Z');
    const result = await test.runtime.services.billingService.runAutomatedBillingCycle();

    expect(result.processed).toEqual([subscription.id]);
    const renewed = await test.runtime.services.subscriptionService.findSubscription(subscription.id);
    expect(renewed?.trialEndsAt).toBeNull();
    expect(renewed?.currentPeriodEnd.toISOString()).toBe('2026-04-15T00:00:00.000Z');
    expect(test.processor.capturedCharges().map((charge) => charge.amountMinor)).toEqual([2_900]);
  });

  it('retries declined renewals on an exponential schedule and escalates after the last attempt', async () => {
    test = await createTestRuntime({ start: '2026-03-01T00:00:00.000Z' });
    const { subscription, tenantId } = await subscribe('golf-club-43', 'professional', 'pm_declines');
    const declined = { status: 'declined' as const, reason: 'card_declined' };
    test.processor.script('pm_declines', declined, declined, declined, declined);
    const { billingService, subscriptionService } = test.runtime.services;

    test.clock.set('2026-04-01T00:00:00.000Z');
    expect((await billingService.runAutomatedBillingCycle()).failed).toEqual([subscription.id]);
    expect((await subscriptionService.findSubscription(subscription.id))?.dunning.nextAttemptAt?.toISOString()).toBe('2026-04-01T01:00:00.000Z');

    test.clock.set('2026-04-01T00:30:00.000Z');
    expect((await billingService.runAutomatedBillingCycle()).failed).toEqual([]);

    test.clock.set('2026-04-01T01:00:00.000Z');
    expect((await billingService.runAutomatedBillingCycle()).failed).toEqual([subscription.id]);
    expect((await subscriptionService.findSubscription(subscription.id))?.dunning.nextAttemptAt?.toISOString()).toBe('2026-04-01T03:00:00.000Z');

    test.clock.set('2026-04-01T03:00:00.000Z');
    await billingService.runAutomatedBillingCycle();
    expect((await subscriptionService.findSubscription(subscription.id))?.dunning.nextAttemptAt?.toISOString()).toBe('2026-04-01T07:00:00.000Z');

    test.clock.set('2026-04-01T07:00:00.000Z');
    const last = await billingService.runAutomatedBillingCycle();
    expect(last.requiresIntervention).toEqual([subscription.id]);

    const escalated = await subscriptionService.findSubscription(subscription.id);
    expect(escalated?.dunning).toMatchObject({ failedAttempts: 4, nextAttemptAt: null, requiresManualIntervention: true, lastFailureReason: 'card_declined' });

    const owner = await principalFor(test, { userId: 'golf-club-43-owner', tenantId });
    const invoices = await billingService.listInvoices(owner, tenantId);
    expect(invoices.map((invoice) => [invoice.id, invoice.status])).toEqual([[escalated?.dunning.invoiceId, 'overdue']]);

    const period = `renewal:${subscription.id}:2026-04-01T00:00:00.000Z`;
    expect(renewalKeys(subscription.id)).toEqual([1, 2, 3, 4].map((attempt) => `${period}:attempt-${attempt}`));

    test.clock.set('2026-04-02T00:00:00.000Z');
    expect((await billingService.runAutomatedBillingCycle()).requiresIntervention).toEqual([]);
    expect(await test.runtime.services.ledger.query({ tenantId, types: ['subscription-renewed'] })).toEqual([]);
  });

  it('repeats an ambiguous attempt under its original key', async () => {
    test = await createTestRuntime({ start: '2026-03-01T00:00:00.000Z' });
    const { subscription, tenantId } = await subscribe('golf-club-42', 'professional', 'pm_flaky');
    test.processor.script('pm_flaky', { status: 'error' }, { status: 'error' }, { status: 'error' });
    const { billingService } = test.runtime.services;

    test.clock.set('2026-04-01T00:00:00.000Z');
    expect((await billingService.runAutomatedBillingCycle()).failed).toEqual([subscription.id]);

    test.clock.set('2026-04-01T01:00:00.000Z');
    expect((await billingService.runAutomatedBillingCycle()).processed).toEqual([subscription.id]);

    const attemptOne = `renewal:${subscription.id}:2026-04-01T00:00:00.000Z:attempt-1`;
    expect(renewalKeys(subscription.id)).toEqual([attemptOne, attemptOne, attemptOne, attemptOne]);
    expect(test.processor.capturedCharges().filter((charge) => charge.idempotencyKey === attemptOne)).toHaveLength(1);
    expect(await test.runtime.services.ledger.query({ tenantId, types: ['subscription-renewed'] })).toHaveLength(1);
  });

  it('treats a processor that never answers as ambiguous and retries it', async () => {
    test = await createTestRuntime({ start: '2026-03-01T00:00:00.000Z', envOverrides: { BILLING_PAYMENT_TIMEOUT_MS: 20 } });
    const { subscription } = await subscribe('golf-club-42', 'professional', 'pm_slow');
    test.processor.script('pm_slow', { status: 'hang' });

    test.clock.set('2026-04-01T00:00:00.000Z');
    const result = await test.runtime.services.billingService.runAutomatedBillingCycle();

    expect(result.processed).toEqual([subscription.id]);
    expect(test.processor.charges.filter((charge) => charge.request.paymentMethodToken === 'pm_slow').map((charge) => charge.result?.status ?? 'pending'))
      .toEqual(['succeeded', 'pending', 'succeeded']);
  });

  it('skips every subscription once the cycle is aborted', async () => {
    test = await createTestRuntime({ start: '2026-03-01T00:00:00.000Z' });
    const first = await subscribe('golf-club-42', 'professional', 'pm_club_42');
    const second = await subscribe('golf-club-43', 'starter', 'pm_club_43');
    const controller = new AbortController();
    controller.abort();

    test.clock.set('2026-04-01T00:00:00.000Z');
    const result = await test.runtime.services.billingService.runAutomatedBillingCycle({ signal: controller.signal });

    expect(result.processed).toEqual([]);
    expect([...result.skipped].sort()).toEqual([first.subscription.id, second.subscription.id].sort());
    expect(result.usagePeriodsClosed).toBe(0);
    expect((await test.runtime.services.subscriptionService.findSubscription(first.subscription.id))?.currentPeriodEnd.toISOString())
      .toBe('2026-04-01T00:00:00.000Z');
  });

  it('resumes pauses that have run their course', async () => {
    test = await createTestRuntime({ start: '2026-03-01T00:00:00.000Z' });
    const { subscription, owner, tenantId } = await subscribe('golf-club-42', 'starter', 'pm_club_42');
    const { billingService, subscriptionService } = test.runtime.services;

    test.clock.set('2026-03-11T00:00:00.000Z');
    await subscriptionService.pauseSubscription(owner, tenantId, subscription.id, 10);

    test.clock.set('2026-03-25T00:00:00.000Z');
    const result = await billingService.runAutomatedBillingCycle();

    expect(result.resumedPauses).toBe(1);
    const resumed = await subscriptionService.findSubscription(subscription.id);
    expect(resumed?.status).toBe('active');
    expect(resumed?.currentPeriodEnd.toISOString()).toBe('2026-04-11T00:00:00.000Z');
  });

  it('keeps the cycle going when one pause fails to resume', async () => {
    test = await createTestRuntime({ start: '2026-03-01T00:00:00.000Z' });
    const first = await subscribe('golf-club-42', 'starter', 'pm_club_42');
    const second = await subscribe('golf-club-43', 'starter', 'pm_club_43');
    const { billingService, subscriptionService } = test.runtime.services;

    test.clock.set('2026-03-11T00:00:00.000Z');
    await subscriptionService.pauseSubscription(first.owner, first.tenantId, first.subscription.id, 10);
    await subscriptionService.pauseSubscription(second.owner, second.tenantId, second.subscription.id, 10);

    const repository = test.runtime.subscriptionRepository;
    const update = repository.updateSubscription.bind(repository);
    vi.spyOn(repository, 'updateSubscription').mockImplementation(async (input) => {
      if (input.subscriptionId === first.subscription.id) {
        throw new ConcurrentModificationError('subscription', input.subscriptionId);
      }

      return update(input);
    });

    test.clock.set('2026-03-25T00:00:00.000Z');
    const result = await billingService.runAutomatedBillingCycle();

    expect(result.resumedPauses).toBe(1);
    expect(result.processed).toEqual([]);
    expect((await subscriptionService.findSubscription(first.subscription.id))?.status).toBe('paused');
    expect((await subscriptionService.findSubscription(second.subscription.id))?.status).toBe('active');
  });

  it('holds renewals and new charges while the tenant is suspended', async () => {
    test = await createTestRuntime({ start: '2026-03-01T00:00:00.000Z' });
    const { subscription, owner, tenantId } = await subscribe('golf-club-42', 'professional', 'pm_club_42');
    const { billingService, tenantService } = test.runtime.services;

    await tenantService.suspendTenant(owner, tenantId, 'non_payment');
    await expect(billingService.createCustomer(owner, tenantId, { email: 'late@golf-club-42.test', name: 'Late' }))
      .rejects.toMatchObject({ code: 'TENANT_NOT_ACTIVE' });

    test.clock.set('2026-04-01T00:00:00.000Z');
    const held = await billingService.runAutomatedBillingCycle();
    expect(held.processed).toEqual([]);
    expect(held.skipped).toEqual([subscription.id]);

    await tenantService.reinstateTenant(owner, tenantId);
    const renewed = await billingService.runAutomatedBillingCycle();
    expect(renewed.processed).toEqual([subscription.id]);
    expect(test.processor.capturedCharges().map((charge) => charge.amountMinor)).toEqual([9_900, 9_900]);
  });

  it('bills renewals at the discounted price while the discount holds', async () => {
    test = await createTestRuntime({ start: '2026-03-01T00:00:00.000Z' });
    const { subscription, owner, tenantId } = await subscribe('golf-club-42', 'professional', 'pm_club_42');
    const { billingService, subscriptionService, ledger } = test.runtime.services;

    await subscriptionService.applyDiscount(owner, tenantId, subscription.id, {
      name: 'Spring promotion',
      kind: 'percentage',
      value: 25,
      validUntil: new Date('2026-04-15T00:00:00.000Z')
    });

    test.clock.set('2026-04-01T00:00:00.000Z');
    await billingService.runAutomatedBillingCycle();
    test.clock.set('2026-05-01T00:00:00.000Z');
    await billingService.runAutomatedBillingCycle();

    const renewals = await ledger.query({ tenantId, types: ['subscription-renewed'] });
    expect(renewals.map((event) => [event.amountMinor, event.metadata.priceMinor, event.metadata.listPriceMinor])).toEqual([
      [7_425, '7425', '9900'],
      [9_900, '9900', undefined]
    ]);
    expect(test.processor.capturedCharges().map((charge) => charge.amountMinor)).toEqual([9_900, 7_425, 9_900]);
  });

  it('keeps discounts off canceled subscriptions', async () => {
    test = await createTestRuntime({ start: '2026-03-01T00:00:00.000Z' });
    const { subscription, owner, tenantId } = await subscribe('golf-club-42', 'professional', 'pm_club_42');
    const { subscriptionService } = test.runtime.services;

    await subscriptionService.cancelSubscription(owner, tenantId, subscription.id, 'price');
    await expect(subscriptionService.applyDiscount(owner, tenantId, subscription.id, { name: 'Win-back', kind: 'fixed', value: 1_000 }))
      .rejects.toMatchObject({ code: 'SUBSCRIPTION_CANCELED' });
  });

  it('marks sent invoices overdue once their due date passes', async () => {
    test = await createTestRuntime({ start: '2026-03-01T00:00:00.000Z' });
    const { tenant, owner } = await seedTenant(test, { slug: 'golf-club-42', type: 'golf-course' });
    const { billingService } = test.runtime.services;
    const customer = await billingService.createCustomer(owner, tenant.id, { email: 'lessons@golf-club-42.test', name: 'Lessons' });
    const draft = await billingService.createInvoice(owner, tenant.id, {
      customerId: customer.id,
      currency: 'USD',
      items: [{ description: 'Range card', amountMinor: 2_500, quantity: 2, eventType: 'add-on-purchase', stream: 'consumer' }],
      dueAt: new Date('2026-03-10T00:00:00.000Z')
    });
    await billingService.sendInvoice(owner, tenant.id, draft.id);

    expect(await billingService.markOverdueInvoices(new Date('2026-03-09T00:00:00.000Z'))).toEqual([]);

    test.clock.set('2026-03-11T00:00:00.000Z');
    const marked = await billingService.markOverdueInvoices();
    expect(marked.map((invoice) => [invoice.id, invoice.status])).toEqual([[draft.id, 'overdue']]);
    expect(await billingService.markOverdueInvoices()).toEqual([]);

    const paid = await billingService.payInvoice(owner, tenant.id, draft.id, 'pm_club_42');
    expect(paid.status).toBe('paid');
    expect(test.processor.capturedCharges().map((charge) => charge.amountMinor)).toEqual([5_000]);
  });

  it('lets only platform operators trigger a cycle', async () => {
    test = await createTestRuntime({ start: '2026-03-01T00:00:00.000Z' });
    const { owner } = await subscribe('golf-club-42', 'starter', 'pm_club_42');
    const { billingService } = test.runtime.services;

    await expect(billingService.runBillingCycleFor(owner)).rejects.toMatchObject({ code: 'PERMISSION_DENIED' });
    await expect(billingService.runBillingCycleFor(await platformPrincipal(test))).resolves.toMatchObject({ processed: [] });
  });
});
