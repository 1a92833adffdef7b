import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { TenantLimits } from '../../src/repositories/tenant-repository.js';
import { bearerFor, createTestRuntime, seedTenant, type SeededTenant, type TestRuntime } from '../helpers/create-test-runtime.js';

const ENDPOINT = 'GET /v1/tenants/:id/usage';

describe('usage metering', () => {
  let test: TestRuntime;
  let club: SeededTenant;

  beforeEach(async () => {
    test = await createTestRuntime({ start: '2026-03-10T12:00:00.000Z' });
    club = await seedTenant(test, { slug: 'golf-club-42', type: 'golf-course' });
  });

  afterEach(async () => {
    await test.runtime.close();
  });

  async function setLimits(limits: Partial<TenantLimits>, apiCallRate = '0.001'): Promise<void> {
    const { tenantService } = test.runtime.services;
    const current = await tenantService.resolveTenant(club.owner, club.tenant.id);
    await tenantService.updateTenant(club.owner, club.tenant.id, {
      expectedVersion: current.version,
      limits: { ...current.limits, ...limits },
      overageRates: { ...current.overageRates, apiCalls: apiCallRate }
    });
  }

  function recordCalls(tenantId: string, count: number): void {
    for (let call = 0; call < count; call += 1) {
      test.runtime.services.usageService.recordCall(tenantId, ENDPOINT, 200, 4, 0);
    }
  }

  it('prices calls and storage above the included allowance', async () => {
    await setLimits({ maxApiCallsPerMonth: 1_000, maxStorageGb: 5 }, '0.01');
    recordCalls(club.tenant.id, 1_500);
    await test.runtime.services.usageService.recordStorage(club.tenant.id, 7_000_000_000);

    const statement = await test.runtime.services.usageService.calculateOverage(club.tenant.id, '2026-03');

    expect(statement.lines).toEqual([
      { quotaType: 'api-calls', used: '1500', included: 1_000, overageUnits: '500', ratePerUnit: '0.01', amountMinor: 500 },
      { quotaType: 'storage', used: '7', included: 5, overageUnits: '2', ratePerUnit: '0.50', amountMinor: 100 },
      { quotaType: 'bandwidth', used: '0', included: 100, overageUnits: '0', ratePerUnit: '0.10', amountMinor: 0 }
    ]);
    expect(statement.totalMinor).toBe(600);
    expect(statement.currency).toBe('USD');
  });

  it('reports the quota as exceeded only past the limit', async () => {
    await setLimits({ maxApiCallsPerMonth: 1_000 });
    const { usageService } = test.runtime.services;

    recordCalls(club.tenant.id, 1_000);
    expect(await usageService.checkQuota(club.tenant.id, 'api-calls')).toEqual({ quotaType: 'api-calls', withinLimit: true, used: 1_000, limit: 1_000 });

    recordCalls(club.tenant.id, 1);
    expect(await usageService.checkQuota(club.tenant.id, 'api-calls')).toEqual({ quotaType: 'api-calls', withinLimit: false, used: 1_001, limit: 1_000 });
  });

  it('drops invalid samples without throwing', async () => {
    const { usageService } = test.runtime.services;

    usageService.recordCall('', ENDPOINT, 200, 4, 0);
    usageService.recordCall(club.tenant.id, ENDPOINT, 200, -1, 0);
    recordCalls(club.tenant.id, 2);

    expect(usageService.droppedSampleCount()).toBe(2);
    expect((await usageService.currentUsage(club.tenant.id)).calls).toBe(2);
  });

  it('reports usage alerts whose threshold the current period reached', async () => {
    await setLimits({ maxApiCallsPerMonth: 1_000 });
    const { usageService } = test.runtime.services;
    const alerts = await usageService.configureUsageAlerts(club.owner, club.tenant.id, [
      { metric: 'api-calls', thresholdPercent: 80 },
      { metric: 'api-calls', thresholdPercent: 100 },
      { metric: 'error-rate', thresholdPercent: 100 }
    ]);

    recordCalls(club.tenant.id, 850);
    for (let call = 0; call < 50; call += 1) {
      usageService.recordCall(club.tenant.id, ENDPOINT, 500, 4, 0);
    }

    const expected = [
      { alertId: alerts[0]?.id, metric: 'api-calls', thresholdPercent: 80, used: 900, limit: 1_000, percentOfLimit: 90, severity: 'high' },
      { alertId: alerts[2]?.id, metric: 'error-rate', thresholdPercent: 100, used: 0.0556, limit: 0.05, percentOfLimit: 111.11, severity: 'critical' }
    ];

    const first = await usageService.checkUsageThresholds(club.tenant.id);
    expect(first).toEqual(expected.map((breach) => ({ ...breach, firstInPeriod: true })));

    const second = await usageService.checkUsageThresholds(club.tenant.id);
    expect(second).toEqual(expected.map((breach) => ({ ...breach, firstInPeriod: false })));

    const stored = await usageService.getUsageAlerts(club.owner, club.tenant.id);
    expect(stored.map((alert) => alert.lastTriggeredAt?.toISOString() ?? null)).toEqual([
      '2026-03-10T12:00:00.000Z',
      null,
      '2026-03-10T12:00:00.000Z'
    ]);
  });

  it('lets owners configure usage alerts over http and keeps analysts to reading them', async () => {
    const alertsPath = `/v1/tenants/${club.tenant.id}/usage/alerts`;

    const configured = await request(test.runtime.app)
      .put(alertsPath)
      .set('authorization', club.ownerBearer)
      .send({ alerts: [{ metric: 'storage', thresholdPercent: 75 }, { metric: 'bandwidth', thresholdPercent: 90, enabled: false }] })
      .expect(200);
    const body = configured.body as { alerts: Array<{ metric: string; thresholdPercent: number; enabled: boolean }> };
    expect(body.alerts.map((alert) => [alert.metric, alert.thresholdPercent, alert.enabled])).toEqual([
      ['storage', 75, true],
      ['bandwidth', 90, false]
    ]);

    const thresholds = await request(test.runtime.app)
      .get(`/v1/tenants/${club.tenant.id}/usage/thresholds`)
      .set('authorization', club.ownerBearer)
      .expect(200);
    expect((thresholds.body as { breaches: unknown[] }).breaches).toEqual([]);

    const duplicate = await request(test.runtime.app)
      .put(alertsPath)
      .set('authorization', club.ownerBearer)
      .send({ alerts: [{ metric: 'storage', thresholdPercent: 75 }, { metric: 'storage', thresholdPercent: 75 }] })
      .expect(400);
    expect((duplicate.body as { code: string }).code).toBe('USAGE_ALERTS_INVALID');

    const analyst = bearerFor(test.identities, {
      userId: 'club-analyst',
      tenantId: club.tenant.id,
      roleClaims: [{ role: 'Analyst', scope: 'tenant' }]
    });
    const denied = await request(test.runtime.app)
      .put(alertsPath)
      .set('authorization', analyst)
      .send({ alerts: [] })
      .expect(403);
    expect((denied.body as { code: string }).code).toBe('PERMISSION_DENIED');

    const listed = await request(test.runtime.app)
      .get(alertsPath)
      .set('authorization', analyst)
      .expect(200);
    expect((listed.body as { alerts: unknown[] }).alerts).toHaveLength(2);
  });

  it('keeps a separate rate window per tenant', async () => {
    await setLimits({ rateLimitPerWindow: 2 });
    const other = await seedTenant(test, { slug: 'golf-club-43', type: 'golf-course' });
    const { usageService } = test.runtime.services;

    expect((await usageService.checkRateLimit(club.tenant.id, ENDPOINT)).allowed).toBe(true);
    expect((await usageService.checkRateLimit(club.tenant.id, ENDPOINT)).remaining).toBe(0);
    expect(await usageService.checkRateLimit(club.tenant.id, ENDPOINT)).toEqual({ allowed: false, retryAfterMs: 60_000, remaining: 0, limit: 2 });

    expect(await usageService.checkRateLimit(other.tenant.id, ENDPOINT)).toEqual({ allowed: true, retryAfterMs: 0, remaining: 299, limit: 300 });
    expect((await usageService.checkRateLimit(club.tenant.id, 'GET /v1/tenants/:id/usage/buckets')).allowed).toBe(true);

    test.clock.advanceMinutes(1);
    expect((await usageService.checkRateLimit(club.tenant.id, ENDPOINT)).allowed).toBe(true);
  });

  it('answers 429 with retry-after once the tenant window is full', async () => {
    await setLimits({ rateLimitPerWindow: 1 });
    const app = test.runtime.app;

    await request(app).get(`/v1/tenants/${club.tenant.id}/usage`).set('authorization', club.ownerBearer).expect(200);
    const limited = await request(app).get(`/v1/tenants/${club.tenant.id}/usage`).set('authorization', club.ownerBearer).expect(429);

    expect(limited.headers['retry-after']).toBe('60');
    expect(limited.body).toMatchObject({ code: 'RATE_LIMITED', details: { retryAfterMs: 60_000 } });
  });

  it('adds closed-period overage to the primary subscription renewal', async () => {
    await setLimits({ maxApiCallsPerMonth: 1_000, maxStorageGb: 5 }, '0.01');
    const { billingService, ledger } = test.runtime.services;
    const customer = await billingService.createCustomer(club.owner, club.tenant.id, { email: 'pro-shop@golf-club-42.test', name: 'Pro shop' });
    const { subscription } = await billingService.startSubscription(club.owner, club.tenant.id, {
      customerId: customer.id,
      tierId: 'professional',
      billingCycle: 'monthly',
      paymentMethodToken: 'pm_club_42'
    });

    recordCalls(club.tenant.id, 1_500);
    test.clock.set('2026-04-10T12:00:00.000Z');
    const result = await billingService.runAutomatedBillingCycle();

    expect(result.processed).toEqual([subscription.id]);
    expect(result.usagePeriodsClosed).toBe(0);
    expect(test.processor.capturedCharges().map((charge) => charge.amountMinor)).toEqual([9_900, 10_400]);

    const usageEvents = await ledger.query({ tenantId: club.tenant.id, types: ['usage-charge'] });
    expect(usageEvents.map((event) => [event.id, event.amountMinor, event.metadata.usagePeriod])).toEqual([
      [`usage:${club.tenant.id}:2026-03`, 500, '2026-03']
    ]);
    expect(await test.runtime.services.usageService.pendingOverage(club.tenant.id)).toEqual([]);
  });

  it('rolls minute buckets up to hours once they leave the raw window', async () => {
    const { usageService } = test.runtime.services;

    recordCalls(club.tenant.id, 3);
    test.clock.advanceMinutes(5);
    usageService.recordCall(club.tenant.id, ENDPOINT, 500, 10, 100);
    usageService.recordCall(club.tenant.id, ENDPOINT, 503, 10, 100);

    test.clock.set('2026-03-11T13:00:00.000Z');
    expect(await usageService.compact()).toEqual({ minuteBucketsRolledUp: 2, hourBucketsRolledUp: 0, dayBucketsDiscarded: 0 });

    expect(await usageService.listUsageBuckets(club.owner, club.tenant.id, { granularity: 'minute' })).toEqual([]);
    expect(await usageService.listUsageBuckets(club.owner, club.tenant.id, { granularity: 'hour' })).toEqual([
      {
        tenantId: club.tenant.id,
        endpoint: ENDPOINT,
        granularity: 'hour',
        bucketStart: new Date('2026-03-10T12:00:00.000Z'),
        calls: 5,
        bytes: 200,
        errors: 2,
        latencyTotalMs: 32,
        latencyMaxMs: 10
      }
    ]);
    expect((await usageService.currentUsage(club.tenant.id)).calls).toBe(5);
  });

  it('bills closed-period overage of a tenant without a current subscription', async () => {
    await setLimits({ maxApiCallsPerMonth: 1_000 }, '0.01');
    const { billingService, ledger, subscriptionService } = test.runtime.services;
    const customer = await billingService.createCustomer(club.owner, club.tenant.id, { email: 'pro-shop@golf-club-42.test', name: 'Pro shop' });
    const { subscription } = await billingService.startSubscription(club.owner, club.tenant.id, {
      customerId: customer.id,
      tierId: 'professional',
      billingCycle: 'monthly',
      paymentMethodToken: 'pm_club_42'
    });
    recordCalls(club.tenant.id, 1_500);
    await subscriptionService.cancelSubscription(club.owner, club.tenant.id, subscription.id, 'user_requested');

    test.clock.set('2026-04-02T00:00:00.000Z');
    expect(await billingService.closeUsagePeriods()).toEqual([
      { tenantId: club.tenant.id, period: '2026-03', totalMinor: 500, status: 'billed' }
    ]);
    expect(await billingService.closeUsagePeriods()).toEqual([]);

    expect(test.processor.capturedCharges().map((charge) => charge.amountMinor)).toEqual([9_900, 500]);
    const usageEvents = await ledger.query({ tenantId: club.tenant.id, types: ['usage-charge'] });
    expect(usageEvents.map((event) => [event.id, event.amountMinor, event.subscriptionId])).toEqual([
      [`usage:${club.tenant.id}:2026-03`, 500, subscription.id]
    ]);
  });
});
