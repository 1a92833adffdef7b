import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createPostgresTestRuntime, resetPostgresState } from '../helpers/create-postgres-test-runtime.js';
import { seedTenant, type TestRuntime } from '../helpers/create-test-runtime.js';

const hasPostgres = Boolean(process.env.TEST_DATABASE_URL ?? process.env.DATABASE_URL);

interface ErrorResponse {
  code: string;
}

describe.skipIf(!hasPostgres)('postgres integration (RLS and tenancy)', () => {
  let test: TestRuntime;

  beforeEach(async () => {
    await resetPostgresState();
    test = await createPostgresTestRuntime('2026-03-01T00:00:00.000Z');
  });

  afterEach(async () => {
    await test.runtime.close();
  });

  it('keeps revenue of one club out of reach of another', async () => {
    const club = await seedTenant(test, { slug: 'golf-club-42', type: 'golf-course' });
    const neighbour = await seedTenant(test, { slug: 'golf-club-43', type: 'golf-course' });
    const { billingService } = test.runtime.services;

    const customer = await billingService.createCustomer(club.owner, club.tenant.id, { email: 'members@golf-club-42.test', name: 'Members' });
    const { subscription } = await billingService.startSubscription(club.owner, club.tenant.id, {
      customerId: customer.id,
      tierId: 'white-label-basic',
      billingCycle: 'monthly',
      paymentMethodToken: 'pm_club_42'
    });

    const own = await request(test.runtime.app)
      .get(`/v1/tenants/${club.tenant.id}/revenue/events`)
      .set('authorization', club.ownerBearer)
      .expect(200);
    expect((own.body as { events: Array<{ id: string }> }).events.map((event) => event.id)).toEqual([`created:${subscription.id}`]);

    const denied = await request(test.runtime.app)
      .get(`/v1/tenants/${club.tenant.id}/revenue/events`)
      .set('authorization', neighbour.ownerBearer)
      .expect(403);
    expect((denied.body as ErrorResponse).code).toBe('CROSS_TENANT_VIOLATION');

    const audit = await request(test.runtime.app)
      .get(`/v1/tenants/${neighbour.tenant.id}/audit-logs`)
      .query({ actions: 'security.cross_tenant_violation' })
      .set('authorization', neighbour.ownerBearer)
      .expect(200);
    expect((audit.body as { events: unknown[] }).events).toHaveLength(1);
  });

  it('stores a replayed revenue event once', async () => {
    const club = await seedTenant(test, { slug: 'golf-club-42', type: 'golf-course' });
    const { ledger } = test.runtime.services;
    const entry = {
      id: 'migration-golf-club-42',
      tenantId: club.tenant.id,
      type: 'migration' as const,
      amountMinor: 12_500,
      currency: 'USD',
      occurredAt: new Date('2026-02-15T00:00:00.000Z'),
      stream: 'consumer' as const,
      source: 'manual' as const
    };

    expect((await ledger.record(entry)).recorded).toBe(true);
    expect((await ledger.record(entry)).recorded).toBe(false);
    expect(await ledger.query({ tenantId: club.tenant.id })).toHaveLength(1);
  });
});
