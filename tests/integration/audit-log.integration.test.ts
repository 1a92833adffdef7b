import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { bearerFor, createTestRuntime, seedTenant, type SeededTenant, type TestRuntime } from '../helpers/create-test-runtime.js';

interface AuditLogPage {
  events: Array<{ action: string; targetId: string | null }>;
  nextCursor: string | null;
}

describe('audit log endpoint', () => {
  let test: TestRuntime;
  let club: SeededTenant;
  let customerIds: string[];

  beforeEach(async () => {
    test = await createTestRuntime();
    club = await seedTenant(test, { slug: 'golf-club-42', type: 'golf-course' });

    customerIds = [];
    for (const member of ['ana', 'ben', 'cleo', 'dev', 'eli']) {
      const customer = await test.runtime.services.billingService.createCustomer(club.owner, club.tenant.id, {
        email: `${member}@golf-club-42.test`,
        name: member
      });
      customerIds.push(customer.id);
    }
  });

  afterEach(async () => {
    await test.runtime.close();
  });

  function page(query: Record<string, string>) {
    return request(test.runtime.app)
      .get(`/v1/tenants/${club.tenant.id}/audit-logs`)
      .query(query)
      .set('authorization', club.ownerBearer);
  }

  it('pages through filtered events with a cursor', async () => {
    const seen: string[] = [];
    let cursor: string | null = null;
    const pageSizes: number[] = [];

    do {
      const response = await page({ actions: 'customer.created', limit: '2', ...(cursor === null ? {} : { cursor }) }).expect(200);
      const body = response.body as AuditLogPage;

      pageSizes.push(body.events.length);
      for (const event of body.events) {
        expect(event.action).toBe('customer.created');
        seen.push(event.targetId ?? '');
      }

      cursor = body.nextCursor;
    } while (cursor !== null);

    expect(pageSizes).toEqual([2, 2, 1]);
    expect([...seen].sort()).toEqual([...customerIds].sort());
  });

  it('rejects a malformed cursor', async () => {
    const response = await page({ cursor: 'not-a-cursor' }).expect(400);
    expect((response.body as { code: string }).code).toBe('PAGINATION_CURSOR_INVALID');
  });

  it('is readable by owners and admins only', async () => {
    const analyst = bearerFor(test.identities, {
      userId: 'club-analyst',
      tenantId: club.tenant.id,
      roleClaims: [{ role: 'Analyst', scope: 'tenant' }]
    });

    const response = await request(test.runtime.app)
      .get(`/v1/tenants/${club.tenant.id}/audit-logs`)
      .set('authorization', analyst)
      .expect(403);

    expect((response.body as { code: string }).code).toBe('PERMISSION_DENIED');
  });
});
