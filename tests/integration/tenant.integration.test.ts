import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { Tenant } from '../../src/repositories/tenant-repository.js';
import { bearerFor, createTestRuntime, platformOperator, type TestRuntime } from '../helpers/create-test-runtime.js';

interface ErrorResponse {
  code: string;
}

interface TenantResponse {
  tenant: Tenant;
}

interface TenantListResponse {
  tenants: Tenant[];
}

describe('tenant registry', () => {
  let test: TestRuntime;

  beforeEach(async () => {
    test = await createTestRuntime();
  });

  afterEach(async () => {
    await test.runtime.close();
  });

  async function createRoot(slug: string, type: Tenant['type']): Promise<{ tenant: Tenant; ownerBearer: string }> {
    const response = await request(test.runtime.app)
      .post('/v1/tenants')
      .set('authorization', platformOperator(test))
      .send({ slug, name: `${slug} tenant`, type, ownerUserId: `${slug}-owner` });

    expect(response.status).toBe(201);
    const { tenant } = response.body as TenantResponse;
    return { tenant, ownerBearer: bearerFor(test.identities, { userId: `${slug}-owner`, tenantId: tenant.id }) };
  }

  it('rejects requests without an identity assertion', async () => {
    const anonymous = await request(test.runtime.app).get(`/v1/tenants/${test.runtime.platformTenant.id}`);
    const unknown = await request(test.runtime.app)
      .get(`/v1/tenants/${test.runtime.platformTenant.id}`)
      .set('authorization', 'Bearer not-registered');
    const basic = await request(test.runtime.app)
      .get(`/v1/tenants/${test.runtime.platformTenant.id}`)
      .set('authorization', 'Basic dGVzdDp0ZXN0');

    expect(anonymous.status).toBe(401);
    expect((anonymous.body as ErrorResponse).code).toBe('AUTH_REQUIRED');
    expect((unknown.body as ErrorResponse).code).toBe('AUTH_INVALID_ASSERTION');
    expect((basic.body as ErrorResponse).code).toBe('AUTH_SCHEME_UNSUPPORTED');
  });

  it('provisions a golf course with default limits and owner access', async () => {
    const { tenant, ownerBearer } = await createRoot('golf-club-42', 'golf-course');

    expect(tenant.status).toBe('provisioning');
    expect(tenant.currency).toBe('USD');
    expect(tenant.limits.maxApiCallsPerMonth).toBe(25_000);
    expect(tenant.limits.rateLimitPerWindow).toBe(300);
    expect(tenant.overageRates).toEqual({ apiCalls: '0.001', storageGb: '0.50', bandwidthGb: '0.10' });

    const activated = await request(test.runtime.app)
      .post(`/v1/tenants/${tenant.id}/activate`)
      .set('authorization', ownerBearer);

    expect(activated.status).toBe(200);
    expect((activated.body as TenantResponse).tenant.status).toBe('active');
  });

  it('only lets platform operators create root tenants', async () => {
    const { tenant } = await createRoot('golf-club-42', 'golf-course');
    const member = bearerFor(test.identities, {
      userId: 'club-admin',
      tenantId: tenant.id,
      roleClaims: [{ role: 'Owner', scope: 'tenant' }]
    });

    const response = await request(test.runtime.app)
      .post('/v1/tenants')
      .set('authorization', member)
      .send({ slug: 'rogue-club', name: 'Rogue Club', type: 'golf-course' });

    expect(response.status).toBe(403);
    expect((response.body as ErrorResponse).code).toBe('PERMISSION_DENIED');
  });

  it('rejects a slug that is already taken', async () => {
    await createRoot('golf-club-42', 'golf-course');

    const response = await request(test.runtime.app)
      .post('/v1/tenants')
      .set('authorization', platformOperator(test))
      .send({ slug: 'golf-club-42', name: 'Another Club', type: 'golf-course' });

    expect(response.status).toBe(409);
    expect((response.body as ErrorResponse).code).toBe('TENANT_SLUG_TAKEN');
  });

  it('derives child limits from the chain and exposes children to chain owners only', async () => {
    const chain = await createRoot('white-label-chain', 'enterprise-chain');

    const childResponse = await request(test.runtime.app)
      .post('/v1/tenants')
      .set('authorization', chain.ownerBearer)
      .send({ slug: 'chain-north', name: 'Chain North', type: 'golf-course', parentTenantId: chain.tenant.id, ownerUserId: 'north-owner' });

    expect(childResponse.status).toBe(201);
    const child = (childResponse.body as TenantResponse).tenant;
    expect(child.parentTenantId).toBe(chain.tenant.id);
    expect(child.limits.maxApiCallsPerMonth).toBe(100_000);
    expect(child.limits.rateLimitPerWindow).toBe(600);

    const childrenResponse = await request(test.runtime.app)
      .get(`/v1/tenants/${chain.tenant.id}/children`)
      .set('authorization', chain.ownerBearer);
    expect((childrenResponse.body as TenantListResponse).tenants.map((tenant) => tenant.slug)).toEqual(['chain-north']);

    const chainReadsChild = await request(test.runtime.app)
      .get(`/v1/tenants/${child.id}`)
      .set('authorization', chain.ownerBearer);
    expect(chainReadsChild.status).toBe(200);

    const childOwner = bearerFor(test.identities, { userId: 'north-owner', tenantId: child.id });
    const childReadsChain = await request(test.runtime.app)
      .get(`/v1/tenants/${chain.tenant.id}`)
      .set('authorization', childOwner);
    expect(childReadsChain.status).toBe(403);
    expect((childReadsChain.body as ErrorResponse).code).toBe('CROSS_TENANT_VIOLATION');
  });

  it('treats chain owners writing inside a child as a boundary violation', async () => {
    const chain = await createRoot('white-label-chain', 'enterprise-chain');
    const childResponse = await request(test.runtime.app)
      .post('/v1/tenants')
      .set('authorization', chain.ownerBearer)
      .send({ slug: 'chain-north', name: 'Chain North', type: 'golf-course', parentTenantId: chain.tenant.id, ownerUserId: 'north-owner' })
      .expect(201);
    const child = (childResponse.body as TenantResponse).tenant;

    const denied = await request(test.runtime.app)
      .post(`/v1/tenants/${child.id}/customers`)
      .set('authorization', chain.ownerBearer)
      .send({ email: 'member@chain-north.test', name: 'Member' });
    expect(denied.status).toBe(403);
    expect((denied.body as ErrorResponse).code).toBe('CROSS_TENANT_VIOLATION');

    const audit = await request(test.runtime.app)
      .get(`/v1/tenants/${chain.tenant.id}/audit-logs`)
      .query({ actions: 'security.cross_tenant_violation' })
      .set('authorization', chain.ownerBearer)
      .expect(200);
    expect((audit.body as { events: Array<{ actorUserId: string; metadata: Record<string, string> }> }).events.map((event) => [event.actorUserId, event.metadata]))
      .toEqual([['white-label-chain-owner', { requestingTenantId: chain.tenant.id, targetTenantId: child.id }]]);
  });

  it('refuses child limits above the chain allowance', async () => {
    const chain = await createRoot('white-label-chain', 'enterprise-chain');

    const response = await request(test.runtime.app)
      .post('/v1/tenants')
      .set('authorization', chain.ownerBearer)
      .send({
        slug: 'chain-south',
        name: 'Chain South',
        type: 'golf-course',
        parentTenantId: chain.tenant.id,
        limits: {
          maxUsers: 10,
          maxStorageGb: 1,
          maxApiCallsPerMonth: 2_000_000,
          maxBandwidthGb: 1,
          maxCustomDomains: 0,
          rateLimitPerWindow: 10
        }
      });

    expect(response.status).toBe(400);
    expect((response.body as ErrorResponse).code).toBe('TENANT_LIMITS_EXCEED_PARENT');
  });

  it('walks the lifecycle and refuses transitions out of archived', async () => {
    const { tenant, ownerBearer } = await createRoot('golf-club-42', 'golf-course');
    const app = test.runtime.app;

    await request(app).post(`/v1/tenants/${tenant.id}/activate`).set('authorization', ownerBearer).expect(200);

    const suspended = await request(app)
      .post(`/v1/tenants/${tenant.id}/suspend`)
      .set('authorization', ownerBearer)
      .send({ reason: 'non_payment' });
    expect((suspended.body as TenantResponse).tenant.suspensionReason).toBe('non_payment');

    const reinstated = await request(app).post(`/v1/tenants/${tenant.id}/reinstate`).set('authorization', ownerBearer);
    expect((reinstated.body as TenantResponse).tenant.status).toBe('active');
    expect((reinstated.body as TenantResponse).tenant.suspensionReason).toBeNull();

    await request(app).post(`/v1/tenants/${tenant.id}/archive`).set('authorization', ownerBearer).expect(200);

    const reactivated = await request(app).post(`/v1/tenants/${tenant.id}/reinstate`).set('authorization', ownerBearer);
    expect(reactivated.status).toBe(409);
    expect((reactivated.body as ErrorResponse).code).toBe('INVALID_STATE_TRANSITION');
  });

  it('applies settings with optimistic versioning', async () => {
    const { tenant, ownerBearer } = await createRoot('golf-club-42', 'golf-course');

    const updated = await request(test.runtime.app)
      .patch(`/v1/tenants/${tenant.id}`)
      .set('authorization', ownerBearer)
      .send({ expectedVersion: tenant.version, name: 'Golf Club 42', branding: { primaryColor: '#0a6b2f' } });

    expect(updated.status).toBe(200);
    expect((updated.body as TenantResponse).tenant.branding.primaryColor).toBe('#0a6b2f');

    const stale = await request(test.runtime.app)
      .patch(`/v1/tenants/${tenant.id}`)
      .set('authorization', ownerBearer)
      .send({ expectedVersion: tenant.version, name: 'Stale Name' });

    expect(stale.status).toBe(409);
    expect((stale.body as ErrorResponse).code).toBe('CONCURRENT_MODIFICATION');
  });

  it('grants roles that take effect on the next request', async () => {
    const { tenant, ownerBearer } = await createRoot('golf-club-42', 'golf-course');
    const analyst = bearerFor(test.identities, { userId: 'analyst-1', tenantId: tenant.id });

    const before = await request(test.runtime.app).get(`/v1/tenants/${tenant.id}`).set('authorization', analyst);
    expect(before.status).toBe(403);

    await request(test.runtime.app)
      .post(`/v1/tenants/${tenant.id}/roles`)
      .set('authorization', ownerBearer)
      .send({ userId: 'analyst-1', role: 'Analyst' })
      .expect(201);

    const after = await request(test.runtime.app).get(`/v1/tenants/${tenant.id}`).set('authorization', analyst);
    expect(after.status).toBe(200);
  });

  it('exports a tenant snapshot to its owner', async () => {
    const { tenant, ownerBearer } = await createRoot('golf-club-42', 'golf-course');

    const response = await request(test.runtime.app)
      .get(`/v1/tenants/${tenant.id}/export`)
      .set('authorization', ownerBearer)
      .expect(200);

    const { export: snapshot } = response.body as {
      export: { tenant: Tenant; roleAssignments: Array<{ userId: string; role: string }>; customers: unknown[]; revenueEvents: unknown[] };
    };
    expect(snapshot.tenant.slug).toBe('golf-club-42');
    expect(snapshot.roleAssignments.map(({ userId, role }) => [userId, role])).toEqual([['golf-club-42-owner', 'Owner']]);
    expect(snapshot.customers).toEqual([]);
    expect(snapshot.revenueEvents).toEqual([]);
  });

  it('resolves a tenant by slug only inside the caller boundary', async () => {
    const club = await createRoot('golf-club-42', 'golf-course');
    await createRoot('golf-club-43', 'golf-course');

    const own = await request(test.runtime.app).get('/v1/tenants/by-slug/golf-club-42').set('authorization', club.ownerBearer).expect(200);
    expect((own.body as TenantResponse).tenant.id).toBe(club.tenant.id);

    const other = await request(test.runtime.app).get('/v1/tenants/by-slug/golf-club-43').set('authorization', club.ownerBearer).expect(403);
    expect((other.body as ErrorResponse).code).toBe('CROSS_TENANT_VIOLATION');

    const missing = await request(test.runtime.app).get('/v1/tenants/by-slug/golf-club-99').set('authorization', club.ownerBearer).expect(403);
    expect((missing.body as ErrorResponse).code).toBe('CROSS_TENANT_VIOLATION');
  });

  it('answers health checks without an identity', async () => {
    const response = await request(test.runtime.app).get('/health').expect(200);
    expect(response.body).toEqual({ status: 'ok' });
  });
});
