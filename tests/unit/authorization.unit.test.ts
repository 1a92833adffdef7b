import { describe, expect, it } from 'vitest';

import { mergeGrants, type Principal } from '../../src/auth/auth-context.js';
import { AppError } from '../../src/errors/app-error.js';
import { assertAuthorized, authorize, requiresActiveTenant } from '../../src/policies/authorization.js';
import type { OrgRole, PermissionScope } from '../../src/repositories/tenant-repository.js';

function principal(role: OrgRole, scope: PermissionScope = 'tenant'): Principal {
  return {
    userId: 'user-1',
    tenantId: 'tenant-1',
    grants: [{ tenantId: 'tenant-1', role, scope }]
  };
}

const own = { tenantId: 'tenant-1', relation: 'own' as const };
const child = { tenantId: 'tenant-2', relation: 'child' as const };

describe('authorization policy matrix', () => {
  it('allows a viewer to read the tenant but not to update its settings', () => {
    expect(authorize('tenant.read', principal('Viewer'), own).allowed).toBe(true);
    expect(authorize('tenant.update_settings', principal('Viewer'), own).allowed).toBe(false);
  });

  it('limits refunds to owners and billing managers', () => {
    expect(authorize('payments.refund', principal('Billing'), own).allowed).toBe(true);
    expect(authorize('payments.refund', principal('Owner'), own).allowed).toBe(true);
    expect(authorize('payments.refund', principal('Admin'), own).allowed).toBe(false);
  });

  it('keeps analysts out of subscription management', () => {
    expect(authorize('analytics.read', principal('Analyst'), own).allowed).toBe(true);
    expect(authorize('subscriptions.manage', principal('Analyst'), own).allowed).toBe(false);
  });

  it('lets parent-chain grants read child tenants but not manage them', () => {
    const chainOwner = principal('Owner', 'parent-chain');

    expect(authorize('revenue.read', chainOwner, child).allowed).toBe(true);
    expect(authorize('subscriptions.manage', chainOwner, child).allowed).toBe(false);
    expect(authorize('revenue.read', principal('Owner'), child).allowed).toBe(false);
  });

  it('restricts self-scoped grants to resources the user owns', () => {
    const selfScoped = principal('Viewer', 'self');

    expect(authorize('usage.read', selfScoped, { ...own, ownerUserId: 'user-1' }).allowed).toBe(true);
    expect(authorize('usage.read', selfScoped, { ...own, ownerUserId: 'user-2' }).allowed).toBe(false);
  });

  it('ignores grants issued for another tenant', () => {
    const foreign: Principal = {
      userId: 'user-1',
      tenantId: 'tenant-1',
      grants: [{ tenantId: 'tenant-9', role: 'Owner', scope: 'tenant' }]
    };

    expect(authorize('tenant.read', foreign, own).allowed).toBe(false);
  });

  it('keeps the widest scope when grants are merged', () => {
    const merged = mergeGrants([
      { tenantId: 'tenant-1', role: 'Owner', scope: 'tenant' },
      { tenantId: 'tenant-1', role: 'Owner', scope: 'parent-chain' },
      { tenantId: 'tenant-1', role: 'Viewer', scope: 'self' }
    ]);

    expect(merged).toEqual([
      { tenantId: 'tenant-1', role: 'Owner', scope: 'parent-chain' },
      { tenantId: 'tenant-1', role: 'Viewer', scope: 'self' }
    ]);
  });

  it('holds money-moving writes to active tenants but lets cancellations through', () => {
    expect(requiresActiveTenant('payments.charge')).toBe(true);
    expect(requiresActiveTenant('subscriptions.manage')).toBe(true);
    expect(requiresActiveTenant('subscriptions.cancel')).toBe(false);
    expect(requiresActiveTenant('revenue.read')).toBe(false);
  });

  it('assertAuthorized throws AppError for denied actions', () => {
    expect(() => {
      assertAuthorized('billing.run_cycle', principal('Viewer'), own);
    }).toThrowError(AppError);
  });
});
