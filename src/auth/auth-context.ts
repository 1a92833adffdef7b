import type { OrgRole, PermissionScope } from '../repositories/tenant-repository.js';

export interface RoleGrant {
  tenantId: string;
  role: OrgRole;
  scope: PermissionScope;
}

/** The caller of a request: an external identity resolved to a user acting inside one tenant. */
export interface Principal {
  userId: string;
  tenantId: string;
  grants: readonly RoleGrant[];
}

export function hasChainGrant(principal: Principal): boolean {
  return principal.grants.some((grant) => grant.tenantId === principal.tenantId && grant.scope === 'parent-chain');
}

export function mergeGrants(grants: readonly RoleGrant[]): RoleGrant[] {
  const byKey = new Map<string, RoleGrant>();
  const rank: Record<PermissionScope, number> = { self: 0, tenant: 1, 'parent-chain': 2 };

  for (const grant of grants) {
    const key = `${grant.tenantId}:${grant.role}`;
    const existing = byKey.get(key);
    if (existing === undefined || rank[grant.scope] > rank[existing.scope]) {
      byKey.set(key, grant);
    }
  }

  return [...byKey.values()];
}
