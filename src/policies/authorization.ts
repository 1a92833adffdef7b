import { AppError } from '../errors/app-error.js';
import type { Principal } from '../auth/auth-context.js';
import type { OrgRole } from '../repositories/tenant-repository.js';

export const POLICY_ACTIONS = [
  'tenants.create_root',
  'tenants.create_child',
  'tenant.read',
  'tenant.update_settings',
  'tenant.manage_lifecycle',
  'roles.read',
  'roles.manage',
  'customers.read',
  'customers.manage',
  'subscriptions.read',
  'subscriptions.manage',
  'subscriptions.cancel',
  'invoices.read',
  'invoices.manage',
  'payments.charge',
  'payments.refund',
  'revenue.read',
  'revenue.record_manual',
  'analytics.read',
  'usage.read',
  'usage.manage_alerts',
  'exports.create',
  'audit_log.read',
  'billing.run_cycle'
] as const;

export type PolicyAction = (typeof POLICY_ACTIONS)[number];

/** Where the target sits relative to the principal's tenant, as established by the isolation guard. */
export type TargetRelation = 'own' | 'child';

export interface AuthorizationTarget {
  tenantId: string;
  relation: TargetRelation;
  ownerUserId?: string | null;
}

interface PolicyRule {
  allowedRoles: readonly OrgRole[];
  /** Parent-chain grants may exercise the action on a direct child tenant. */
  chainScoped: boolean;
  /** Refused while the target tenant is suspended, archived or still provisioning. */
  activeTenantOnly?: boolean;
}

interface AuthorizationDecision {
  allowed: boolean;
  reason?: string;
}

const READERS: readonly OrgRole[] = ['Owner', 'Admin', 'Billing', 'Analyst', 'Viewer'];
const FINANCE: readonly OrgRole[] = ['Owner', 'Admin', 'Billing'];

const POLICY_RULES: Record<PolicyAction, PolicyRule> = {
  'tenants.create_root': { allowedRoles: ['Owner', 'Admin'], chainScoped: false },
  'tenants.create_child': { allowedRoles: ['Owner', 'Admin'], chainScoped: false },
  'tenant.read': { allowedRoles: READERS, chainScoped: true },
  'tenant.update_settings': { allowedRoles: ['Owner', 'Admin'], chainScoped: true },
  'tenant.manage_lifecycle': { allowedRoles: ['Owner', 'Admin'], chainScoped: true },
  'roles.read': { allowedRoles: ['Owner', 'Admin'], chainScoped: true },
  'roles.manage': { allowedRoles: ['Owner', 'Admin'], chainScoped: false },
  'customers.read': { allowedRoles: [...FINANCE, 'Analyst', 'Viewer'], chainScoped: true },
  'customers.manage': { allowedRoles: FINANCE, chainScoped: false, activeTenantOnly: true },
  'subscriptions.read': { allowedRoles: READERS, chainScoped: true },
  'subscriptions.manage': { allowedRoles: FINANCE, chainScoped: false, activeTenantOnly: true },
  'subscriptions.cancel': { allowedRoles: FINANCE, chainScoped: false },
  'invoices.read': { allowedRoles: [...FINANCE, 'Analyst'], chainScoped: true },
  'invoices.manage': { allowedRoles: FINANCE, chainScoped: false, activeTenantOnly: true },
  'payments.charge': { allowedRoles: FINANCE, chainScoped: false, activeTenantOnly: true },
  'payments.refund': { allowedRoles: ['Owner', 'Billing'], chainScoped: false },
  'revenue.read': { allowedRoles: [...FINANCE, 'Analyst'], chainScoped: true },
  'revenue.record_manual': { allowedRoles: ['Owner', 'Billing'], chainScoped: false, activeTenantOnly: true },
  'analytics.read': { allowedRoles: [...FINANCE, 'Analyst'], chainScoped: true },
  'usage.read': { allowedRoles: READERS, chainScoped: true },
  'usage.manage_alerts': { allowedRoles: ['Owner', 'Admin'], chainScoped: true },
  'exports.create': { allowedRoles: ['Owner', 'Admin'], chainScoped: false },
  'audit_log.read': { allowedRoles: ['Owner', 'Admin'], chainScoped: true },
  'billing.run_cycle': { allowedRoles: ['Owner', 'Admin', 'Billing'], chainScoped: false }
};

export function requiresActiveTenant(action: PolicyAction): boolean {
  return POLICY_RULES[action].activeTenantOnly === true;
}

export function authorize(
  action: PolicyAction,
  principal: Principal,
  target: AuthorizationTarget
): AuthorizationDecision {
  const rule = POLICY_RULES[action];

  for (const grant of principal.grants) {
    if (grant.tenantId !== principal.tenantId || !rule.allowedRoles.includes(grant.role)) {
      continue;
    }

    if (target.relation === 'child') {
      if (rule.chainScoped && grant.scope === 'parent-chain') {
        return { allowed: true };
      }

      continue;
    }

    if (grant.scope !== 'self' || target.ownerUserId === principal.userId) {
      return { allowed: true };
    }
  }

  return {
    allowed: false,
    reason: `Missing permission for action '${action}'.`
  };
}

export function assertAuthorized(
  action: PolicyAction,
  principal: Principal,
  target: AuthorizationTarget
): void {
  const decision = authorize(action, principal, target);

  if (!decision.allowed) {
    throw new AppError(403, 'PERMISSION_DENIED', decision.reason ?? 'Permission denied.');
  }
}
