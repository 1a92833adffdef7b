import { hasChainGrant, mergeGrants, type Principal, type RoleGrant } from '../auth/auth-context.js';
import { AppError } from '../errors/app-error.js';
import { CrossTenantViolation, NotFoundError } from '../errors/domain-errors.js';
import type { ResolvedIdentity } from '../identity/identity-provider.js';
import {
  assertAuthorized,
  authorize as evaluatePolicy,
  requiresActiveTenant,
  type PolicyAction,
  type TargetRelation
} from '../policies/authorization.js';
import type { Tenant, TenantRepository } from '../repositories/tenant-repository.js';
import { recordBoundaryViolation } from '../telemetry/metrics.js';
import type { AuditRequestContext, AuditService } from './audit-service.js';

export interface ResourceRef {
  tenantId: string;
  resourceType: string;
  resourceId?: string | null;
  /** Owning user, for resources that `self`-scoped grants may reach. */
  ownerUserId?: string | null;
}

export interface BoundaryDecision {
  relation: TargetRelation;
  tenant: Tenant;
}

export interface SecurityServiceConfig {
  platformTenantSlug: string;
}

/**
 * Tenant isolation guard. Every access to a tenant-owned resource passes
 * `validateBoundary`; denials are raised, logged and audited, never filtered.
 */
export class SecurityService {
  public constructor(
    private readonly tenantRepository: TenantRepository,
    private readonly auditService: AuditService,
    private readonly config: SecurityServiceConfig
  ) {}

  public async principalFor(identity: ResolvedIdentity): Promise<Principal> {
    const claimed: RoleGrant[] = identity.roleClaims.map((claim) => ({
      tenantId: identity.tenantId,
      role: claim.role,
      scope: claim.scope
    }));

    const stored = (await this.tenantRepository.listRoleAssignmentsForUser(identity.userId))
      .filter((assignment) => assignment.tenantId === identity.tenantId)
      .map((assignment): RoleGrant => ({
        tenantId: assignment.tenantId,
        role: assignment.role,
        scope: assignment.scope
      }));

    return {
      userId: identity.userId,
      tenantId: identity.tenantId,
      grants: mergeGrants([...claimed, ...stored])
    };
  }

  public async validateBoundary(
    principal: Principal,
    target: ResourceRef,
    context: AuditRequestContext | null = null
  ): Promise<BoundaryDecision> {
    if (target.tenantId === principal.tenantId) {
      const tenant = await this.tenantRepository.findTenantById(target.tenantId);
      if (tenant === null) {
        throw new NotFoundError('TENANT_NOT_FOUND', 'Tenant not found.');
      }

      return { relation: 'own', tenant };
    }

    const tenant = await this.tenantRepository.findTenantById(target.tenantId);
    if (tenant !== null && tenant.parentTenantId === principal.tenantId && hasChainGrant(principal)) {
      return { relation: 'child', tenant };
    }

    return this.reportViolation(principal, target, context);
  }

  /** Boundary check followed by the role/action policy, evaluated over the grants that reach the target. */
  public async authorize(
    action: PolicyAction,
    principal: Principal,
    target: ResourceRef,
    context: AuditRequestContext | null = null
  ): Promise<Tenant> {
    const decision = await this.validateBoundary(principal, target, context);
    const policyTarget = {
      tenantId: target.tenantId,
      relation: decision.relation,
      ownerUserId: target.ownerUserId ?? null
    };

    // Inside a child tenant only chain-scoped permissions apply; anything else crosses the boundary.
    if (decision.relation === 'child' && !evaluatePolicy(action, principal, policyTarget).allowed) {
      return this.reportViolation(principal, target, context);
    }

    assertAuthorized(action, principal, policyTarget);

    if (requiresActiveTenant(action) && decision.tenant.status !== 'active') {
      throw new AppError(409, 'TENANT_NOT_ACTIVE', `Action '${action}' needs an active tenant.`, { status: decision.tenant.status });
    }

    return decision.tenant;
  }

  /** Renewals and other unattended charges only run for active tenants. */
  public async tenantIsActive(tenantId: string): Promise<boolean> {
    const tenant = await this.tenantRepository.findTenantById(tenantId);
    return tenant !== null && tenant.status === 'active';
  }

  public async authorizePlatform(action: PolicyAction, principal: Principal): Promise<void> {
    const tenant = await this.tenantRepository.findTenantById(principal.tenantId);
    if (tenant === null || tenant.slug !== this.config.platformTenantSlug) {
      throw new AppError(403, 'PERMISSION_DENIED', `Action '${action}' requires a platform operator.`);
    }

    assertAuthorized(action, principal, { tenantId: tenant.id, relation: 'own' });
  }

  private async reportViolation(principal: Principal, target: ResourceRef, context: AuditRequestContext | null): Promise<never> {
    const violation = new CrossTenantViolation({
      requestingTenantId: principal.tenantId,
      targetTenantId: target.tenantId,
      resourceType: target.resourceType,
      resourceId: target.resourceId ?? null
    });

    recordBoundaryViolation(target.resourceType);
    console.warn('tenant_boundary_violation', {
      ...violation.violation,
      userId: principal.userId,
      traceId: context?.traceId ?? null
    });

    await this.auditService.recordSafely({
      tenantId: principal.tenantId,
      actorUserId: principal.userId,
      action: 'security.cross_tenant_violation',
      targetType: target.resourceType,
      targetId: target.resourceId ?? null,
      metadata: {
        requestingTenantId: principal.tenantId,
        targetTenantId: target.tenantId
      },
      traceId: context?.traceId ?? null,
      ipAddress: context?.ipAddress ?? null,
      userAgent: context?.userAgent ?? null
    });

    throw violation;
  }
}
