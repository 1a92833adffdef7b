import type { Principal } from '../auth/auth-context.js';
import { KeyedMutex } from '../concurrency/keyed-mutex.js';
import { childDefaultLimits, DEFAULT_OVERAGE_RATES, defaultLimitsFor, limitsExceeding } from '../domain/tenant-defaults.js';
import { normalizeCurrency } from '../domain/money.js';
import { AppError } from '../errors/app-error.js';
import { InvalidStateTransition, NotFoundError } from '../errors/domain-errors.js';
import type {
  OrgRole,
  OverageRates,
  PermissionScope,
  RoleAssignment,
  SuspensionReason,
  Tenant,
  TenantBranding,
  TenantChanges,
  TenantLimits,
  TenantRepository,
  TenantStatus,
  TenantType
} from '../repositories/tenant-repository.js';
import type { AuditRequestContext, AuditService } from './audit-service.js';
import type { SecurityService } from './security-service.js';

export const TENANT_SLUG_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

const TENANT_TRANSITIONS: Record<TenantStatus, readonly TenantStatus[]> = {
  provisioning: ['active'],
  active: ['suspended', 'archived'],
  suspended: ['active', 'archived'],
  archived: []
};

const EMPTY_BRANDING: TenantBranding = {
  primaryColor: null,
  secondaryColor: null,
  logoUrl: null,
  customDomain: null
};

export interface TenantServiceConfig {
  platformTenantSlug: string;
}

export interface CreateTenantSpec {
  slug: string;
  name: string;
  type: TenantType;
  parentTenantId?: string | null;
  branding?: Partial<TenantBranding>;
  featureFlags?: string[];
  limits?: TenantLimits;
  overageRates?: OverageRates;
  currency?: string;
  /** Granted `Owner` on the new tenant. */
  ownerUserId?: string;
}

export interface TenantPatch {
  expectedVersion: number;
  slug?: string;
  name?: string;
  branding?: Partial<TenantBranding>;
  featureFlags?: string[];
  limits?: TenantLimits;
  overageRates?: OverageRates;
}

export interface AssignRoleSpec {
  userId: string;
  role: OrgRole;
  scope: PermissionScope;
}

function assertSlug(slug: string): void {
  if (slug.length > 63 || !TENANT_SLUG_PATTERN.test(slug)) {
    throw new AppError(400, 'TENANT_SLUG_INVALID', 'Slug must be lowercase letters, digits and single hyphens, at most 63 characters.');
  }
}

function assertWithinParent(limits: TenantLimits, parent: TenantLimits): void {
  const exceeded = limitsExceeding(limits, parent);
  if (exceeded.length > 0) {
    throw new AppError(400, 'TENANT_LIMITS_EXCEED_PARENT', 'Child tenant limits cannot exceed the parent tenant limits.', { exceeded });
  }
}

export class TenantService {
  private readonly chainLocks = new KeyedMutex();

  public constructor(
    private readonly tenantRepository: TenantRepository,
    private readonly securityService: SecurityService,
    private readonly auditService: AuditService,
    private readonly config: TenantServiceConfig
  ) {}

  /** Idempotent; run once at start-up. */
  public async bootstrapPlatformTenant(): Promise<Tenant> {
    const existing = await this.tenantRepository.findTenantBySlug(this.config.platformTenantSlug);
    if (existing !== null) {
      return existing;
    }

    const tenant = await this.tenantRepository.createTenant({
      slug: this.config.platformTenantSlug,
      name: 'Platform',
      type: 'enterprise-chain',
      parentTenantId: null,
      branding: { ...EMPTY_BRANDING },
      featureFlags: [],
      limits: defaultLimitsFor('enterprise-chain'),
      overageRates: { ...DEFAULT_OVERAGE_RATES },
      currency: 'USD',
      status: 'active'
    });

    console.log('platform_tenant_bootstrapped', { tenantId: tenant.id, slug: tenant.slug });
    return tenant;
  }

  public async createTenant(principal: Principal, spec: CreateTenantSpec, context: AuditRequestContext | null = null): Promise<Tenant> {
    assertSlug(spec.slug);
    const name = spec.name.trim();
    if (name.length < 3) {
      throw new AppError(400, 'TENANT_NAME_INVALID', 'Tenant name must be at least 3 characters long.');
    }

    const parentTenantId = spec.parentTenantId ?? null;
    const create = async (): Promise<Tenant> => {
      let limits = spec.limits ?? defaultLimitsFor(spec.type);

      if (parentTenantId === null) {
        await this.securityService.authorizePlatform('tenants.create_root', principal);
      } else {
        const parent = await this.securityService.authorize(
          'tenants.create_child',
          principal,
          { tenantId: parentTenantId, resourceType: 'tenant', resourceId: parentTenantId },
          context
        );

        if (parent.type !== 'enterprise-chain' || parent.status === 'archived') {
          throw new AppError(400, 'TENANT_PARENT_INVALID', 'Only an enterprise chain that is not archived can own child tenants.');
        }

        limits = spec.limits ?? childDefaultLimits(parent.limits);
        assertWithinParent(limits, parent.limits);
      }

      return this.tenantRepository.createTenant({
        slug: spec.slug,
        name,
        type: spec.type,
        parentTenantId,
        branding: { ...EMPTY_BRANDING, ...spec.branding },
        featureFlags: [...new Set(spec.featureFlags ?? [])],
        limits,
        overageRates: spec.overageRates ?? { ...DEFAULT_OVERAGE_RATES },
        currency: normalizeCurrency(spec.currency ?? 'USD'),
        status: 'provisioning'
      });
    };

    const tenant = parentTenantId === null ? await create() : await this.chainLocks.runExclusive(parentTenantId, create);

    if (spec.ownerUserId !== undefined) {
      await this.tenantRepository.assignRole({
        tenantId: tenant.id,
        userId: spec.ownerUserId,
        role: 'Owner',
        scope: tenant.type === 'enterprise-chain' ? 'parent-chain' : 'tenant'
      });
    }

    await this.auditService.recordSafely({
      tenantId: tenant.id,
      actorUserId: principal.userId,
      action: 'tenant.created',
      targetType: 'tenant',
      targetId: tenant.id,
      metadata: { slug: tenant.slug, type: tenant.type, parentTenantId },
      ...context
    });

    return tenant;
  }

  public async resolveTenant(principal: Principal, tenantId: string, context: AuditRequestContext | null = null): Promise<Tenant> {
    return this.securityService.authorize('tenant.read', principal, { tenantId, resourceType: 'tenant', resourceId: tenantId }, context);
  }

  public async resolveTenantBySlug(principal: Principal, slug: string, context: AuditRequestContext | null = null): Promise<Tenant> {
    const tenant = await this.tenantRepository.findTenantBySlug(slug);
    if (tenant === null) {
      // Reported as a boundary violation so unknown slugs look like foreign ones.
      await this.securityService.validateBoundary(principal, { tenantId: slug, resourceType: 'tenant_slug', resourceId: slug }, context);
      throw new NotFoundError('TENANT_NOT_FOUND', 'Tenant not found.');
    }

    return this.resolveTenant(principal, tenant.id, context);
  }

  public async listChildren(principal: Principal, parentTenantId: string, context: AuditRequestContext | null = null): Promise<Tenant[]> {
    await this.resolveTenant(principal, parentTenantId, context);
    return this.tenantRepository.listChildren(parentTenantId);
  }

  public async updateTenant(
    principal: Principal,
    tenantId: string,
    patch: TenantPatch,
    context: AuditRequestContext | null = null
  ): Promise<Tenant> {
    const current = await this.securityService.authorize(
      'tenant.update_settings',
      principal,
      { tenantId, resourceType: 'tenant', resourceId: tenantId },
      context
    );

    if (patch.slug !== undefined && patch.slug !== current.slug) {
      assertSlug(patch.slug);
      if (current.status !== 'provisioning') {
        throw new AppError(409, 'TENANT_SLUG_IMMUTABLE', 'The slug cannot change once the tenant has been activated.');
      }
    }

    return this.chainLocks.runExclusive(current.parentTenantId ?? current.id, async () => {
      if (patch.limits !== undefined) {
        await this.assertLimitsFitChain(current, patch.limits);
      }

      const changes: TenantChanges = {
        ...(patch.slug === undefined ? {} : { slug: patch.slug }),
        ...(patch.name === undefined ? {} : { name: patch.name.trim() }),
        ...(patch.branding === undefined ? {} : { branding: { ...current.branding, ...patch.branding } }),
        ...(patch.featureFlags === undefined ? {} : { featureFlags: [...new Set(patch.featureFlags)] }),
        ...(patch.limits === undefined ? {} : { limits: patch.limits }),
        ...(patch.overageRates === undefined ? {} : { overageRates: patch.overageRates })
      };

      const updated = await this.requireUpdated(tenantId, patch.expectedVersion, changes);

      await this.auditService.recordSafely({
        tenantId,
        actorUserId: principal.userId,
        action: 'tenant.updated',
        targetType: 'tenant',
        targetId: tenantId,
        metadata: { fields: Object.keys(changes), version: updated.version },
        ...context
      });

      return updated;
    });
  }

  public activateTenant(principal: Principal, tenantId: string, context: AuditRequestContext | null = null): Promise<Tenant> {
    return this.transition(principal, tenantId, 'active', null, context, 'provisioning');
  }

  public suspendTenant(
    principal: Principal,
    tenantId: string,
    reason: SuspensionReason,
    context: AuditRequestContext | null = null
  ): Promise<Tenant> {
    return this.transition(principal, tenantId, 'suspended', reason, context);
  }

  public reinstateTenant(principal: Principal, tenantId: string, context: AuditRequestContext | null = null): Promise<Tenant> {
    return this.transition(principal, tenantId, 'active', null, context, 'suspended');
  }

  public archiveTenant(principal: Principal, tenantId: string, context: AuditRequestContext | null = null): Promise<Tenant> {
    return this.transition(principal, tenantId, 'archived', null, context);
  }

  public async assignRole(
    principal: Principal,
    tenantId: string,
    spec: AssignRoleSpec,
    context: AuditRequestContext | null = null
  ): Promise<RoleAssignment> {
    const tenant = await this.securityService.authorize(
      'roles.manage',
      principal,
      { tenantId, resourceType: 'role_assignment', resourceId: spec.userId },
      context
    );

    if (spec.scope === 'parent-chain' && tenant.type !== 'enterprise-chain') {
      throw new AppError(400, 'ROLE_SCOPE_INVALID', 'Parent-chain scope is only available on enterprise chains.');
    }

    const grantsOwner = principal.grants.some((grant) => grant.tenantId === tenantId && grant.role === 'Owner');
    if (spec.role === 'Owner' && !grantsOwner) {
      throw new AppError(403, 'PERMISSION_DENIED', 'Only an owner can grant the Owner role.');
    }

    const assignment = await this.tenantRepository.assignRole({ tenantId, ...spec });

    await this.auditService.recordSafely({
      tenantId,
      actorUserId: principal.userId,
      action: 'role.assigned',
      targetType: 'user',
      targetId: spec.userId,
      metadata: { role: spec.role, scope: spec.scope },
      ...context
    });

    return assignment;
  }

  public async listRoleAssignments(principal: Principal, tenantId: string, context: AuditRequestContext | null = null): Promise<RoleAssignment[]> {
    await this.securityService.authorize('roles.read', principal, { tenantId, resourceType: 'role_assignment' }, context);
    return this.tenantRepository.listRoleAssignments(tenantId);
  }

  private async transition(
    principal: Principal,
    tenantId: string,
    next: TenantStatus,
    reason: SuspensionReason | null,
    context: AuditRequestContext | null,
    requiredFrom?: TenantStatus
  ): Promise<Tenant> {
    const current = await this.securityService.authorize(
      'tenant.manage_lifecycle',
      principal,
      { tenantId, resourceType: 'tenant', resourceId: tenantId },
      context
    );

    const allowed = requiredFrom === undefined || current.status === requiredFrom;
    if (!allowed || !TENANT_TRANSITIONS[current.status].includes(next)) {
      throw new InvalidStateTransition('tenant', current.status, next);
    }

    const updated = await this.requireUpdated(tenantId, current.version, {
      status: next,
      suspensionReason: next === 'suspended' ? reason : null
    });

    console.log('tenant_status_changed', { tenantId, from: current.status, to: next, reason });
    await this.auditService.recordSafely({
      tenantId,
      actorUserId: principal.userId,
      action: 'tenant.status_changed',
      targetType: 'tenant',
      targetId: tenantId,
      metadata: { from: current.status, to: next, reason },
      ...context
    });

    return updated;
  }

  private async assertLimitsFitChain(tenant: Tenant, limits: TenantLimits): Promise<void> {
    if (tenant.parentTenantId !== null) {
      const parent = await this.tenantRepository.findTenantById(tenant.parentTenantId);
      if (parent !== null) {
        assertWithinParent(limits, parent.limits);
      }
    }

    const children = await this.tenantRepository.listChildren(tenant.id);
    const blocking = children.filter((child) => limitsExceeding(child.limits, limits).length > 0);
    if (blocking.length > 0) {
      throw new AppError(400, 'TENANT_LIMITS_BELOW_CHILDREN', 'Limits cannot drop below those already granted to child tenants.', {
        childTenantIds: blocking.map((child) => child.id)
      });
    }
  }

  private async requireUpdated(tenantId: string, expectedVersion: number, changes: TenantChanges): Promise<Tenant> {
    const updated = await this.tenantRepository.updateTenant({ tenantId, expectedVersion, changes });
    if (updated === null) {
      throw new NotFoundError('TENANT_NOT_FOUND', 'Tenant not found.');
    }

    return updated;
  }
}
