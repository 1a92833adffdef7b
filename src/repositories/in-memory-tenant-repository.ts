import { randomUUID } from 'node:crypto';

import { ConcurrentModificationError, DuplicateError } from '../errors/domain-errors.js';
import type {
  AssignRoleInput,
  CreateTenantInput,
  RoleAssignment,
  Tenant,
  TenantRepository,
  UpdateTenantInput
} from './tenant-repository.js';

function cloneTenant(tenant: Tenant): Tenant {
  return {
    ...tenant,
    branding: { ...tenant.branding },
    featureFlags: [...tenant.featureFlags],
    limits: { ...tenant.limits },
    overageRates: { ...tenant.overageRates },
    createdAt: new Date(tenant.createdAt),
    updatedAt: new Date(tenant.updatedAt)
  };
}

function cloneAssignment(assignment: RoleAssignment): RoleAssignment {
  return {
    ...assignment,
    createdAt: new Date(assignment.createdAt)
  };
}

function assignmentKey(input: AssignRoleInput): string {
  return `${input.tenantId}:${input.userId}:${input.role}`;
}

export class InMemoryTenantRepository implements TenantRepository {
  private readonly tenantsById = new Map<string, Tenant>();

  private readonly tenantIdsBySlug = new Map<string, string>();

  private readonly assignmentsByKey = new Map<string, RoleAssignment>();

  public createTenant(input: CreateTenantInput): Promise<Tenant> {
    if (this.tenantIdsBySlug.has(input.slug)) {
      return Promise.reject(new DuplicateError('TENANT_SLUG_TAKEN', `Tenant slug '${input.slug}' is already in use.`));
    }

    const now = new Date();
    const tenant: Tenant = {
      id: randomUUID(),
      ...input,
      suspensionReason: null,
      version: 1,
      createdAt: now,
      updatedAt: now
    };

    this.tenantsById.set(tenant.id, cloneTenant(tenant));
    this.tenantIdsBySlug.set(tenant.slug, tenant.id);
    return Promise.resolve(cloneTenant(tenant));
  }

  public findTenantById(tenantId: string): Promise<Tenant | null> {
    const tenant = this.tenantsById.get(tenantId);
    return Promise.resolve(tenant === undefined ? null : cloneTenant(tenant));
  }

  public findTenantBySlug(slug: string): Promise<Tenant | null> {
    const tenantId = this.tenantIdsBySlug.get(slug);
    return tenantId === undefined ? Promise.resolve(null) : this.findTenantById(tenantId);
  }

  public listChildren(parentTenantId: string): Promise<Tenant[]> {
    const children = [...this.tenantsById.values()]
      .filter((tenant) => tenant.parentTenantId === parentTenantId)
      .sort((left, right) => left.slug.localeCompare(right.slug))
      .map(cloneTenant);

    return Promise.resolve(children);
  }

  public updateTenant(input: UpdateTenantInput): Promise<Tenant | null> {
    const existing = this.tenantsById.get(input.tenantId);
    if (existing === undefined) {
      return Promise.resolve(null);
    }

    if (existing.version !== input.expectedVersion) {
      return Promise.reject(new ConcurrentModificationError('tenant', input.tenantId));
    }

    const nextSlug = input.changes.slug;
    if (nextSlug !== undefined && nextSlug !== existing.slug) {
      if (this.tenantIdsBySlug.has(nextSlug)) {
        return Promise.reject(new DuplicateError('TENANT_SLUG_TAKEN', `Tenant slug '${nextSlug}' is already in use.`));
      }

      this.tenantIdsBySlug.delete(existing.slug);
      this.tenantIdsBySlug.set(nextSlug, existing.id);
    }

    const updated: Tenant = {
      ...existing,
      ...input.changes,
      version: existing.version + 1,
      updatedAt: new Date()
    };

    this.tenantsById.set(updated.id, cloneTenant(updated));
    return Promise.resolve(cloneTenant(updated));
  }

  public assignRole(input: AssignRoleInput): Promise<RoleAssignment> {
    const key = assignmentKey(input);
    const existing = this.assignmentsByKey.get(key);

    const assignment: RoleAssignment = existing === undefined
      ? {
          id: randomUUID(),
          ...input,
          createdAt: new Date()
        }
      : {
          ...existing,
          scope: input.scope
        };

    this.assignmentsByKey.set(key, assignment);
    return Promise.resolve(cloneAssignment(assignment));
  }

  public listRoleAssignments(tenantId: string): Promise<RoleAssignment[]> {
    return Promise.resolve(
      [...this.assignmentsByKey.values()]
        .filter((assignment) => assignment.tenantId === tenantId)
        .map(cloneAssignment)
    );
  }

  public listRoleAssignmentsForUser(userId: string): Promise<RoleAssignment[]> {
    return Promise.resolve(
      [...this.assignmentsByKey.values()]
        .filter((assignment) => assignment.userId === userId)
        .map(cloneAssignment)
    );
  }
}
