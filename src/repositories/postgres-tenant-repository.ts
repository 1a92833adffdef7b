import { randomUUID } from 'node:crypto';

import type { Pool } from 'pg';

import { getSingleRow, isUniqueViolation, withTransaction } from '../db/pg-helpers.js';
import { ConcurrentModificationError, DuplicateError } from '../errors/domain-errors.js';
import type {
  AssignRoleInput,
  CreateTenantInput,
  OrgRole,
  OverageRates,
  PermissionScope,
  RoleAssignment,
  SuspensionReason,
  Tenant,
  TenantBranding,
  TenantLimits,
  TenantRepository,
  TenantStatus,
  TenantType,
  UpdateTenantInput
} from './tenant-repository.js';

interface TenantRow {
  id: string;
  slug: string;
  name: string;
  type: TenantType;
  parent_tenant_id: string | null;
  branding: TenantBranding;
  feature_flags: string[];
  limits: TenantLimits;
  overage_rates: OverageRates;
  currency: string;
  status: TenantStatus;
  suspension_reason: SuspensionReason | null;
  version: number;
  created_at: Date;
  updated_at: Date;
}

interface RoleAssignmentRow {
  id: string;
  tenant_id: string;
  user_id: string;
  role: OrgRole;
  scope: PermissionScope;
  created_at: Date;
}

function mapTenant(row: TenantRow): Tenant {
  return {
    id: row.id,
    slug: row.slug,
    name: row.name,
    type: row.type,
    parentTenantId: row.parent_tenant_id,
    branding: row.branding,
    featureFlags: row.feature_flags,
    limits: row.limits,
    overageRates: row.overage_rates,
    currency: row.currency,
    status: row.status,
    suspensionReason: row.suspension_reason,
    version: row.version,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

function mapAssignment(row: RoleAssignmentRow): RoleAssignment {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    userId: row.user_id,
    role: row.role,
    scope: row.scope,
    createdAt: row.created_at
  };
}

export class PostgresTenantRepository implements TenantRepository {
  public constructor(private readonly pool: Pool) {}

  public async createTenant(input: CreateTenantInput): Promise<Tenant> {
    try {
      return await withTransaction(this.pool, null, async (client) => {
        const result = await client.query<TenantRow>(
          `
          INSERT INTO tenants (
            id, slug, name, type, parent_tenant_id, branding, feature_flags,
            limits, overage_rates, currency, status, version, created_at, updated_at
          )
          VALUES ($1, $2, $3, $4, $5, $6::jsonb, $7::jsonb, $8::jsonb, $9::jsonb, $10, $11, 1, NOW(), NOW())
          RETURNING *
          `,
          [
            randomUUID(),
            input.slug,
            input.name,
            input.type,
            input.parentTenantId,
            JSON.stringify(input.branding),
            JSON.stringify(input.featureFlags),
            JSON.stringify(input.limits),
            JSON.stringify(input.overageRates),
            input.currency,
            input.status
          ]
        );

        const row = getSingleRow(result.rows);
        if (row === null) {
          throw new Error('Failed to create tenant.');
        }

        return mapTenant(row);
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateError('TENANT_SLUG_TAKEN', `Tenant slug '${input.slug}' is already in use.`);
      }

      throw error;
    }
  }

  public async findTenantById(tenantId: string): Promise<Tenant | null> {
    return withTransaction(this.pool, null, async (client) => {
      const result = await client.query<TenantRow>('SELECT * FROM tenants WHERE id = $1 LIMIT 1', [tenantId]);
      const row = getSingleRow(result.rows);
      return row === null ? null : mapTenant(row);
    });
  }

  public async findTenantBySlug(slug: string): Promise<Tenant | null> {
    return withTransaction(this.pool, null, async (client) => {
      const result = await client.query<TenantRow>('SELECT * FROM tenants WHERE slug = $1 LIMIT 1', [slug]);
      const row = getSingleRow(result.rows);
      return row === null ? null : mapTenant(row);
    });
  }

  public async listChildren(parentTenantId: string): Promise<Tenant[]> {
    return withTransaction(this.pool, null, async (client) => {
      const result = await client.query<TenantRow>(
        'SELECT * FROM tenants WHERE parent_tenant_id = $1 ORDER BY slug ASC',
        [parentTenantId]
      );

      return result.rows.map(mapTenant);
    });
  }

  public async updateTenant(input: UpdateTenantInput): Promise<Tenant | null> {
    try {
      return await withTransaction(this.pool, input.tenantId, async (client) => {
        const current = await client.query<TenantRow>('SELECT * FROM tenants WHERE id = $1 FOR UPDATE', [input.tenantId]);
        const existing = getSingleRow(current.rows);
        if (existing === null) {
          return null;
        }

        if (existing.version !== input.expectedVersion) {
          throw new ConcurrentModificationError('tenant', input.tenantId);
        }

        const merged: Tenant = { ...mapTenant(existing), ...input.changes };
        const result = await client.query<TenantRow>(
          `
          UPDATE tenants
          SET slug = $2,
              name = $3,
              branding = $4::jsonb,
              feature_flags = $5::jsonb,
              limits = $6::jsonb,
              overage_rates = $7::jsonb,
              status = $8,
              suspension_reason = $9,
              version = version + 1,
              updated_at = NOW()
          WHERE id = $1 AND version = $10
          RETURNING *
          `,
          [
            input.tenantId,
            merged.slug,
            merged.name,
            JSON.stringify(merged.branding),
            JSON.stringify(merged.featureFlags),
            JSON.stringify(merged.limits),
            JSON.stringify(merged.overageRates),
            merged.status,
            merged.suspensionReason,
            input.expectedVersion
          ]
        );

        const row = getSingleRow(result.rows);
        if (row === null) {
          throw new ConcurrentModificationError('tenant', input.tenantId);
        }

        return mapTenant(row);
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateError('TENANT_SLUG_TAKEN', 'Tenant slug is already in use.');
      }

      throw error;
    }
  }

  public async assignRole(input: AssignRoleInput): Promise<RoleAssignment> {
    return withTransaction(this.pool, input.tenantId, async (client) => {
      const result = await client.query<RoleAssignmentRow>(
        `
        INSERT INTO role_assignments (id, tenant_id, user_id, role, scope, created_at)
        VALUES ($1, $2, $3, $4, $5, NOW())
        ON CONFLICT (tenant_id, user_id, role)
        DO UPDATE SET scope = EXCLUDED.scope
        RETURNING *
        `,
        [randomUUID(), input.tenantId, input.userId, input.role, input.scope]
      );

      const row = getSingleRow(result.rows);
      if (row === null) {
        throw new Error('Failed to assign role.');
      }

      return mapAssignment(row);
    });
  }

  public async listRoleAssignments(tenantId: string): Promise<RoleAssignment[]> {
    return withTransaction(this.pool, tenantId, async (client) => {
      const result = await client.query<RoleAssignmentRow>(
        'SELECT * FROM role_assignments WHERE tenant_id = $1 ORDER BY created_at ASC, id ASC',
        [tenantId]
      );

      return result.rows.map(mapAssignment);
    });
  }

  public async listRoleAssignmentsForUser(userId: string): Promise<RoleAssignment[]> {
    return withTransaction(this.pool, null, async (client) => {
      const result = await client.query<RoleAssignmentRow>(
        'SELECT * FROM role_assignments WHERE user_id = $1 ORDER BY created_at ASC, id ASC',
        [userId]
      );

      return result.rows.map(mapAssignment);
    });
  }
}
