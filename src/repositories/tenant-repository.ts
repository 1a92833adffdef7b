export const TENANT_TYPES = ['individual', 'golf-course', 'enterprise-chain'] as const;

export type TenantType = (typeof TENANT_TYPES)[number];

export const TENANT_STATUSES = ['provisioning', 'active', 'suspended', 'archived'] as const;

export type TenantStatus = (typeof TENANT_STATUSES)[number];

export const SUSPENSION_REASONS = ['non_payment', 'violation', 'security', 'abuse', 'maintenance', 'requested', 'other'] as const;

export type SuspensionReason = (typeof SUSPENSION_REASONS)[number];

export const ORG_ROLES = ['Owner', 'Admin', 'Billing', 'Analyst', 'Viewer'] as const;

export type OrgRole = (typeof ORG_ROLES)[number];

export const PERMISSION_SCOPES = ['self', 'tenant', 'parent-chain'] as const;

export type PermissionScope = (typeof PERMISSION_SCOPES)[number];

export interface TenantBranding {
  primaryColor: string | null;
  secondaryColor: string | null;
  logoUrl: string | null;
  customDomain: string | null;
}

export interface TenantLimits {
  maxUsers: number;
  maxStorageGb: number;
  maxApiCallsPerMonth: number;
  maxBandwidthGb: number;
  maxCustomDomains: number;
  rateLimitPerWindow: number;
}

/** Per-unit overage prices as major-unit decimal strings. */
export interface OverageRates {
  apiCalls: string;
  storageGb: string;
  bandwidthGb: string;
}

export interface Tenant {
  id: string;
  slug: string;
  name: string;
  type: TenantType;
  parentTenantId: string | null;
  branding: TenantBranding;
  featureFlags: string[];
  limits: TenantLimits;
  overageRates: OverageRates;
  currency: string;
  status: TenantStatus;
  suspensionReason: SuspensionReason | null;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface RoleAssignment {
  id: string;
  tenantId: string;
  userId: string;
  role: OrgRole;
  scope: PermissionScope;
  createdAt: Date;
}

export interface CreateTenantInput {
  slug: string;
  name: string;
  type: TenantType;
  parentTenantId: string | null;
  branding: TenantBranding;
  featureFlags: string[];
  limits: TenantLimits;
  overageRates: OverageRates;
  currency: string;
  status: TenantStatus;
}

export type TenantChanges = Partial<Pick<
  Tenant,
  'slug' | 'name' | 'branding' | 'featureFlags' | 'limits' | 'overageRates' | 'status' | 'suspensionReason'
>>;

export interface UpdateTenantInput {
  tenantId: string;
  expectedVersion: number;
  changes: TenantChanges;
}

export interface AssignRoleInput {
  tenantId: string;
  userId: string;
  role: OrgRole;
  scope: PermissionScope;
}

export interface TenantRepository {
  createTenant(input: CreateTenantInput): Promise<Tenant>;
  findTenantById(tenantId: string): Promise<Tenant | null>;
  findTenantBySlug(slug: string): Promise<Tenant | null>;
  listChildren(parentTenantId: string): Promise<Tenant[]>;
  updateTenant(input: UpdateTenantInput): Promise<Tenant | null>;
  assignRole(input: AssignRoleInput): Promise<RoleAssignment>;
  listRoleAssignments(tenantId: string): Promise<RoleAssignment[]>;
  listRoleAssignmentsForUser(userId: string): Promise<RoleAssignment[]>;
}
