import { z } from 'zod';

import { ORG_ROLES, PERMISSION_SCOPES } from '../repositories/tenant-repository.js';

export const roleClaimSchema = z.object({
  role: z.enum(ORG_ROLES),
  scope: z.enum(PERMISSION_SCOPES)
});

export type RoleClaim = z.infer<typeof roleClaimSchema>;

/** An already-verified external identity. Role claims apply to `tenantId` only. */
export interface ResolvedIdentity {
  userId: string;
  tenantId: string;
  roleClaims: RoleClaim[];
}

export interface IdentityProvider {
  resolveAssertion(assertion: string): Promise<ResolvedIdentity | null>;
}
