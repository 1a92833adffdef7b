import type { Request } from 'express';
import { z } from 'zod';

import type { Principal } from '../../auth/auth-context.js';
import { AppError } from '../../errors/app-error.js';

const tenantIdSchema = z.string().uuid();

export function getPrincipal(request: Request): Principal {
  if (request.principal === undefined) {
    throw new Error('Expected authenticated principal on request.');
  }

  return request.principal;
}

export function getTenantIdParam(request: Request): string {
  const parsed = tenantIdSchema.safeParse(request.params.tenantId);
  if (!parsed.success) {
    throw new AppError(400, 'TENANT_ID_INVALID', 'Tenant id must be a UUID.');
  }

  return parsed.data;
}
