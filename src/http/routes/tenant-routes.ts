import { Router } from 'express';
import { z } from 'zod';

import {
  ORG_ROLES,
  PERMISSION_SCOPES,
  SUSPENSION_REASONS,
  TENANT_TYPES
} from '../../repositories/tenant-repository.js';
import { getAuditRequestContext } from '../../services/audit-service.js';
import type { ExportService } from '../../services/export-service.js';
import type { TenantService } from '../../services/tenant-service.js';
import { getPrincipal, getTenantIdParam } from '../middlewares/auth-context.js';
import { requireAuthenticatedPrincipal } from '../middlewares/require-auth.js';

const hexColorSchema = z.string().regex(/^#[0-9a-fA-F]{6}$/);

const brandingSchema = z.object({
  primaryColor: hexColorSchema.nullable().optional(),
  secondaryColor: hexColorSchema.nullable().optional(),
  logoUrl: z.string().url().nullable().optional(),
  customDomain: z.string().trim().min(3).max(253).nullable().optional()
});

const limitsSchema = z.object({
  maxUsers: z.number().int().nonnegative(),
  maxStorageGb: z.number().int().nonnegative(),
  maxApiCallsPerMonth: z.number().int().nonnegative(),
  maxBandwidthGb: z.number().int().nonnegative(),
  maxCustomDomains: z.number().int().nonnegative(),
  rateLimitPerWindow: z.number().int().positive()
});

const rateSchema = z.string().regex(/^\d+(?:\.\d+)?$/);

const overageRatesSchema = z.object({
  apiCalls: rateSchema,
  storageGb: rateSchema,
  bandwidthGb: rateSchema
});

const createTenantSchema = z.object({
  slug: z.string().trim().min(1).max(63),
  name: z.string().trim().min(3).max(120),
  type: z.enum(TENANT_TYPES),
  parentTenantId: z.string().uuid().nullable().optional(),
  branding: brandingSchema.optional(),
  featureFlags: z.array(z.string().trim().min(1).max(64)).max(100).optional(),
  limits: limitsSchema.optional(),
  overageRates: overageRatesSchema.optional(),
  currency: z.string().length(3).optional(),
  ownerUserId: z.string().min(1).max(200).optional()
});

const updateTenantSchema = z.object({
  expectedVersion: z.number().int().positive(),
  slug: z.string().trim().min(1).max(63).optional(),
  name: z.string().trim().min(3).max(120).optional(),
  branding: brandingSchema.optional(),
  featureFlags: z.array(z.string().trim().min(1).max(64)).max(100).optional(),
  limits: limitsSchema.optional(),
  overageRates: overageRatesSchema.optional()
});

const suspendSchema = z.object({
  reason: z.enum(SUSPENSION_REASONS)
});

const assignRoleSchema = z.object({
  userId: z.string().min(1).max(200),
  role: z.enum(ORG_ROLES),
  scope: z.enum(PERMISSION_SCOPES).default('tenant')
});

const slugParamsSchema = z.object({
  slug: z.string().min(1).max(63)
});

export function createTenantRoutes(tenantService: TenantService, exportService: ExportService): Router {
  const router = Router();

  router.use(requireAuthenticatedPrincipal);

  router.post('/', async (request, response, next) => {
    try {
      const payload = createTenantSchema.parse(request.body);
      const tenant = await tenantService.createTenant(getPrincipal(request), payload, getAuditRequestContext(request));

      response.status(201).json({ tenant });
    } catch (error) {
      next(error);
    }
  });

  router.get('/by-slug/:slug', async (request, response, next) => {
    try {
      const params = slugParamsSchema.parse(request.params);
      const tenant = await tenantService.resolveTenantBySlug(getPrincipal(request), params.slug, getAuditRequestContext(request));

      response.status(200).json({ tenant });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:tenantId', async (request, response, next) => {
    try {
      const tenant = await tenantService.resolveTenant(getPrincipal(request), getTenantIdParam(request), getAuditRequestContext(request));
      response.status(200).json({ tenant });
    } catch (error) {
      next(error);
    }
  });

  router.patch('/:tenantId', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const payload = updateTenantSchema.parse(request.body);
      const tenant = await tenantService.updateTenant(getPrincipal(request), tenantId, payload, getAuditRequestContext(request));

      response.status(200).json({ tenant });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:tenantId/activate', async (request, response, next) => {
    try {
      const tenant = await tenantService.activateTenant(getPrincipal(request), getTenantIdParam(request), getAuditRequestContext(request));
      response.status(200).json({ tenant });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:tenantId/suspend', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const payload = suspendSchema.parse(request.body);
      const tenant = await tenantService.suspendTenant(getPrincipal(request), tenantId, payload.reason, getAuditRequestContext(request));

      response.status(200).json({ tenant });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:tenantId/reinstate', async (request, response, next) => {
    try {
      const tenant = await tenantService.reinstateTenant(getPrincipal(request), getTenantIdParam(request), getAuditRequestContext(request));
      response.status(200).json({ tenant });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:tenantId/archive', async (request, response, next) => {
    try {
      const tenant = await tenantService.archiveTenant(getPrincipal(request), getTenantIdParam(request), getAuditRequestContext(request));
      response.status(200).json({ tenant });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:tenantId/children', async (request, response, next) => {
    try {
      const tenants = await tenantService.listChildren(getPrincipal(request), getTenantIdParam(request), getAuditRequestContext(request));
      response.status(200).json({ tenants });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:tenantId/roles', async (request, response, next) => {
    try {
      const assignments = await tenantService.listRoleAssignments(
        getPrincipal(request),
        getTenantIdParam(request),
        getAuditRequestContext(request)
      );

      response.status(200).json({ assignments });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:tenantId/roles', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const payload = assignRoleSchema.parse(request.body);
      const assignment = await tenantService.assignRole(getPrincipal(request), tenantId, payload, getAuditRequestContext(request));

      response.status(201).json({ assignment });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:tenantId/export', async (request, response, next) => {
    try {
      const exported = await exportService.exportTenantData(getPrincipal(request), getTenantIdParam(request), getAuditRequestContext(request));
      response.status(200).json({ export: exported });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
