import { Router } from 'express';
import { z } from 'zod';

import { ALERT_METRICS, USAGE_GRANULARITIES } from '../../repositories/usage-repository.js';
import { getAuditRequestContext } from '../../services/audit-service.js';
import type { UsageService } from '../../services/usage-service.js';
import { getPrincipal, getTenantIdParam } from '../middlewares/auth-context.js';
import { requireAuthenticatedPrincipal } from '../middlewares/require-auth.js';
import { usagePeriodSchema } from './query-params.js';

const bucketsQuerySchema = z.object({
  granularity: z.enum(USAGE_GRANULARITIES).default('day'),
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional()
});

const overageParamsSchema = z.object({
  period: usagePeriodSchema
});

const configureAlertsSchema = z.object({
  alerts: z.array(z.object({
    metric: z.enum(ALERT_METRICS),
    thresholdPercent: z.number().positive(),
    enabled: z.boolean().optional()
  }))
});

export function createUsageRoutes(usageService: UsageService): Router {
  const router = Router();
  router.use(requireAuthenticatedPrincipal);

  router.get('/:tenantId/usage', async (request, response, next) => {
    try {
      const usage = await usageService.getUsageReport(getPrincipal(request), getTenantIdParam(request), getAuditRequestContext(request));
      response.status(200).json({ usage });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:tenantId/usage/buckets', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const query = bucketsQuerySchema.parse(request.query);
      const buckets = await usageService.listUsageBuckets(getPrincipal(request), tenantId, query, getAuditRequestContext(request));

      response.status(200).json({ buckets });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:tenantId/usage/overage/:period', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const params = overageParamsSchema.parse(request.params);
      const statement = await usageService.getOverageStatement(getPrincipal(request), tenantId, params.period, getAuditRequestContext(request));

      response.status(200).json({ statement });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:tenantId/usage/alerts', async (request, response, next) => {
    try {
      const alerts = await usageService.getUsageAlerts(getPrincipal(request), getTenantIdParam(request), getAuditRequestContext(request));
      response.status(200).json({ alerts });
    } catch (error) {
      next(error);
    }
  });

  router.put('/:tenantId/usage/alerts', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const payload = configureAlertsSchema.parse(request.body);
      const alerts = await usageService.configureUsageAlerts(getPrincipal(request), tenantId, payload.alerts, getAuditRequestContext(request));

      response.status(200).json({ alerts });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:tenantId/usage/thresholds', async (request, response, next) => {
    try {
      const breaches = await usageService.getThresholdBreaches(getPrincipal(request), getTenantIdParam(request), getAuditRequestContext(request));
      response.status(200).json({ breaches });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
