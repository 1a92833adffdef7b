import { Router } from 'express';
import { z } from 'zod';

import { getAuditRequestContext } from '../../services/audit-service.js';
import { MAX_FORECAST_MONTHS, type AnalyticsService } from '../../services/analytics-service.js';
import { getPrincipal, getTenantIdParam } from '../middlewares/auth-context.js';
import { requireAuthenticatedPrincipal } from '../middlewares/require-auth.js';
import { currencySchema } from './query-params.js';

const pointQuerySchema = z.object({
  asOf: z.coerce.date().optional(),
  currency: currencySchema.optional()
});

const windowQuerySchema = z.object({
  from: z.coerce.date(),
  to: z.coerce.date(),
  currency: currencySchema.optional()
});

const forecastQuerySchema = pointQuerySchema.extend({
  months: z.coerce.number().int().min(1).max(MAX_FORECAST_MONTHS).default(12)
});

const customerParamsSchema = z.object({
  customerId: z.string().min(1)
});

export function createAnalyticsRoutes(analyticsService: AnalyticsService): Router {
  const router = Router();

  router.use(requireAuthenticatedPrincipal);

  router.get('/:tenantId/analytics/mrr', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const query = pointQuerySchema.parse(request.query);
      const report = await analyticsService.monthlyRecurringRevenue(getPrincipal(request), tenantId, query, getAuditRequestContext(request));

      response.status(200).json({ report });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:tenantId/analytics/arpu', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const query = windowQuerySchema.parse(request.query);
      const report = await analyticsService.averageRevenuePerCustomer(getPrincipal(request), tenantId, query, getAuditRequestContext(request));

      response.status(200).json({ report });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:tenantId/analytics/churn-risk', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const query = pointQuerySchema.parse(request.query);
      const report = await analyticsService.churnRisk(getPrincipal(request), tenantId, query, getAuditRequestContext(request));

      response.status(200).json({ report });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:tenantId/analytics/customers/:customerId/lifetime-value', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const params = customerParamsSchema.parse(request.params);
      const query = pointQuerySchema.parse(request.query);
      const report = await analyticsService.customerLifetimeValue(
        getPrincipal(request),
        tenantId,
        params.customerId,
        query,
        getAuditRequestContext(request)
      );

      response.status(200).json({ report });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:tenantId/analytics/forecast', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const { months, ...query } = forecastQuerySchema.parse(request.query);
      const forecast = await analyticsService.revenueForecast(getPrincipal(request), tenantId, months, query, getAuditRequestContext(request));

      response.status(200).json({ forecast });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:tenantId/analytics/breakdown', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const query = windowQuerySchema.parse(request.query);
      const breakdown = await analyticsService.revenueBreakdown(getPrincipal(request), tenantId, query, getAuditRequestContext(request));

      response.status(200).json({ breakdown });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
