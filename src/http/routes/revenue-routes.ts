import { Router } from 'express';
import { z } from 'zod';

import { REVENUE_STREAMS } from '../../domain/tier-catalog.js';
import { REVENUE_EVENT_TYPES } from '../../repositories/revenue-event-repository.js';
import { getAuditRequestContext } from '../../services/audit-service.js';
import { MANUAL_EVENT_TYPES, type RevenueLedgerService } from '../../services/revenue-ledger-service.js';
import { getPrincipal, getTenantIdParam } from '../middlewares/auth-context.js';
import { requireAuthenticatedPrincipal } from '../middlewares/require-auth.js';
import { csvList, currencySchema } from './query-params.js';

const listEventsQuerySchema = z.object({
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
  types: csvList(z.enum(REVENUE_EVENT_TYPES)),
  customerId: z.string().min(1).optional(),
  subscriptionId: z.string().min(1).optional()
});

const metricsQuerySchema = z.object({
  from: z.coerce.date(),
  to: z.coerce.date(),
  currency: currencySchema
});

const manualEntrySchema = z.object({
  id: z.string().trim().min(1).max(200),
  type: z.enum(MANUAL_EVENT_TYPES),
  amountMinor: z.number().int().min(-Number.MAX_SAFE_INTEGER).max(Number.MAX_SAFE_INTEGER),
  currency: currencySchema,
  stream: z.enum(REVENUE_STREAMS),
  reason: z.string().trim().min(1).max(500),
  occurredAt: z.coerce.date().optional(),
  customerId: z.string().min(1).nullable().optional(),
  subscriptionId: z.string().min(1).nullable().optional(),
  offsetsEventId: z.string().min(1).nullable().optional()
});

export function createRevenueRoutes(ledger: RevenueLedgerService): Router {
  const router = Router();

  router.use(requireAuthenticatedPrincipal);

  router.get('/:tenantId/revenue/events', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const query = listEventsQuerySchema.parse(request.query);
      const events = await ledger.queryForTenant(getPrincipal(request), tenantId, query, getAuditRequestContext(request));

      response.status(200).json({ events });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:tenantId/revenue/metrics', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const query = metricsQuerySchema.parse(request.query);
      const metrics = await ledger.metricsForTenant(getPrincipal(request), tenantId, query, getAuditRequestContext(request));

      response.status(200).json({ metrics });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:tenantId/revenue/manual-entries', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const payload = manualEntrySchema.parse(request.body);
      const result = await ledger.recordManualEntry(getPrincipal(request), tenantId, payload, getAuditRequestContext(request));

      response.status(result.recorded ? 201 : 200).json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
