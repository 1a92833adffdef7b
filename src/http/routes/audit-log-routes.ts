import { Router } from 'express';
import { z } from 'zod';

import type { AuditLogQueryService } from '../../services/audit-log-query-service.js';
import { getAuditRequestContext } from '../../services/audit-service.js';
import { getPrincipal, getTenantIdParam } from '../middlewares/auth-context.js';
import { requireAuthenticatedPrincipal } from '../middlewares/require-auth.js';
import { csvList } from './query-params.js';

const listAuditLogsQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(100).optional(),
  cursor: z.string().min(1).optional(),
  actions: csvList(z.string().min(1).max(100))
});

export function createAuditLogRoutes(auditLogQueryService: AuditLogQueryService): Router {
  const router = Router();
  router.use(requireAuthenticatedPrincipal);

  router.get('/:tenantId/audit-logs', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const query = listAuditLogsQuerySchema.parse(request.query);

      const result = await auditLogQueryService.listEvents(getPrincipal(request), tenantId, query, getAuditRequestContext(request));

      response.status(200).json({
        events: result.events,
        nextCursor: result.nextCursor
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
