import { performance } from 'node:perf_hooks';

import type { NextFunction, Request, Response } from 'express';

import { AppError } from '../../errors/app-error.js';
import type { UsageService } from '../../services/usage-service.js';

const ID_SEGMENT = /\/(?:[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}|\d+)(?=\/|$)/gi;

/** `GET /v1/tenants/:id/usage`: identifiers are folded so buckets stay per route. */
export function endpointKey(request: Request): string {
  const [path = '/'] = request.originalUrl.split('?');
  return `${request.method} ${path.replace(ID_SEGMENT, '/:id')}`;
}

function contentLength(value: string | number | string[] | undefined): number {
  const parsed = typeof value === 'number' ? value : Number.parseInt(typeof value === 'string' ? value : '0', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 0;
}

/** Meters every response of an authenticated request against the caller's tenant. */
export function createUsageMeteringMiddleware(usageService: UsageService) {
  return function usageMeteringMiddleware(request: Request, response: Response, next: NextFunction): void {
    const startedAt = performance.now();

    response.on('finish', () => {
      const principal = request.principal;
      if (principal === undefined) {
        return;
      }

      usageService.recordCall(
        principal.tenantId,
        endpointKey(request),
        response.statusCode,
        performance.now() - startedAt,
        contentLength(request.header('content-length')) + contentLength(response.getHeader('content-length'))
      );
    });

    next();
  };
}

/** Sliding-window limit per (caller tenant, endpoint); tenants never share a window. */
export function createTenantRateLimitMiddleware(usageService: UsageService) {
  return async function tenantRateLimitMiddleware(request: Request, response: Response, next: NextFunction): Promise<void> {
    const principal = request.principal;
    if (principal === undefined) {
      next();
      return;
    }

    try {
      const decision = await usageService.checkRateLimit(principal.tenantId, endpointKey(request));
      response.setHeader('x-ratelimit-limit', String(decision.limit));
      response.setHeader('x-ratelimit-remaining', String(decision.remaining));

      if (!decision.allowed) {
        response.setHeader('retry-after', String(Math.max(1, Math.ceil(decision.retryAfterMs / 1_000))));
        next(new AppError(429, 'RATE_LIMITED', 'Tenant rate limit exceeded for this endpoint.', { retryAfterMs: decision.retryAfterMs }));
        return;
      }

      next();
    } catch (error) {
      next(error);
    }
  };
}
