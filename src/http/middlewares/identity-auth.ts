import type { NextFunction, Request, Response } from 'express';

import { AppError } from '../../errors/app-error.js';
import type { IdentityProvider } from '../../identity/identity-provider.js';
import type { SecurityService } from '../../services/security-service.js';

const BEARER_PREFIX = 'bearer ';

/** Resolves a bearer identity assertion into `request.principal`; requests without one pass through anonymous. */
export function createIdentityAuthMiddleware(identityProvider: IdentityProvider, securityService: SecurityService) {
  return async function identityAuthMiddleware(request: Request, _response: Response, next: NextFunction): Promise<void> {
    const header = request.header('authorization');
    if (typeof header !== 'string' || header.length === 0) {
      next();
      return;
    }

    if (!header.toLowerCase().startsWith(BEARER_PREFIX)) {
      next(new AppError(401, 'AUTH_SCHEME_UNSUPPORTED', 'Use a bearer identity assertion.'));
      return;
    }

    try {
      const identity = await identityProvider.resolveAssertion(header.slice(BEARER_PREFIX.length).trim());
      if (identity === null) {
        next(new AppError(401, 'AUTH_INVALID_ASSERTION', 'Identity assertion is invalid or expired.'));
        return;
      }

      request.principal = await securityService.principalFor(identity);
      next();
    } catch (error) {
      next(error);
    }
  };
}
