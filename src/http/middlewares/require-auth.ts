import type { NextFunction, Request, Response } from 'express';

import { AppError } from '../../errors/app-error.js';

export function requireAuthenticatedPrincipal(request: Request, _response: Response, next: NextFunction): void {
  if (request.principal === undefined) {
    next(new AppError(401, 'AUTH_REQUIRED', 'Authentication is required.'));
    return;
  }

  next();
}
