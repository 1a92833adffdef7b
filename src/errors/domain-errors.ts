import { AppError } from './app-error.js';

export class NotFoundError extends AppError {
  public constructor(code: string, message: string, details?: unknown) {
    super(404, code, message, details);
  }
}

/**
 * Slug, event id or tier-family conflict. Idempotent callers treat it as
 * "already done"; everyone else treats it as a real conflict.
 */
export class DuplicateError extends AppError {
  public constructor(code: string, message: string, details?: unknown) {
    super(409, code, message, details);
  }
}

export interface CrossTenantViolationDetails {
  requestingTenantId: string;
  targetTenantId: string;
  resourceType: string;
  resourceId: string | null;
}

export class CrossTenantViolation extends AppError {
  public constructor(public readonly violation: CrossTenantViolationDetails) {
    super(403, 'CROSS_TENANT_VIOLATION', 'Access across tenant boundaries is not permitted.', {
      requestingTenantId: violation.requestingTenantId
    });
  }
}

export class InvalidStateTransition extends AppError {
  public constructor(
    public readonly entity: string,
    public readonly currentState: string,
    public readonly attemptedState: string
  ) {
    super(
      409,
      'INVALID_STATE_TRANSITION',
      `Cannot move ${entity} from ${currentState} to ${attemptedState}.`,
      { entity, currentState, attemptedState }
    );
  }
}

export class ConcurrentModificationError extends AppError {
  public constructor(entity: string, id: string) {
    super(409, 'CONCURRENT_MODIFICATION', `The ${entity} was modified concurrently. Retry the operation.`, { id });
  }
}

export class PaymentDeclined extends AppError {
  public constructor(public readonly reason: string, public readonly processorReference: string | null) {
    super(402, 'PAYMENT_DECLINED', 'The payment was declined.', { reason, processorReference });
  }
}

/** Ambiguous processor outcome: the charge may or may not have happened. */
export class PaymentProcessorError extends AppError {
  public constructor(message: string, public readonly processorReference: string | null = null) {
    super(502, 'PAYMENT_PROCESSOR_ERROR', message, { processorReference });
  }
}
