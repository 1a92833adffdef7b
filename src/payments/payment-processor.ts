export type ChargeStatus = 'succeeded' | 'declined' | 'error';

export interface ChargeRequest {
  amountMinor: number;
  currency: string;
  paymentMethodToken: string;
  /** Processor-side customer handle, when the payment method is stored against one. */
  customerReference: string | null;
  idempotencyKey: string;
  metadata: Record<string, string>;
}

export interface ChargeResult {
  status: ChargeStatus;
  processorReference: string | null;
  declineReason: string | null;
}

export interface RefundRequest {
  processorReference: string;
  amountMinor: number;
  currency: string;
  idempotencyKey: string;
}

export interface RefundResult {
  status: ChargeStatus;
  processorReference: string | null;
}

/**
 * Narrow adapter over the external processor. `error` means the outcome is
 * unknown; callers retry with the same idempotency key.
 */
export interface PaymentProcessor {
  charge(request: ChargeRequest): Promise<ChargeResult>;
  refund(request: RefundRequest): Promise<RefundResult>;
}
