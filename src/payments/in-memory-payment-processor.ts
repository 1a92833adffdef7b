import type {
  ChargeRequest,
  ChargeResult,
  PaymentProcessor,
  RefundRequest,
  RefundResult
} from './payment-processor.js';

export type ScriptedOutcome =
  | { status: 'succeeded' }
  | { status: 'declined'; reason: string }
  | { status: 'error' }
  | { status: 'hang' };

export interface RecordedCharge {
  request: ChargeRequest;
  result: ChargeResult | null;
}

/**
 * Deterministic processor. Outcomes are scripted per payment method and
 * consumed in order; an unscripted charge succeeds. Settled results are
 * replayed for a repeated idempotency key, as a real processor does.
 */
export class InMemoryPaymentProcessor implements PaymentProcessor {
  public readonly charges: RecordedCharge[] = [];

  public readonly refunds: RefundRequest[] = [];

  private readonly scriptsByToken = new Map<string, ScriptedOutcome[]>();

  private readonly settledByKey = new Map<string, ChargeResult>();

  private sequence = 0;

  public script(paymentMethodToken: string, ...outcomes: ScriptedOutcome[]): void {
    const queue = this.scriptsByToken.get(paymentMethodToken) ?? [];
    queue.push(...outcomes);
    this.scriptsByToken.set(paymentMethodToken, queue);
  }

  /** Charges the processor actually captured, one per idempotency key. */
  public capturedCharges(): ChargeRequest[] {
    const captured = new Map<string, ChargeRequest>();
    for (const charge of this.charges) {
      if (charge.result?.status === 'succeeded' && !captured.has(charge.request.idempotencyKey)) {
        captured.set(charge.request.idempotencyKey, charge.request);
      }
    }

    return [...captured.values()];
  }

  public charge(request: ChargeRequest): Promise<ChargeResult> {
    const settled = this.settledByKey.get(request.idempotencyKey);
    if (settled !== undefined) {
      this.charges.push({ request: { ...request }, result: { ...settled } });
      return Promise.resolve({ ...settled });
    }

    const outcome = this.scriptsByToken.get(request.paymentMethodToken)?.shift() ?? { status: 'succeeded' };
    if (outcome.status === 'hang') {
      this.charges.push({ request: { ...request }, result: null });
      return new Promise<ChargeResult>(() => undefined);
    }

    const result: ChargeResult = outcome.status === 'succeeded'
      ? { status: 'succeeded', processorReference: this.nextReference('ch'), declineReason: null }
      : outcome.status === 'declined'
        ? { status: 'declined', processorReference: this.nextReference('ch'), declineReason: outcome.reason }
        : { status: 'error', processorReference: null, declineReason: null };

    if (result.status !== 'error') {
      this.settledByKey.set(request.idempotencyKey, result);
    }

    this.charges.push({ request: { ...request }, result: { ...result } });
    return Promise.resolve({ ...result });
  }

  public refund(request: RefundRequest): Promise<RefundResult> {
    this.refunds.push({ ...request });
    return Promise.resolve({ status: 'succeeded', processorReference: this.nextReference('re') });
  }

  private nextReference(prefix: string): string {
    this.sequence += 1;
    return `${prefix}_test_${String(this.sequence).padStart(6, '0')}`;
  }
}
