import Stripe from 'stripe';

import { normalizeCurrency } from '../domain/money.js';
import type {
  ChargeRequest,
  ChargeResult,
  PaymentProcessor,
  RefundRequest,
  RefundResult
} from './payment-processor.js';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'unknown';
}

/** Off-session PaymentIntents confirmed immediately; the idempotency key is forwarded to Stripe. */
export class StripePaymentProcessor implements PaymentProcessor {
  private readonly stripe: Stripe;

  public constructor(secretKey: string) {
    this.stripe = new Stripe(secretKey);
  }

  public async charge(request: ChargeRequest): Promise<ChargeResult> {
    try {
      const intent = await this.stripe.paymentIntents.create(
        {
          amount: request.amountMinor,
          currency: normalizeCurrency(request.currency).toLowerCase(),
          payment_method: request.paymentMethodToken,
          customer: request.customerReference ?? undefined,
          confirm: true,
          off_session: true,
          metadata: request.metadata
        },
        { idempotencyKey: request.idempotencyKey }
      );

      if (intent.status === 'succeeded') {
        return { status: 'succeeded', processorReference: intent.id, declineReason: null };
      }

      if (intent.status === 'requires_payment_method' || intent.status === 'requires_action') {
        return {
          status: 'declined',
          processorReference: intent.id,
          declineReason: intent.last_payment_error?.decline_code ?? intent.last_payment_error?.code ?? intent.status
        };
      }

      return { status: 'error', processorReference: intent.id, declineReason: null };
    } catch (error) {
      if (error instanceof Stripe.errors.StripeCardError) {
        return {
          status: 'declined',
          processorReference: error.payment_intent?.id ?? null,
          declineReason: error.decline_code ?? error.code ?? 'card_declined'
        };
      }

      console.error('payment_processor_error', {
        idempotencyKey: request.idempotencyKey,
        error: describeError(error)
      });
      return { status: 'error', processorReference: null, declineReason: null };
    }
  }

  public async refund(request: RefundRequest): Promise<RefundResult> {
    try {
      const refund = await this.stripe.refunds.create(
        {
          payment_intent: request.processorReference,
          amount: request.amountMinor
        },
        { idempotencyKey: request.idempotencyKey }
      );

      return {
        status: refund.status === 'failed' || refund.status === 'canceled' ? 'declined' : 'succeeded',
        processorReference: refund.id
      };
    } catch (error) {
      console.error('payment_processor_error', {
        idempotencyKey: request.idempotencyKey,
        error: describeError(error)
      });
      return { status: 'error', processorReference: null };
    }
  }
}
