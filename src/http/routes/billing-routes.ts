import { Router } from 'express';
import { z } from 'zod';

import { DISCOUNT_KINDS } from '../../domain/discounts.js';
import { BILLING_CYCLES, REVENUE_STREAMS } from '../../domain/tier-catalog.js';
import { INVOICE_STATUSES } from '../../repositories/billing-repository.js';
import { CANCELLATION_REASONS, SUBSCRIPTION_STATUSES } from '../../repositories/subscription-repository.js';
import { getAuditRequestContext } from '../../services/audit-service.js';
import type { BillingService } from '../../services/billing-service.js';
import type { SubscriptionService } from '../../services/subscription-service.js';
import { getPrincipal, getTenantIdParam } from '../middlewares/auth-context.js';
import { requireAuthenticatedPrincipal } from '../middlewares/require-auth.js';
import { csvList, currencySchema } from './query-params.js';

const amountSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

const createCustomerSchema = z.object({
  email: z.string().email(),
  name: z.string().trim().min(1).max(200),
  metadata: z.record(z.string().max(500)).optional()
});

const startSubscriptionSchema = z.object({
  id: z.string().trim().min(1).max(120).optional(),
  customerId: z.string().min(1),
  tierId: z.string().min(1),
  billingCycle: z.enum(BILLING_CYCLES),
  paymentMethodToken: z.string().min(1),
  priceMinor: amountSchema.optional(),
  trialDays: z.number().int().min(1).max(90).optional(),
  setupFeeMinor: amountSchema.optional()
});

const listSubscriptionsQuerySchema = z.object({
  customerId: z.string().min(1).optional(),
  status: csvList(z.enum(SUBSCRIPTION_STATUSES))
});

const subscriptionParamsSchema = z.object({
  subscriptionId: z.string().min(1)
});

const changeTierSchema = z.object({
  tierId: z.string().min(1)
});

const pauseSchema = z.object({
  durationDays: z.number().int()
});

const cancelSchema = z.object({
  reason: z.enum(CANCELLATION_REASONS)
});

const applyDiscountSchema = z.object({
  name: z.string().trim().min(1).max(120),
  kind: z.enum(DISCOUNT_KINDS),
  value: z.number().positive(),
  validFrom: z.coerce.date().optional(),
  validUntil: z.coerce.date().nullable().optional()
});

const discountParamsSchema = subscriptionParamsSchema.extend({
  discountId: z.string().min(1)
});

const invoiceItemSchema = z.object({
  description: z.string().trim().min(1).max(500),
  amountMinor: amountSchema,
  quantity: z.number().int().default(1),
  eventType: z.enum(['setup-fee', 'usage-charge', 'add-on-purchase']),
  stream: z.enum(REVENUE_STREAMS)
});

const createInvoiceSchema = z.object({
  customerId: z.string().min(1),
  subscriptionId: z.string().min(1).nullable().optional(),
  currency: currencySchema,
  items: z.array(invoiceItemSchema).max(200),
  dueAt: z.coerce.date()
});

const listInvoicesQuerySchema = z.object({
  status: csvList(z.enum(INVOICE_STATUSES))
});

const invoiceParamsSchema = z.object({
  invoiceId: z.string().min(1)
});

const payInvoiceSchema = z.object({
  paymentMethodToken: z.string().min(1)
});

const oneOffChargeSchema = z.object({
  customerId: z.string().min(1),
  type: z.enum(['setup-fee', 'add-on-purchase']),
  amountMinor: amountSchema,
  currency: currencySchema,
  stream: z.enum(REVENUE_STREAMS),
  description: z.string().trim().min(1).max(500),
  paymentMethodToken: z.string().min(1),
  idempotencyKey: z.string().trim().min(1).max(120),
  subscriptionId: z.string().min(1).nullable().optional()
});

const refundSchema = z.object({
  eventId: z.string().min(1),
  idempotencyKey: z.string().trim().min(1).max(120),
  amountMinor: z.number().int().positive().optional(),
  reason: z.string().trim().min(1).max(500)
});

export function createBillingRoutes(billingService: BillingService, subscriptionService: SubscriptionService): Router {
  const router = Router();

  router.use(requireAuthenticatedPrincipal);

  router.get('/:tenantId/customers', async (request, response, next) => {
    try {
      const customers = await billingService.listCustomers(getPrincipal(request), getTenantIdParam(request), getAuditRequestContext(request));
      response.status(200).json({ customers });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:tenantId/customers', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const payload = createCustomerSchema.parse(request.body);
      const customer = await billingService.createCustomer(getPrincipal(request), tenantId, payload, getAuditRequestContext(request));

      response.status(201).json({ customer });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:tenantId/subscriptions', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const query = listSubscriptionsQuerySchema.parse(request.query);
      const subscriptions = await subscriptionService.listSubscriptions(
        getPrincipal(request),
        tenantId,
        { customerId: query.customerId, statuses: query.status },
        getAuditRequestContext(request)
      );

      response.status(200).json({ subscriptions });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:tenantId/subscriptions', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const payload = startSubscriptionSchema.parse(request.body);
      const result = await billingService.startSubscription(getPrincipal(request), tenantId, payload, getAuditRequestContext(request));

      response.status(201).json(result);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:tenantId/subscriptions/:subscriptionId', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const params = subscriptionParamsSchema.parse(request.params);
      const subscription = await subscriptionService.getSubscription(
        getPrincipal(request),
        tenantId,
        params.subscriptionId,
        getAuditRequestContext(request)
      );

      response.status(200).json({ subscription });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:tenantId/subscriptions/:subscriptionId/change-tier', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const params = subscriptionParamsSchema.parse(request.params);
      const payload = changeTierSchema.parse(request.body);
      const result = await billingService.changeSubscriptionTier(
        getPrincipal(request),
        tenantId,
        params.subscriptionId,
        payload.tierId,
        getAuditRequestContext(request)
      );

      response.status(200).json(result);
    } catch (error) {
      next(error);
    }
  });

  router.post('/:tenantId/subscriptions/:subscriptionId/pause', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const params = subscriptionParamsSchema.parse(request.params);
      const payload = pauseSchema.parse(request.body);
      const subscription = await subscriptionService.pauseSubscription(
        getPrincipal(request),
        tenantId,
        params.subscriptionId,
        payload.durationDays,
        getAuditRequestContext(request)
      );

      response.status(200).json({ subscription });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:tenantId/subscriptions/:subscriptionId/resume', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const params = subscriptionParamsSchema.parse(request.params);
      const subscription = await subscriptionService.resumeSubscription(
        getPrincipal(request),
        tenantId,
        params.subscriptionId,
        getAuditRequestContext(request)
      );

      response.status(200).json({ subscription });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:tenantId/subscriptions/:subscriptionId/cancel', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const params = subscriptionParamsSchema.parse(request.params);
      const payload = cancelSchema.parse(request.body);
      const subscription = await subscriptionService.cancelSubscription(
        getPrincipal(request),
        tenantId,
        params.subscriptionId,
        payload.reason,
        getAuditRequestContext(request)
      );

      response.status(200).json({ subscription });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:tenantId/subscriptions/:subscriptionId/discounts', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const params = subscriptionParamsSchema.parse(request.params);
      const payload = applyDiscountSchema.parse(request.body);
      const result = await subscriptionService.applyDiscount(
        getPrincipal(request),
        tenantId,
        params.subscriptionId,
        payload,
        getAuditRequestContext(request)
      );

      response.status(201).json(result);
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:tenantId/subscriptions/:subscriptionId/discounts/:discountId', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const params = discountParamsSchema.parse(request.params);
      const subscription = await subscriptionService.removeDiscount(
        getPrincipal(request),
        tenantId,
        params.subscriptionId,
        params.discountId,
        getAuditRequestContext(request)
      );

      response.status(200).json({ subscription });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:tenantId/invoices', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const query = listInvoicesQuerySchema.parse(request.query);
      const invoices = await billingService.listInvoices(getPrincipal(request), tenantId, query.status, getAuditRequestContext(request));

      response.status(200).json({ invoices });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:tenantId/invoices', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const payload = createInvoiceSchema.parse(request.body);
      const invoice = await billingService.createInvoice(getPrincipal(request), tenantId, payload, getAuditRequestContext(request));

      response.status(201).json({ invoice });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:tenantId/invoices/:invoiceId/send', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const params = invoiceParamsSchema.parse(request.params);
      const invoice = await billingService.sendInvoice(getPrincipal(request), tenantId, params.invoiceId, getAuditRequestContext(request));

      response.status(200).json({ invoice });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:tenantId/invoices/:invoiceId/pay', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const params = invoiceParamsSchema.parse(request.params);
      const payload = payInvoiceSchema.parse(request.body);
      const invoice = await billingService.payInvoice(
        getPrincipal(request),
        tenantId,
        params.invoiceId,
        payload.paymentMethodToken,
        getAuditRequestContext(request)
      );

      response.status(200).json({ invoice });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:tenantId/payments', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const payload = oneOffChargeSchema.parse(request.body);
      const event = await billingService.chargeOneOff(getPrincipal(request), tenantId, payload, getAuditRequestContext(request));

      response.status(201).json({ event });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:tenantId/refunds', async (request, response, next) => {
    try {
      const tenantId = getTenantIdParam(request);
      const payload = refundSchema.parse(request.body);
      const event = await billingService.refund(getPrincipal(request), tenantId, payload, getAuditRequestContext(request));

      response.status(201).json({ event });
    } catch (error) {
      next(error);
    }
  });

  return router;
}

export function createBillingCycleRoutes(billingService: BillingService): Router {
  const router = Router();

  router.use(requireAuthenticatedPrincipal);

  router.post('/', async (request, response, next) => {
    try {
      const result = await billingService.runBillingCycleFor(getPrincipal(request));
      response.status(200).json({ result });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
