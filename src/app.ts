import express, { type Express } from 'express';
import helmet from 'helmet';
import rateLimit, { ipKeyGenerator } from 'express-rate-limit';
import { Pool } from 'pg';
import { createClient, type RedisClientType } from 'redis';

import { getEnv, type Env } from './config/env.js';
import { systemClock, type Clock } from './domain/clock.js';
import { StaticTierCatalog, type TierCatalog } from './domain/tier-catalog.js';
import { AppError } from './errors/app-error.js';
import { errorHandler } from './errors/error-handler.js';
import { createIdentityAuthMiddleware } from './http/middlewares/identity-auth.js';
import { attachRequestTelemetry } from './http/middlewares/request-telemetry.js';
import { attachTraceId } from './http/middlewares/trace-id.js';
import { createTenantRateLimitMiddleware, createUsageMeteringMiddleware } from './http/middlewares/usage-metering.js';
import { createAnalyticsRoutes } from './http/routes/analytics-routes.js';
import { createAuditLogRoutes } from './http/routes/audit-log-routes.js';
import { createBillingCycleRoutes, createBillingRoutes } from './http/routes/billing-routes.js';
import { createRevenueRoutes } from './http/routes/revenue-routes.js';
import { createTenantRoutes } from './http/routes/tenant-routes.js';
import { createUsageRoutes } from './http/routes/usage-routes.js';
import type { IdentityProvider } from './identity/identity-provider.js';
import { SignedAssertionIdentityProvider } from './identity/signed-assertion-identity-provider.js';
import { InMemoryPaymentProcessor } from './payments/in-memory-payment-processor.js';
import type { PaymentProcessor } from './payments/payment-processor.js';
import { StripePaymentProcessor } from './payments/stripe-payment-processor.js';
import type { AuditLogRepository } from './repositories/audit-log-repository.js';
import type { BillingRepository } from './repositories/billing-repository.js';
import { InMemoryAuditLogRepository } from './repositories/in-memory-audit-log-repository.js';
import { InMemoryBillingRepository } from './repositories/in-memory-billing-repository.js';
import { InMemoryRateLimitRepository } from './repositories/in-memory-rate-limit-repository.js';
import { InMemoryRevenueEventRepository } from './repositories/in-memory-revenue-event-repository.js';
import { InMemorySubscriptionRepository } from './repositories/in-memory-subscription-repository.js';
import { InMemoryTenantRepository } from './repositories/in-memory-tenant-repository.js';
import { InMemoryUsageRepository } from './repositories/in-memory-usage-repository.js';
import { PostgresAuditLogRepository } from './repositories/postgres-audit-log-repository.js';
import { PostgresBillingRepository } from './repositories/postgres-billing-repository.js';
import { PostgresRevenueEventRepository } from './repositories/postgres-revenue-event-repository.js';
import { PostgresSubscriptionRepository } from './repositories/postgres-subscription-repository.js';
import { PostgresTenantRepository } from './repositories/postgres-tenant-repository.js';
import { PostgresUsageRepository } from './repositories/postgres-usage-repository.js';
import type { RateLimitRepository } from './repositories/rate-limit-repository.js';
import { RedisRateLimitRepository } from './repositories/redis-rate-limit-repository.js';
import type { RevenueEventRepository } from './repositories/revenue-event-repository.js';
import type { SubscriptionRepository } from './repositories/subscription-repository.js';
import type { Tenant, TenantRepository } from './repositories/tenant-repository.js';
import type { UsageRepository } from './repositories/usage-repository.js';
import { AnalyticsService } from './services/analytics-service.js';
import { AuditLogQueryService } from './services/audit-log-query-service.js';
import { AuditService } from './services/audit-service.js';
import { BillingService } from './services/billing-service.js';
import { ExportService } from './services/export-service.js';
import { RevenueLedgerService } from './services/revenue-ledger-service.js';
import { SecurityService } from './services/security-service.js';
import { SubscriptionService } from './services/subscription-service.js';
import { TenantService } from './services/tenant-service.js';
import { UsageService } from './services/usage-service.js';

export interface CreateAppOptions {
  envOverrides?: Partial<Record<keyof Env, unknown>>;
  clock?: Clock;
  identityProvider?: IdentityProvider;
  paymentProcessor?: PaymentProcessor;
  tierCatalog?: TierCatalog;
  tenantRepository?: TenantRepository;
  auditLogRepository?: AuditLogRepository;
  usageRepository?: UsageRepository;
  rateLimitRepository?: RateLimitRepository;
  subscriptionRepository?: SubscriptionRepository;
  billingRepository?: BillingRepository;
  revenueEventRepository?: RevenueEventRepository;
}

export interface AppServices {
  securityService: SecurityService;
  auditService: AuditService;
  tenantService: TenantService;
  usageService: UsageService;
  ledger: RevenueLedgerService;
  subscriptionService: SubscriptionService;
  billingService: BillingService;
  analyticsService: AnalyticsService;
  exportService: ExportService;
  auditLogQueryService: AuditLogQueryService;
}

export interface AppRuntime {
  app: Express;
  env: Env;
  clock: Clock;
  platformTenant: Tenant;
  paymentProcessor: PaymentProcessor;
  services: AppServices;
  tenantRepository: TenantRepository;
  auditLogRepository: AuditLogRepository;
  usageRepository: UsageRepository;
  subscriptionRepository: SubscriptionRepository;
  billingRepository: BillingRepository;
  revenueEventRepository: RevenueEventRepository;
  close(): Promise<void>;
}

function createGlobalRateLimiter() {
  return rateLimit({
    windowMs: 60_000,
    limit: 200,
    standardHeaders: 'draft-8',
    legacyHeaders: false,
    keyGenerator: (request) => ipKeyGenerator(request.ip ?? '')
  });
}

function hasValue(value: string | undefined): value is string {
  return typeof value === 'string' && value.length > 0;
}

export async function createApp(options: CreateAppOptions = {}): Promise<AppRuntime> {
  const env = getEnv(options.envOverrides);
  const clock = options.clock ?? systemClock;
  const app = express();

  let pgPool: Pool | null = null;
  const getPool = (): Pool => {
    if (pgPool !== null) {
      return pgPool;
    }

    if (!hasValue(env.DATABASE_URL)) {
      throw new Error('DATABASE_URL is not configured.');
    }

    pgPool = new Pool({ connectionString: env.DATABASE_URL });
    return pgPool;
  };

  const usePostgres = hasValue(env.DATABASE_URL);

  const tenantRepository = options.tenantRepository
    ?? (usePostgres ? new PostgresTenantRepository(getPool()) : new InMemoryTenantRepository());
  const auditLogRepository = options.auditLogRepository
    ?? (usePostgres ? new PostgresAuditLogRepository(getPool()) : new InMemoryAuditLogRepository());
  const usageRepository = options.usageRepository
    ?? (usePostgres ? new PostgresUsageRepository(getPool()) : new InMemoryUsageRepository());
  const subscriptionRepository = options.subscriptionRepository
    ?? (usePostgres ? new PostgresSubscriptionRepository(getPool()) : new InMemorySubscriptionRepository());
  const billingRepository = options.billingRepository
    ?? (usePostgres ? new PostgresBillingRepository(getPool()) : new InMemoryBillingRepository());
  const revenueEventRepository = options.revenueEventRepository
    ?? (usePostgres ? new PostgresRevenueEventRepository(getPool()) : new InMemoryRevenueEventRepository());

  const rateLimitRepository = options.rateLimitRepository ?? await (async (): Promise<RateLimitRepository> => {
    if (!hasValue(env.REDIS_URL)) {
      return new InMemoryRateLimitRepository();
    }

    const client: RedisClientType = createClient({ url: env.REDIS_URL });
    await client.connect();
    return new RedisRateLimitRepository(client);
  })();

  const paymentProcessor = options.paymentProcessor ?? (() => {
    if (hasValue(env.STRIPE_SECRET_KEY)) {
      return new StripePaymentProcessor(env.STRIPE_SECRET_KEY);
    }

    if (env.NODE_ENV === 'production') {
      throw new AppError(500, 'CONFIG_INVALID', 'STRIPE_SECRET_KEY is required in production.');
    }

    console.warn('payment_processor_in_memory', { nodeEnv: env.NODE_ENV });
    return new InMemoryPaymentProcessor();
  })();

  const identityProvider = options.identityProvider
    ?? new SignedAssertionIdentityProvider(env.IDENTITY_ASSERTION_SECRET, clock);
  const tierCatalog = options.tierCatalog ?? new StaticTierCatalog();

  const auditService = new AuditService(auditLogRepository);
  const securityService = new SecurityService(tenantRepository, auditService, {
    platformTenantSlug: env.PLATFORM_TENANT_SLUG
  });
  const tenantService = new TenantService(tenantRepository, securityService, auditService, {
    platformTenantSlug: env.PLATFORM_TENANT_SLUG
  });
  const usageService = new UsageService(usageRepository, tenantRepository, rateLimitRepository, securityService, clock, {
    flushIntervalMs: env.USAGE_FLUSH_INTERVAL_MS,
    rawRetentionHours: env.USAGE_RAW_RETENTION_HOURS,
    rateWindowSeconds: env.USAGE_RATE_WINDOW_SECONDS
  });
  const ledger = new RevenueLedgerService(revenueEventRepository, securityService, auditService, clock);
  const subscriptionService = new SubscriptionService(
    subscriptionRepository,
    billingRepository,
    tierCatalog,
    securityService,
    auditService,
    clock
  );
  const billingService = new BillingService(
    billingRepository,
    subscriptionService,
    usageService,
    ledger,
    securityService,
    auditService,
    paymentProcessor,
    clock,
    {
      maxAttempts: env.BILLING_MAX_ATTEMPTS,
      retryBaseMinutes: env.BILLING_RETRY_BASE_MINUTES,
      concurrency: env.BILLING_CONCURRENCY,
      paymentTimeoutMs: env.BILLING_PAYMENT_TIMEOUT_MS,
      ambiguousRetries: env.BILLING_AMBIGUOUS_RETRIES
    }
  );
  const analyticsService = new AnalyticsService(ledger, securityService, clock, {
    churnGraceDays: env.ANALYTICS_CHURN_GRACE_DAYS,
    forecastMaxGrowth: env.ANALYTICS_FORECAST_MAX_GROWTH,
    clvHorizonMonths: env.ANALYTICS_CLV_HORIZON_MONTHS
  });
  const exportService = new ExportService(
    tenantRepository,
    billingRepository,
    usageRepository,
    subscriptionService,
    usageService,
    ledger,
    securityService,
    auditService,
    clock
  );
  const auditLogQueryService = new AuditLogQueryService(auditLogRepository, securityService, {
    listDefaultLimit: 50,
    listMaxLimit: 100
  });

  const platformTenant = await tenantService.bootstrapPlatformTenant();
  if (env.NODE_ENV !== 'test') {
    usageService.start();
  }

  app.disable('x-powered-by');
  app.use(helmet());
  app.use(express.json());
  app.use(attachTraceId);
  if (env.NODE_ENV !== 'test') {
    app.use(attachRequestTelemetry);
  }

  app.use(createGlobalRateLimiter());
  app.use(createIdentityAuthMiddleware(identityProvider, securityService));
  app.use(createUsageMeteringMiddleware(usageService));
  app.use('/v1', createTenantRateLimitMiddleware(usageService));

  app.use('/v1/tenants', createTenantRoutes(tenantService, exportService));
  app.use('/v1/tenants', createBillingRoutes(billingService, subscriptionService));
  app.use('/v1/tenants', createRevenueRoutes(ledger));
  app.use('/v1/tenants', createAnalyticsRoutes(analyticsService));
  app.use('/v1/tenants', createUsageRoutes(usageService));
  app.use('/v1/tenants', createAuditLogRoutes(auditLogQueryService));
  app.use('/v1/billing/cycles', createBillingCycleRoutes(billingService));

  app.get('/health', (_request, response) => {
    response.status(200).json({
      status: 'ok'
    });
  });

  app.use((_request, _response, next) => {
    next(new AppError(404, 'NOT_FOUND', 'Route not found.'));
  });

  app.use(errorHandler);

  return {
    app,
    env,
    clock,
    platformTenant,
    paymentProcessor,
    services: {
      securityService,
      auditService,
      tenantService,
      usageService,
      ledger,
      subscriptionService,
      billingService,
      analyticsService,
      exportService,
      auditLogQueryService
    },
    tenantRepository,
    auditLogRepository,
    usageRepository,
    subscriptionRepository,
    billingRepository,
    revenueEventRepository,
    async close() {
      await usageService.stop();
      if (pgPool !== null) {
        await pgPool.end();
      }
      await rateLimitRepository.close();
    }
  };
}
