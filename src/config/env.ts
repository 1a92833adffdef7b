import { z } from 'zod';

const booleanFlag = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toLowerCase() === 'true' : value),
  z.boolean()
);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().url().optional(),
  REDIS_URL: z.string().url().optional(),
  IDENTITY_ASSERTION_SECRET: z.string().min(16).default('dev-identity-secret-change-me'),
  PLATFORM_TENANT_SLUG: z.string().min(1).default('platform'),
  STRIPE_SECRET_KEY: z.string().min(1).optional(),
  BILLING_MAX_ATTEMPTS: z.coerce.number().int().positive().default(4),
  BILLING_RETRY_BASE_MINUTES: z.coerce.number().int().positive().default(60),
  BILLING_CONCURRENCY: z.coerce.number().int().positive().default(8),
  BILLING_PAYMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  BILLING_AMBIGUOUS_RETRIES: z.coerce.number().int().nonnegative().default(2),
  USAGE_FLUSH_INTERVAL_MS: z.coerce.number().int().positive().default(5_000),
  USAGE_RAW_RETENTION_HOURS: z.coerce.number().int().positive().default(24),
  USAGE_RATE_WINDOW_SECONDS: z.coerce.number().int().positive().default(60),
  ANALYTICS_CHURN_GRACE_DAYS: z.coerce.number().int().nonnegative().default(7),
  ANALYTICS_FORECAST_MAX_GROWTH: z.coerce.number().positive().max(1).default(0.2),
  ANALYTICS_CLV_HORIZON_MONTHS: z.coerce.number().int().positive().default(36),
  OTEL_ENABLED: booleanFlag.default(false),
  OTEL_SERVICE_NAME: z.string().min(1).default('tee-ledger-api'),
  OTEL_METRIC_EXPORT_INTERVAL_MS: z.coerce.number().int().positive().default(30_000)
});

export type Env = z.infer<typeof envSchema>;

export function getEnv(overrides: Partial<Record<keyof Env, unknown>> = {}): Env {
  return envSchema.parse({
    ...process.env,
    ...overrides
  });
}
