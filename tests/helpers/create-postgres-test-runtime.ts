import { Pool } from 'pg';

import { createTestRuntime, type TestRuntime } from './create-test-runtime.js';

function resolveDatabaseUrl(): string {
  const value = process.env.TEST_DATABASE_URL ?? process.env.DATABASE_URL;
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error('TEST_DATABASE_URL (or DATABASE_URL) must be set for Postgres integration tests.');
  }

  return value;
}

/** Expects a database that `npm run migrate` has already brought up to date. */
export async function createPostgresTestRuntime(start?: string): Promise<TestRuntime> {
  return createTestRuntime({
    ...(start === undefined ? {} : { start }),
    envOverrides: {
      DATABASE_URL: resolveDatabaseUrl(),
      OTEL_ENABLED: false
    }
  });
}

export async function resetPostgresState(): Promise<void> {
  const pool = new Pool({ connectionString: resolveDatabaseUrl() });

  try {
    await pool.query(`
      TRUNCATE TABLE
        audit_log_events,
        usage_period_marks,
        usage_storage_peaks,
        usage_buckets,
        revenue_events,
        revenue_event_keys,
        invoices,
        subscriptions,
        customers,
        role_assignments,
        tenants
      RESTART IDENTITY CASCADE
    `);
  } finally {
    await pool.end();
  }
}
