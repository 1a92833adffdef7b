import { performance } from 'node:perf_hooks';

import type { Pool, PoolClient } from 'pg';

import { recordDbTransaction } from '../telemetry/metrics.js';

/** `app.tenant_id` value that row-level security treats as platform-wide. */
export const PLATFORM_SCOPE = '*';

export function getSingleRow<T>(rows: T[]): T | null {
  const [row] = rows;
  return row ?? null;
}

export function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object'
    && error !== null
    && 'code' in error
    && error.code === '23505';
}

async function setLocal(client: PoolClient, key: string, value: string): Promise<void> {
  await client.query('SELECT set_config($1, $2, true)', [key, value]);
}

/**
 * Runs `callback` in a transaction whose row-level security scope is
 * `tenantScope`, or platform-wide when null.
 */
export async function withTransaction<T>(
  pool: Pool,
  tenantScope: string | null,
  callback: (client: PoolClient) => Promise<T>
): Promise<T> {
  const startedAt = performance.now();
  const scope = tenantScope === null ? 'platform' : 'tenant';
  const client = await pool.connect();

  try {
    await client.query('BEGIN');
    await setLocal(client, 'app.tenant_id', tenantScope ?? PLATFORM_SCOPE);
    const result = await callback(client);
    await client.query('COMMIT');
    recordDbTransaction({ scope, success: 'true' }, performance.now() - startedAt);
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    recordDbTransaction({ scope, success: 'false' }, performance.now() - startedAt);
    throw error;
  } finally {
    client.release();
  }
}
