import { createApp, type AppRuntime } from '../../src/app.js';
import type { Principal } from '../../src/auth/auth-context.js';
import type { Env } from '../../src/config/env.js';
import type { RoleClaim } from '../../src/identity/identity-provider.js';
import { InMemoryIdentityProvider } from '../../src/identity/in-memory-identity-provider.js';
import { InMemoryPaymentProcessor } from '../../src/payments/in-memory-payment-processor.js';
import type { Tenant, TenantType } from '../../src/repositories/tenant-repository.js';
import { ManualClock } from './manual-clock.js';

interface CreateTestRuntimeOptions {
  envOverrides?: Partial<Record<keyof Env, unknown>>;
  start?: string;
}

export interface TestRuntime {
  runtime: AppRuntime;
  clock: ManualClock;
  identities: InMemoryIdentityProvider;
  processor: InMemoryPaymentProcessor;
}

export interface CallerSpec {
  userId: string;
  tenantId: string;
  roleClaims?: RoleClaim[];
}

export async function createTestRuntime(options: CreateTestRuntimeOptions = {}): Promise<TestRuntime> {
  const clock = new ManualClock(options.start);
  const identities = new InMemoryIdentityProvider();
  const processor = new InMemoryPaymentProcessor();

  const runtime = await createApp({
    envOverrides: {
      NODE_ENV: 'test',
      IDENTITY_ASSERTION_SECRET: 'test-secret-for-assertions',
      DATABASE_URL: undefined,
      REDIS_URL: undefined,
      STRIPE_SECRET_KEY: undefined,
      ...options.envOverrides
    },
    clock,
    identityProvider: identities,
    paymentProcessor: processor
  });

  return { runtime, clock, identities, processor };
}

/** Registers an identity for the caller and returns its `authorization` header value. */
export function bearerFor(identities: InMemoryIdentityProvider, caller: CallerSpec): string {
  const assertion = `assertion:${caller.tenantId}:${caller.userId}`;
  identities.register(assertion, {
    userId: caller.userId,
    tenantId: caller.tenantId,
    roleClaims: caller.roleClaims ?? []
  });

  return `Bearer ${assertion}`;
}

export function platformOperator(test: TestRuntime): string {
  return bearerFor(test.identities, {
    userId: 'platform-operator',
    tenantId: test.runtime.platformTenant.id,
    roleClaims: [{ role: 'Owner', scope: 'tenant' }]
  });
}

export function principalFor(test: TestRuntime, caller: CallerSpec): Promise<Principal> {
  return test.runtime.services.securityService.principalFor({
    userId: caller.userId,
    tenantId: caller.tenantId,
    roleClaims: caller.roleClaims ?? []
  });
}

export function platformPrincipal(test: TestRuntime): Promise<Principal> {
  return principalFor(test, {
    userId: 'platform-operator',
    tenantId: test.runtime.platformTenant.id,
    roleClaims: [{ role: 'Owner', scope: 'tenant' }]
  });
}

export interface SeededTenant {
  tenant: Tenant;
  owner: Principal;
  ownerBearer: string;
}

/** Creates and activates a tenant whose owner is `${slug}-owner`. */
export async function seedTenant(
  test: TestRuntime,
  spec: { slug: string; type: TenantType; parentTenantId?: string; creator?: Principal }
): Promise<SeededTenant> {
  const { tenantService } = test.runtime.services;
  const creator = spec.creator ?? await platformPrincipal(test);
  const ownerUserId = `${spec.slug}-owner`;

  const created = await tenantService.createTenant(creator, {
    slug: spec.slug,
    name: spec.slug,
    type: spec.type,
    parentTenantId: spec.parentTenantId ?? null,
    ownerUserId
  });

  const owner = await principalFor(test, { userId: ownerUserId, tenantId: created.id });
  const tenant = await tenantService.activateTenant(owner, created.id);

  return {
    tenant,
    owner,
    ownerBearer: bearerFor(test.identities, { userId: ownerUserId, tenantId: created.id })
  };
}
