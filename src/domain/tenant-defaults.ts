import type { OverageRates, TenantLimits, TenantType } from '../repositories/tenant-repository.js';

const DEFAULT_LIMITS: Record<TenantType, TenantLimits> = {
  individual: {
    maxUsers: 5,
    maxStorageGb: 1,
    maxApiCallsPerMonth: 10_000,
    maxBandwidthGb: 10,
    maxCustomDomains: 0,
    rateLimitPerWindow: 60
  },
  'golf-course': {
    maxUsers: 1_000,
    maxStorageGb: 5,
    maxApiCallsPerMonth: 25_000,
    maxBandwidthGb: 100,
    maxCustomDomains: 1,
    rateLimitPerWindow: 300
  },
  'enterprise-chain': {
    maxUsers: 10_000,
    maxStorageGb: 100,
    maxApiCallsPerMonth: 1_000_000,
    maxBandwidthGb: 1_000,
    maxCustomDomains: 10,
    rateLimitPerWindow: 3_000
  }
};

export const DEFAULT_OVERAGE_RATES: OverageRates = {
  apiCalls: '0.001',
  storageGb: '0.50',
  bandwidthGb: '0.10'
};

const LIMIT_KEYS = [
  'maxUsers',
  'maxStorageGb',
  'maxApiCallsPerMonth',
  'maxBandwidthGb',
  'maxCustomDomains',
  'rateLimitPerWindow'
] as const satisfies ReadonlyArray<keyof TenantLimits>;

export function defaultLimitsFor(type: TenantType): TenantLimits {
  return { ...DEFAULT_LIMITS[type] };
}

/** A child location starts from a fraction of its chain's allowance and never above it. */
export function childDefaultLimits(parent: TenantLimits): TenantLimits {
  return {
    maxUsers: Math.floor(parent.maxUsers / 5),
    maxStorageGb: Math.floor(parent.maxStorageGb / 10),
    maxApiCallsPerMonth: Math.floor(parent.maxApiCallsPerMonth / 10),
    maxBandwidthGb: Math.floor(parent.maxBandwidthGb / 10),
    maxCustomDomains: 0,
    rateLimitPerWindow: Math.floor(parent.rateLimitPerWindow / 5)
  };
}

/** Names of the limits in `child` that exceed `parent`. */
export function limitsExceeding(child: TenantLimits, parent: TenantLimits): string[] {
  return LIMIT_KEYS.filter((key) => child[key] > parent[key]);
}
