import { addMonths } from './clock.js';

export const BILLING_CYCLES = ['monthly', 'annual'] as const;

export type BillingCycle = (typeof BILLING_CYCLES)[number];

export function addBillingCycle(start: Date, cycle: BillingCycle): Date {
  return addMonths(start, cycle === 'monthly' ? 1 : 12);
}

export const REVENUE_STREAMS = ['consumer', 'white-label', 'analytics', 'api'] as const;

export type RevenueStream = (typeof REVENUE_STREAMS)[number];

export interface SubscriptionTier {
  id: string;
  family: string;
  displayName: string;
  stream: RevenueStream;
  currency: string;
  priceMinor: Record<BillingCycle, number>;
  features: readonly string[];
}

const TIERS: readonly SubscriptionTier[] = [
  {
    id: 'starter',
    family: 'golfer',
    displayName: 'Starter',
    stream: 'consumer',
    currency: 'USD',
    priceMinor: { monthly: 2_900, annual: 29_000 },
    features: ['course-management', 'booking', 'basic-analytics']
  },
  {
    id: 'professional',
    family: 'golfer',
    displayName: 'Professional',
    stream: 'consumer',
    currency: 'USD',
    priceMinor: { monthly: 9_900, annual: 99_000 },
    features: ['course-management', 'booking', 'advanced-analytics', 'priority-support']
  },
  {
    id: 'white-label-basic',
    family: 'white-label',
    displayName: 'White Label Basic',
    stream: 'white-label',
    currency: 'USD',
    priceMinor: { monthly: 50_000, annual: 500_000 },
    features: ['custom-branding', 'member-portal', 'tee-sheet']
  },
  {
    id: 'white-label-pro',
    family: 'white-label',
    displayName: 'White Label Pro',
    stream: 'white-label',
    currency: 'USD',
    priceMinor: { monthly: 120_000, annual: 1_200_000 },
    features: ['custom-branding', 'member-portal', 'tee-sheet', 'custom-domain', 'sso']
  },
  {
    id: 'white-label-chain',
    family: 'white-label',
    displayName: 'White Label Chain',
    stream: 'white-label',
    currency: 'USD',
    priceMinor: { monthly: 150_000, annual: 1_500_000 },
    features: ['custom-branding', 'member-portal', 'tee-sheet', 'custom-domain', 'sso', 'multi-location']
  },
  {
    id: 'insights',
    family: 'analytics',
    displayName: 'Revenue Insights',
    stream: 'analytics',
    currency: 'USD',
    priceMinor: { monthly: 19_900, annual: 199_000 },
    features: ['cohort-reports', 'forecasting', 'benchmarks']
  },
  {
    id: 'api-developer',
    family: 'api',
    displayName: 'API Developer',
    stream: 'api',
    currency: 'USD',
    priceMinor: { monthly: 4_900, annual: 49_000 },
    features: ['course-data-api']
  },
  {
    id: 'api-business',
    family: 'api',
    displayName: 'API Business',
    stream: 'api',
    currency: 'USD',
    priceMinor: { monthly: 19_900, annual: 199_000 },
    features: ['course-data-api', 'booking-api', 'webhooks']
  }
];

export interface TierCatalog {
  find(tierId: string): SubscriptionTier | null;
  list(): readonly SubscriptionTier[];
}

export class StaticTierCatalog implements TierCatalog {
  private readonly tiersById: Map<string, SubscriptionTier>;

  public constructor(tiers: readonly SubscriptionTier[] = TIERS) {
    this.tiersById = new Map(tiers.map((tier) => [tier.id, tier]));
  }

  public find(tierId: string): SubscriptionTier | null {
    return this.tiersById.get(tierId) ?? null;
  }

  public list(): readonly SubscriptionTier[] {
    return [...this.tiersById.values()];
  }
}
