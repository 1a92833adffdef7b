import type { Principal } from '../auth/auth-context.js';
import {
  averageRevenuePerCustomer,
  churnRisk,
  customerLifetimeValue,
  monthlyRecurringRevenue,
  revenueBreakdown,
  revenueForecast,
  type ArpuReport,
  type ChurnRiskReport,
  type LifetimeValueReport,
  type MrrReport,
  type RevenueBreakdown,
  type RevenueForecast
} from '../domain/analytics.js';
import type { Clock } from '../domain/clock.js';
import { normalizeCurrency } from '../domain/money.js';
import type { RevenueEvent } from '../repositories/revenue-event-repository.js';
import type { AuditRequestContext } from './audit-service.js';
import type { RevenueLedgerService } from './revenue-ledger-service.js';
import type { SecurityService } from './security-service.js';

export const MAX_FORECAST_MONTHS = 24;

export interface AnalyticsServiceConfig {
  churnGraceDays: number;
  forecastMaxGrowth: number;
  clvHorizonMonths: number;
}

export interface AnalyticsQuery {
  asOf?: Date;
  /** Defaults to the tenant's currency. */
  currency?: string;
}

export interface AnalyticsWindowQuery {
  from: Date;
  to: Date;
  currency?: string;
}

interface LedgerSlice {
  asOf: Date;
  currency: string;
  events: RevenueEvent[];
}

/** Read-only views reduced from the tenant's ledger slice on every call. */
export class AnalyticsService {
  public constructor(
    private readonly ledger: RevenueLedgerService,
    private readonly securityService: SecurityService,
    private readonly clock: Clock,
    private readonly config: AnalyticsServiceConfig
  ) {}

  public async monthlyRecurringRevenue(
    principal: Principal,
    tenantId: string,
    query: AnalyticsQuery = {},
    context: AuditRequestContext | null = null
  ): Promise<MrrReport> {
    const slice = await this.slice(principal, tenantId, query, context);
    return monthlyRecurringRevenue(slice.events, slice.asOf, slice.currency);
  }

  public async averageRevenuePerCustomer(
    principal: Principal,
    tenantId: string,
    query: AnalyticsWindowQuery,
    context: AuditRequestContext | null = null
  ): Promise<ArpuReport> {
    const slice = await this.slice(principal, tenantId, { asOf: query.to, currency: query.currency }, context);
    return averageRevenuePerCustomer(slice.events, query.from, query.to, slice.currency);
  }

  public async churnRisk(
    principal: Principal,
    tenantId: string,
    query: AnalyticsQuery = {},
    context: AuditRequestContext | null = null
  ): Promise<ChurnRiskReport> {
    const slice = await this.slice(principal, tenantId, query, context);
    return churnRisk(slice.events, slice.asOf, this.config.churnGraceDays, slice.currency);
  }

  public async customerLifetimeValue(
    principal: Principal,
    tenantId: string,
    customerId: string,
    query: AnalyticsQuery = {},
    context: AuditRequestContext | null = null
  ): Promise<LifetimeValueReport> {
    const slice = await this.slice(principal, tenantId, query, context);
    return customerLifetimeValue(slice.events, customerId, slice.asOf, this.config.clvHorizonMonths, slice.currency);
  }

  public async revenueForecast(
    principal: Principal,
    tenantId: string,
    months: number,
    query: AnalyticsQuery = {},
    context: AuditRequestContext | null = null
  ): Promise<RevenueForecast> {
    const slice = await this.slice(principal, tenantId, query, context);
    const horizon = Math.min(Math.max(Math.trunc(months), 1), MAX_FORECAST_MONTHS);
    return revenueForecast(slice.events, slice.asOf, horizon, this.config.forecastMaxGrowth, slice.currency);
  }

  public async revenueBreakdown(
    principal: Principal,
    tenantId: string,
    query: AnalyticsWindowQuery,
    context: AuditRequestContext | null = null
  ): Promise<RevenueBreakdown> {
    const slice = await this.slice(principal, tenantId, { asOf: query.to, currency: query.currency }, context);
    return revenueBreakdown(slice.events, query.from, query.to, slice.currency);
  }

  private async slice(
    principal: Principal,
    tenantId: string,
    query: AnalyticsQuery,
    context: AuditRequestContext | null
  ): Promise<LedgerSlice> {
    const tenant = await this.securityService.authorize('analytics.read', principal, { tenantId, resourceType: 'analytics' }, context);
    const asOf = query.asOf ?? this.clock.now();
    const events = await this.ledger.query({ tenantId, to: new Date(asOf.getTime() + 1) });

    return {
      asOf,
      currency: normalizeCurrency(query.currency ?? tenant.currency),
      events
    };
  }
}
