import type { Principal } from '../auth/auth-context.js';
import type { Clock } from '../domain/clock.js';
import type { BillingRepository, Customer, Invoice } from '../repositories/billing-repository.js';
import type { RevenueEvent } from '../repositories/revenue-event-repository.js';
import type { Subscription } from '../repositories/subscription-repository.js';
import type { RoleAssignment, Tenant, TenantRepository } from '../repositories/tenant-repository.js';
import { USAGE_GRANULARITIES, type UsageBucket, type UsageRepository } from '../repositories/usage-repository.js';
import type { AuditRequestContext, AuditService } from './audit-service.js';
import type { RevenueLedgerService } from './revenue-ledger-service.js';
import type { SecurityService } from './security-service.js';
import type { SubscriptionService } from './subscription-service.js';
import type { UsageService } from './usage-service.js';

export interface TenantExport {
  exportedAt: Date;
  tenant: Tenant;
  roleAssignments: RoleAssignment[];
  customers: Customer[];
  subscriptions: Subscription[];
  invoices: Invoice[];
  usageRollups: UsageBucket[];
  revenueEvents: RevenueEvent[];
}

/** Full snapshot of one tenant. Child tenants are not included. */
export class ExportService {
  public constructor(
    private readonly tenantRepository: TenantRepository,
    private readonly billingRepository: BillingRepository,
    private readonly usageRepository: UsageRepository,
    private readonly subscriptionService: SubscriptionService,
    private readonly usageService: UsageService,
    private readonly ledger: RevenueLedgerService,
    private readonly securityService: SecurityService,
    private readonly auditService: AuditService,
    private readonly clock: Clock
  ) {}

  public async exportTenantData(
    principal: Principal,
    tenantId: string,
    context: AuditRequestContext | null = null
  ): Promise<TenantExport> {
    const tenant = await this.securityService.authorize('exports.create', principal, { tenantId, resourceType: 'tenant_export' }, context);
    await this.usageService.flush();

    const usageRollups: UsageBucket[] = [];
    for (const granularity of USAGE_GRANULARITIES.filter((candidate) => candidate !== 'minute')) {
      usageRollups.push(...await this.usageRepository.listBuckets({ tenantId, granularity }));
    }

    const snapshot: TenantExport = {
      exportedAt: this.clock.now(),
      tenant,
      roleAssignments: await this.tenantRepository.listRoleAssignments(tenantId),
      customers: await this.billingRepository.listCustomers(tenantId),
      subscriptions: await this.subscriptionService.listAllSubscriptions(tenantId),
      invoices: await this.billingRepository.listInvoices(tenantId),
      usageRollups,
      revenueEvents: await this.ledger.query({ tenantId })
    };

    await this.auditService.recordSafely({
      tenantId,
      actorUserId: principal.userId,
      action: 'tenant.exported',
      targetType: 'tenant',
      targetId: tenantId,
      metadata: {
        customers: snapshot.customers.length,
        subscriptions: snapshot.subscriptions.length,
        revenueEvents: snapshot.revenueEvents.length
      },
      ...context
    });

    return snapshot;
  }
}
