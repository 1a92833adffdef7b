export const REVENUE_EVENT_TYPES = [
  'subscription-created',
  'subscription-renewed',
  'subscription-prorated',
  'setup-fee',
  'usage-charge',
  'add-on-purchase',
  'refund',
  'migration'
] as const;

export type RevenueEventType = (typeof REVENUE_EVENT_TYPES)[number];

export const RECURRING_EVENT_TYPES: readonly RevenueEventType[] = [
  'subscription-created',
  'subscription-renewed',
  'subscription-prorated'
];

export const REVENUE_SOURCES = ['payment-processor', 'internal', 'manual'] as const;

export type RevenueSource = (typeof REVENUE_SOURCES)[number];

export interface RevenueEvent {
  id: string;
  tenantId: string;
  type: RevenueEventType;
  amountMinor: number;
  currency: string;
  occurredAt: Date;
  subscriptionId: string | null;
  customerId: string | null;
  invoiceId: string | null;
  metadata: Record<string, string>;
  source: RevenueSource;
  recordedAt: Date;
}

export type NewRevenueEvent = Omit<RevenueEvent, 'recordedAt'>;

export interface RevenueEventQuery {
  tenantId?: string;
  types?: readonly RevenueEventType[];
  from?: Date;
  to?: Date;
  subscriptionId?: string;
  customerId?: string;
}

export interface AppendRevenueEventResult {
  inserted: boolean;
  event: RevenueEvent;
}

export interface RevenueEventRepository {
  /** Inserts unless the id exists, in which case the stored event is returned untouched. */
  append(event: NewRevenueEvent): Promise<AppendRevenueEventResult>;
  findById(eventId: string): Promise<RevenueEvent | null>;
  query(filter: RevenueEventQuery): Promise<RevenueEvent[]>;
}
