import type { RevenueEventType } from './revenue-event-repository.js';

export interface Customer {
  id: string;
  tenantId: string;
  email: string;
  name: string;
  metadata: Record<string, string>;
  createdAt: Date;
}

export const INVOICE_STATUSES = ['draft', 'sent', 'paid', 'overdue'] as const;

export type InvoiceStatus = (typeof INVOICE_STATUSES)[number];

export const LINE_ITEM_EVENT_TYPES = [
  'subscription-renewed',
  'setup-fee',
  'usage-charge',
  'add-on-purchase'
] as const satisfies readonly RevenueEventType[];

export type LineItemEventType = (typeof LINE_ITEM_EVENT_TYPES)[number];

export interface InvoiceLineItem {
  description: string;
  amountMinor: number;
  currency: string;
  quantity: number;
  eventType: LineItemEventType;
  metadata: Record<string, string>;
}

export interface Invoice {
  id: string;
  tenantId: string;
  customerId: string;
  subscriptionId: string | null;
  currency: string;
  lineItems: InvoiceLineItem[];
  totalMinor: number;
  dueAt: Date;
  status: InvoiceStatus;
  sentAt: Date | null;
  paidAt: Date | null;
  overdueAt: Date | null;
  processorReference: string | null;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateCustomerInput {
  tenantId: string;
  email: string;
  name: string;
  metadata: Record<string, string>;
}

export interface CreateInvoiceInput {
  tenantId: string;
  customerId: string;
  subscriptionId: string | null;
  currency: string;
  lineItems: InvoiceLineItem[];
  dueAt: Date;
}

export type InvoiceChanges = Partial<Pick<Invoice, 'status' | 'sentAt' | 'paidAt' | 'overdueAt' | 'processorReference'>>;

export interface UpdateInvoiceInput {
  invoiceId: string;
  expectedVersion: number;
  changes: InvoiceChanges;
}

export interface BillingRepository {
  createCustomer(input: CreateCustomerInput): Promise<Customer>;
  /** Unscoped lookup; callers check the owning tenant through the isolation guard. */
  findCustomerById(customerId: string): Promise<Customer | null>;
  listCustomers(tenantId: string): Promise<Customer[]>;
  createInvoice(input: CreateInvoiceInput): Promise<Invoice>;
  findInvoiceById(invoiceId: string): Promise<Invoice | null>;
  listInvoices(tenantId: string, statuses?: readonly InvoiceStatus[]): Promise<Invoice[]>;
  listSentInvoicesDueBefore(now: Date): Promise<Invoice[]>;
  updateInvoice(input: UpdateInvoiceInput): Promise<Invoice | null>;
}

export function invoiceTotal(lineItems: readonly InvoiceLineItem[]): number {
  return lineItems.reduce((total, item) => total + item.amountMinor * item.quantity, 0);
}
