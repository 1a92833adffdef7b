import { randomUUID } from 'node:crypto';

import { ConcurrentModificationError, DuplicateError } from '../errors/domain-errors.js';
import {
  invoiceTotal,
  type BillingRepository,
  type CreateCustomerInput,
  type CreateInvoiceInput,
  type Customer,
  type Invoice,
  type InvoiceStatus,
  type UpdateInvoiceInput
} from './billing-repository.js';

function cloneCustomer(customer: Customer): Customer {
  return {
    ...customer,
    metadata: { ...customer.metadata },
    createdAt: new Date(customer.createdAt)
  };
}

function cloneOptionalDate(value: Date | null): Date | null {
  return value === null ? null : new Date(value);
}

function cloneInvoice(invoice: Invoice): Invoice {
  return {
    ...invoice,
    lineItems: invoice.lineItems.map((item) => ({ ...item, metadata: { ...item.metadata } })),
    dueAt: new Date(invoice.dueAt),
    sentAt: cloneOptionalDate(invoice.sentAt),
    paidAt: cloneOptionalDate(invoice.paidAt),
    overdueAt: cloneOptionalDate(invoice.overdueAt),
    createdAt: new Date(invoice.createdAt),
    updatedAt: new Date(invoice.updatedAt)
  };
}

export class InMemoryBillingRepository implements BillingRepository {
  private readonly customersById = new Map<string, Customer>();

  private readonly invoicesById = new Map<string, Invoice>();

  public createCustomer(input: CreateCustomerInput): Promise<Customer> {
    const email = input.email.toLowerCase();
    const taken = [...this.customersById.values()].some((customer) => (
      customer.tenantId === input.tenantId && customer.email === email
    ));

    if (taken) {
      return Promise.reject(new DuplicateError('CUSTOMER_EMAIL_TAKEN', 'A customer with this email already exists in the tenant.'));
    }

    const customer: Customer = {
      id: randomUUID(),
      tenantId: input.tenantId,
      email,
      name: input.name,
      metadata: { ...input.metadata },
      createdAt: new Date()
    };

    this.customersById.set(customer.id, cloneCustomer(customer));
    return Promise.resolve(cloneCustomer(customer));
  }

  public findCustomerById(customerId: string): Promise<Customer | null> {
    const customer = this.customersById.get(customerId);
    return Promise.resolve(customer === undefined ? null : cloneCustomer(customer));
  }

  public listCustomers(tenantId: string): Promise<Customer[]> {
    return Promise.resolve(
      [...this.customersById.values()]
        .filter((customer) => customer.tenantId === tenantId)
        .sort((left, right) => left.email.localeCompare(right.email))
        .map(cloneCustomer)
    );
  }

  public createInvoice(input: CreateInvoiceInput): Promise<Invoice> {
    const now = new Date();
    const invoice: Invoice = {
      id: randomUUID(),
      tenantId: input.tenantId,
      customerId: input.customerId,
      subscriptionId: input.subscriptionId,
      currency: input.currency,
      lineItems: input.lineItems.map((item) => ({ ...item, metadata: { ...item.metadata } })),
      totalMinor: invoiceTotal(input.lineItems),
      dueAt: new Date(input.dueAt),
      status: 'draft',
      sentAt: null,
      paidAt: null,
      overdueAt: null,
      processorReference: null,
      version: 1,
      createdAt: now,
      updatedAt: now
    };

    this.invoicesById.set(invoice.id, cloneInvoice(invoice));
    return Promise.resolve(cloneInvoice(invoice));
  }

  public findInvoiceById(invoiceId: string): Promise<Invoice | null> {
    const invoice = this.invoicesById.get(invoiceId);
    return Promise.resolve(invoice === undefined ? null : cloneInvoice(invoice));
  }

  public listInvoices(tenantId: string, statuses?: readonly InvoiceStatus[]): Promise<Invoice[]> {
    return Promise.resolve(
      [...this.invoicesById.values()]
        .filter((invoice) => invoice.tenantId === tenantId && (statuses === undefined || statuses.includes(invoice.status)))
        .sort((left, right) => left.createdAt.getTime() - right.createdAt.getTime() || left.id.localeCompare(right.id))
        .map(cloneInvoice)
    );
  }

  public listSentInvoicesDueBefore(now: Date): Promise<Invoice[]> {
    return Promise.resolve(
      [...this.invoicesById.values()]
        .filter((invoice) => invoice.status === 'sent' && invoice.dueAt.getTime() < now.getTime())
        .map(cloneInvoice)
    );
  }

  public updateInvoice(input: UpdateInvoiceInput): Promise<Invoice | null> {
    const existing = this.invoicesById.get(input.invoiceId);
    if (existing === undefined) {
      return Promise.resolve(null);
    }

    if (existing.version !== input.expectedVersion) {
      return Promise.reject(new ConcurrentModificationError('invoice', input.invoiceId));
    }

    const updated: Invoice = {
      ...existing,
      ...input.changes,
      version: existing.version + 1,
      updatedAt: new Date()
    };

    this.invoicesById.set(updated.id, cloneInvoice(updated));
    return Promise.resolve(cloneInvoice(updated));
  }
}
