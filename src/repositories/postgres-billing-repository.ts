import type { Pool } from 'pg';

import { getSingleRow, isUniqueViolation, withTransaction } from '../db/pg-helpers.js';
import { ConcurrentModificationError, DuplicateError } from '../errors/domain-errors.js';
import {
  invoiceTotal,
  type BillingRepository,
  type CreateCustomerInput,
  type CreateInvoiceInput,
  type Customer,
  type Invoice,
  type InvoiceLineItem,
  type InvoiceStatus,
  type UpdateInvoiceInput
} from './billing-repository.js';

interface CustomerRow {
  id: string;
  tenant_id: string;
  email: string;
  name: string;
  metadata: Record<string, string>;
  created_at: Date;
}

interface InvoiceRow {
  id: string;
  tenant_id: string;
  customer_id: string;
  subscription_id: string | null;
  currency: string;
  line_items: InvoiceLineItem[];
  total_minor: string;
  due_at: Date;
  status: InvoiceStatus;
  sent_at: Date | null;
  paid_at: Date | null;
  overdue_at: Date | null;
  processor_reference: string | null;
  version: number;
  created_at: Date;
  updated_at: Date;
}

function mapCustomer(row: CustomerRow): Customer {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    email: row.email,
    name: row.name,
    metadata: row.metadata,
    createdAt: row.created_at
  };
}

function mapInvoice(row: InvoiceRow): Invoice {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    customerId: row.customer_id,
    subscriptionId: row.subscription_id,
    currency: row.currency,
    lineItems: row.line_items,
    totalMinor: Number.parseInt(row.total_minor, 10),
    dueAt: row.due_at,
    status: row.status,
    sentAt: row.sent_at,
    paidAt: row.paid_at,
    overdueAt: row.overdue_at,
    processorReference: row.processor_reference,
    version: row.version,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

export class PostgresBillingRepository implements BillingRepository {
  public constructor(private readonly pool: Pool) {}

  public async createCustomer(input: CreateCustomerInput): Promise<Customer> {
    try {
      return await withTransaction(this.pool, input.tenantId, async (client) => {
        const result = await client.query<CustomerRow>(
          `
          INSERT INTO customers (tenant_id, email, name, metadata, created_at)
          VALUES ($1, LOWER($2), $3, $4::jsonb, NOW())
          RETURNING *
          `,
          [input.tenantId, input.email, input.name, JSON.stringify(input.metadata)]
        );

        const row = getSingleRow(result.rows);
        if (row === null) {
          throw new Error('Failed to create customer.');
        }

        return mapCustomer(row);
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateError('CUSTOMER_EMAIL_TAKEN', 'A customer with this email already exists in the tenant.');
      }

      throw error;
    }
  }

  public async findCustomerById(customerId: string): Promise<Customer | null> {
    return withTransaction(this.pool, null, async (client) => {
      const result = await client.query<CustomerRow>('SELECT * FROM customers WHERE id = $1', [customerId]);
      const row = getSingleRow(result.rows);
      return row === null ? null : mapCustomer(row);
    });
  }

  public async listCustomers(tenantId: string): Promise<Customer[]> {
    return withTransaction(this.pool, tenantId, async (client) => {
      const result = await client.query<CustomerRow>(
        'SELECT * FROM customers WHERE tenant_id = $1 ORDER BY email ASC',
        [tenantId]
      );

      return result.rows.map(mapCustomer);
    });
  }

  public async createInvoice(input: CreateInvoiceInput): Promise<Invoice> {
    return withTransaction(this.pool, input.tenantId, async (client) => {
      const result = await client.query<InvoiceRow>(
        `
        INSERT INTO invoices (
          tenant_id, customer_id, subscription_id, currency, line_items, total_minor,
          due_at, status, version, created_at, updated_at
        )
        VALUES ($1, $2, $3, $4, $5::jsonb, $6, $7, 'draft', 1, NOW(), NOW())
        RETURNING *
        `,
        [
          input.tenantId,
          input.customerId,
          input.subscriptionId,
          input.currency,
          JSON.stringify(input.lineItems),
          invoiceTotal(input.lineItems),
          input.dueAt
        ]
      );

      const row = getSingleRow(result.rows);
      if (row === null) {
        throw new Error('Failed to create invoice.');
      }

      return mapInvoice(row);
    });
  }

  public async findInvoiceById(invoiceId: string): Promise<Invoice | null> {
    return withTransaction(this.pool, null, async (client) => {
      const result = await client.query<InvoiceRow>('SELECT * FROM invoices WHERE id = $1', [invoiceId]);
      const row = getSingleRow(result.rows);
      return row === null ? null : mapInvoice(row);
    });
  }

  public async listInvoices(tenantId: string, statuses?: readonly InvoiceStatus[]): Promise<Invoice[]> {
    return withTransaction(this.pool, tenantId, async (client) => {
      const result = await client.query<InvoiceRow>(
        `
        SELECT *
        FROM invoices
        WHERE tenant_id = $1
          AND ($2::text[] IS NULL OR status = ANY($2::text[]))
        ORDER BY created_at ASC, id ASC
        `,
        [tenantId, statuses === undefined ? null : [...statuses]]
      );

      return result.rows.map(mapInvoice);
    });
  }

  public async listSentInvoicesDueBefore(now: Date): Promise<Invoice[]> {
    return withTransaction(this.pool, null, async (client) => {
      const result = await client.query<InvoiceRow>(
        `SELECT * FROM invoices WHERE status = 'sent' AND due_at < $1 ORDER BY due_at ASC, id ASC`,
        [now]
      );

      return result.rows.map(mapInvoice);
    });
  }

  public async updateInvoice(input: UpdateInvoiceInput): Promise<Invoice | null> {
    return withTransaction(this.pool, null, async (client) => {
      const current = await client.query<InvoiceRow>('SELECT * FROM invoices WHERE id = $1 FOR UPDATE', [input.invoiceId]);
      const existing = getSingleRow(current.rows);
      if (existing === null) {
        return null;
      }

      if (existing.version !== input.expectedVersion) {
        throw new ConcurrentModificationError('invoice', input.invoiceId);
      }

      const merged: Invoice = { ...mapInvoice(existing), ...input.changes };
      const result = await client.query<InvoiceRow>(
        `
        UPDATE invoices
        SET status = $2,
            sent_at = $3,
            paid_at = $4,
            overdue_at = $5,
            processor_reference = $6,
            version = version + 1,
            updated_at = NOW()
        WHERE id = $1 AND version = $7
        RETURNING *
        `,
        [
          input.invoiceId,
          merged.status,
          merged.sentAt,
          merged.paidAt,
          merged.overdueAt,
          merged.processorReference,
          input.expectedVersion
        ]
      );

      const row = getSingleRow(result.rows);
      if (row === null) {
        throw new ConcurrentModificationError('invoice', input.invoiceId);
      }

      return mapInvoice(row);
    });
  }
}
