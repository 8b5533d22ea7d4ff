/**
 * Invoice Store
 *
 * Postgres access for the `invoices` table through Drizzle. The sync engine
 * only sees the `InvoiceSyncStore` part of this interface; the dashboard
 * routes use the rest.
 */

import { and, desc, eq, sql } from 'drizzle-orm';
import { invoices, type InvoiceRow } from '../db/schema';
import { INVOICE_APPROVAL } from '../matching';
import type { InvoiceSyncFields, InvoiceSyncStore, PendingInvoice } from '../matching';
import type { Database } from '../utils/db';

// ============================================
// Store Interface
// ============================================

export interface InvoiceApprovalFields {
  status: string;
  approvedBy: string;
  notes: string | null;
}

/** Columns the dashboard may edit; absent fields are left untouched, null clears */
export interface InvoiceEditFields {
  invoiceNumber?: string | null;
  vendorName?: string | null;
  resourceName?: string | null;
  payPeriodStart?: string | null;
  payPeriodEnd?: string | null;
  paymentTerms?: string | null;
  invoiceHours?: number | null;
  approvedHours?: number | null;
  hourlyRate?: number | null;
  invoiceAmount?: number | null;
  invoiceDate?: string | null;
  dueDate?: string | null;
  projectName?: string | null;
  businessUnit?: string | null;
  template?: string | null;
  notes?: string | null;
  addlComments?: string | null;
}

export interface InvoiceStore extends InvoiceSyncStore {
  listInvoices(vendorId?: string): Promise<InvoiceRow[]>;
  getInvoice(invoiceId: string): Promise<InvoiceRow | null>;
  /** @returns The updated row, or null when the invoice does not exist */
  updateApproval(invoiceId: string, fields: InvoiceApprovalFields): Promise<InvoiceRow | null>;
  /** @returns The updated row, or null when the invoice does not exist */
  updateFields(invoiceId: string, fields: InvoiceEditFields): Promise<InvoiceRow | null>;
  /** @returns false when the invoice did not exist */
  deleteInvoice(invoiceId: string): Promise<boolean>;
}

// ============================================
// Helpers
// ============================================

/** `numeric` columns arrive as strings */
export const toNumber = (value: string | null): number | null => {
  if (value === null) {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
};

/** Numbers go to `numeric` columns as strings; undefined stays undefined */
export const toNumeric = (value: number | null | undefined): string | null | undefined =>
  value === undefined || value === null ? value : value.toFixed(2);

const hasEdits = (fields: InvoiceEditFields): boolean =>
  Object.values(fields).some((value) => value !== undefined);

const isPendingSql = sql`lower(${invoices.approvalStatus}) = ${INVOICE_APPROVAL.PENDING}`;

// ============================================
// Drizzle Implementation
// ============================================

export class DrizzleInvoiceStore implements InvoiceStore {
  constructor(private readonly db: Database) {}

  async fetchPendingInvoices(): Promise<PendingInvoice[]> {
    const rows = await this.db
      .select({
        invoiceId: invoices.invoiceId,
        resourceName: invoices.resourceName,
        payPeriodStart: invoices.payPeriodStart,
        payPeriodEnd: invoices.payPeriodEnd,
        vendorHours: invoices.vendorHours,
        approvalStatus: invoices.approvalStatus,
        division: invoices.division,
        clientName: invoices.clientName,
        projectNameExcel: invoices.projectNameExcel,
      })
      .from(invoices)
      .where(isPendingSql)
      .orderBy(invoices.invoiceId);

    return rows.map((row) => ({ ...row, vendorHours: toNumber(row.vendorHours) }));
  }

  async getApprovalStatus(invoiceId: string): Promise<string | null> {
    const [row] = await this.db
      .select({ approvalStatus: invoices.approvalStatus })
      .from(invoices)
      .where(eq(invoices.invoiceId, invoiceId))
      .limit(1);

    return row?.approvalStatus ?? null;
  }

  async applySyncUpdate(invoiceId: string, fields: InvoiceSyncFields): Promise<boolean> {
    const updated = await this.db
      .update(invoices)
      .set({
        ...(fields.approvedHours !== undefined && { approvedHours: fields.approvedHours.toFixed(2) }),
        ...(fields.approvalStatus !== undefined && { approvalStatus: fields.approvalStatus }),
        ...(fields.division !== undefined && { division: fields.division }),
        ...(fields.clientName !== undefined && { clientName: fields.clientName }),
        ...(fields.projectNameExcel !== undefined && { projectNameExcel: fields.projectNameExcel }),
        lastSyncedAt: sql`now()`,
        lastUpdatedAt: sql`now()`,
      })
      // Guard against a concurrent approval since the pool was read
      .where(and(eq(invoices.invoiceId, invoiceId), isPendingSql))
      .returning({ invoiceId: invoices.invoiceId });

    return updated.length > 0;
  }

  async listInvoices(vendorId?: string): Promise<InvoiceRow[]> {
    return this.db
      .select()
      .from(invoices)
      .where(vendorId ? eq(invoices.vendorId, vendorId) : undefined)
      .orderBy(desc(invoices.createdAt));
  }

  async getInvoice(invoiceId: string): Promise<InvoiceRow | null> {
    const [row] = await this.db
      .select()
      .from(invoices)
      .where(eq(invoices.invoiceId, invoiceId))
      .limit(1);

    return row ?? null;
  }

  async updateApproval(invoiceId: string, fields: InvoiceApprovalFields): Promise<InvoiceRow | null> {
    const [row] = await this.db
      .update(invoices)
      .set({
        status: fields.status,
        approvalStatus: fields.status,
        approvedBy: fields.approvedBy,
        notes: fields.notes,
        lastUpdatedAt: sql`now()`,
      })
      .where(eq(invoices.invoiceId, invoiceId))
      .returning();

    return row ?? null;
  }

  async updateFields(invoiceId: string, fields: InvoiceEditFields): Promise<InvoiceRow | null> {
    if (!hasEdits(fields)) {
      return this.getInvoice(invoiceId);
    }

    // Drizzle leaves undefined keys out of the SET list
    const [row] = await this.db
      .update(invoices)
      .set({
        ...fields,
        invoiceHours: toNumeric(fields.invoiceHours),
        approvedHours: toNumeric(fields.approvedHours),
        hourlyRate: toNumeric(fields.hourlyRate),
        invoiceAmount: toNumeric(fields.invoiceAmount),
        lastUpdatedAt: sql`now()`,
      })
      .where(eq(invoices.invoiceId, invoiceId))
      .returning();

    return row ?? null;
  }

  async deleteInvoice(invoiceId: string): Promise<boolean> {
    const deleted = await this.db
      .delete(invoices)
      .where(eq(invoices.invoiceId, invoiceId))
      .returning({ invoiceId: invoices.invoiceId });

    return deleted.length > 0;
  }
}
