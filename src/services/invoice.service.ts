/**
 * Invoice Dashboard Service
 *
 * Read, edit and approval operations behind the invoice dashboard. Rows are
 * reshaped into the field names the dashboard expects, and approvals leave
 * a JSON status-change log in the document store.
 */

import type { InvoiceRow } from '../db/schema';
import { AppError, logger } from '../utils';
import type { DocumentJobQueue } from '../workers/types';
import { toNumber, type InvoiceEditFields, type InvoiceStore } from './invoiceStore.service';

// ============================================
// Types
// ============================================

export interface DashboardRow {
  invoice_uuid: string;
  invoice_id: string;
  vendor_id: string | null;
  vendor_name: string | null;
  doc_name: string | null;
  pdf_url: string | null;
  invoice_number: string | null;
  invoice_amount: number | null;
  invoice_date: string | null;
  due_date: string | null;
  resource_name: string | null;
  project_name: string | null;
  business_unit: string | null;
  net_terms: string | null;
  pay_rate: number | null;
  pay_period_start: string | null;
  pay_period_end: string | null;
  vendor_hours: number | null;
  approved_hours: number | null;
  approval_status: string;
  status: string;
  approved_by: string | null;
  notes: string | null;
  division: string | null;
  client_name: string | null;
  project_name_excel: string | null;
  bill_pay_initiated_on: string | null;
  created_at: string | null;
  last_updated_at: string | null;
}

export interface DashboardMetrics {
  total: number;
  pending: number;
  complete: number;
  need_approval: number;
  payment_initiated: number;
  total_amount: number;
}

export interface ApproveInvoiceInput {
  status?: string;
  notes?: string;
  approvedBy?: string;
}

/** Dashboard edit form, in the dashboard's field names; null clears a field */
export interface InvoiceEditInput {
  invoice_number?: string | null;
  consultancy_name?: string | null;
  resource_name?: string | null;
  pay_period_start?: string | null;
  pay_period_end?: string | null;
  net_terms?: string | null;
  vendor_hours?: number | null;
  approved_hours?: number | null;
  pay_rate?: number | null;
  invoice_amount?: number | null;
  invoice_date?: string | null;
  due_date?: string | null;
  project_name?: string | null;
  business_unit?: string | null;
  template?: string | null;
  current_comments?: string | null;
  addl_comments?: string | null;
}

// ============================================
// Dashboard Shaping
// ============================================

const DISPLAY_STATUS: Readonly<Record<string, string>> = {
  pending: 'Pending',
  'To Start': 'Pending',
  'In Progress': 'Pending',
  'Need Approval': 'NEED APPROVAL',
};

/**
 * Status shown on the dashboard: approval_status first, then status,
 * with in-flight states folded into "Pending".
 */
export function displayStatus(row: Pick<InvoiceRow, 'approvalStatus' | 'status'>): string {
  const status = row.approvalStatus || row.status || 'Pending';
  return DISPLAY_STATUS[status] ?? status;
}

const isoOrNull = (value: Date | null): string | null => (value ? value.toISOString() : null);

export function toDashboardRow(row: InvoiceRow): DashboardRow {
  const status = displayStatus(row);

  return {
    invoice_uuid: row.invoiceId,
    invoice_id: row.invoiceId,
    vendor_id: row.vendorId,
    vendor_name: row.vendorName,
    doc_name: row.docName,
    pdf_url: row.pdfUrl,
    invoice_number: row.invoiceNumber,
    invoice_amount: toNumber(row.invoiceAmount),
    invoice_date: row.invoiceDate,
    due_date: row.dueDate,
    resource_name: row.resourceName,
    project_name: row.projectName,
    business_unit: row.businessUnit,
    net_terms: row.paymentTerms,
    pay_rate: toNumber(row.hourlyRate),
    pay_period_start: row.payPeriodStart,
    pay_period_end: row.payPeriodEnd,
    // Billed hours fall back to the hours read off the invoice document
    vendor_hours: toNumber(row.vendorHours) ?? toNumber(row.invoiceHours),
    approved_hours: toNumber(row.approvedHours),
    approval_status: status,
    status: row.status ?? status,
    approved_by: row.approvedBy,
    notes: row.notes,
    division: row.division,
    client_name: row.clientName,
    project_name_excel: row.projectNameExcel,
    bill_pay_initiated_on: isoOrNull(row.billPayInitiatedOn),
    created_at: isoOrNull(row.createdAt),
    last_updated_at: isoOrNull(row.lastUpdatedAt),
  };
}

/**
 * Maps dashboard field names onto invoice columns. Hours typed on the
 * dashboard are the hours read off the invoice document.
 */
export function toEditFields(input: InvoiceEditInput): InvoiceEditFields {
  return {
    invoiceNumber: input.invoice_number,
    vendorName: input.consultancy_name,
    resourceName: input.resource_name,
    payPeriodStart: input.pay_period_start,
    payPeriodEnd: input.pay_period_end,
    paymentTerms: input.net_terms,
    invoiceHours: input.vendor_hours,
    approvedHours: input.approved_hours,
    hourlyRate: input.pay_rate,
    invoiceAmount: input.invoice_amount,
    invoiceDate: input.invoice_date,
    dueDate: input.due_date,
    projectName: input.project_name,
    businessUnit: input.business_unit,
    template: input.template,
    notes: input.current_comments,
    addlComments: input.addl_comments,
  };
}

export function computeDashboardMetrics(rows: readonly DashboardRow[]): DashboardMetrics {
  const countStatus = (status: string) => rows.filter((row) => row.approval_status === status).length;
  const totalAmount = rows.reduce((sum, row) => sum + (row.invoice_amount ?? 0), 0);

  return {
    total: rows.length,
    pending: countStatus('Pending'),
    complete: countStatus('Complete'),
    need_approval: countStatus('NEED APPROVAL'),
    payment_initiated: rows.filter((row) => row.bill_pay_initiated_on !== null).length,
    total_amount: Math.round(totalAmount * 100) / 100,
  };
}

// ============================================
// Service
// ============================================

export class InvoiceService {
  constructor(
    private readonly store: InvoiceStore,
    private readonly jobs: DocumentJobQueue
  ) {}

  async getDashboard(vendorId?: string): Promise<{ rows: DashboardRow[]; metrics: DashboardMetrics }> {
    const rows = (await this.store.listInvoices(vendorId)).map(toDashboardRow);
    return { rows, metrics: computeDashboardMetrics(rows) };
  }

  async getInvoice(invoiceId: string): Promise<DashboardRow> {
    const row = await this.store.getInvoice(invoiceId);
    if (!row) {
      throw AppError.notFound('Invoice not found');
    }
    return toDashboardRow(row);
  }

  /**
   * Sets the invoice's status (default "Approved") and records who did it.
   * The status-change log is uploaded by a queued job; a queueing failure
   * is logged and does not undo the approval.
   */
  async approveInvoice(invoiceId: string, input: ApproveInvoiceInput): Promise<DashboardRow> {
    const existing = await this.store.getInvoice(invoiceId);
    if (!existing) {
      throw AppError.notFound('Invoice not found');
    }

    const oldStatus = existing.status || existing.approvalStatus || 'Pending';
    const newStatus = input.status || 'Approved';
    const approvedBy = input.approvedBy || 'system';

    const updated = await this.store.updateApproval(invoiceId, {
      status: newStatus,
      approvedBy,
      notes: input.notes ?? existing.notes,
    });
    if (!updated) {
      throw AppError.notFound('Invoice not found');
    }

    logger.info(`Invoice ${invoiceId} status changed: ${oldStatus} → ${newStatus} by ${approvedBy}`);

    const changedAt = new Date().toISOString();
    const log = {
      invoice_id: invoiceId,
      timestamp: changedAt,
      event_type: 'status_change',
      old_status: oldStatus,
      new_status: newStatus,
      changed_by: approvedBy,
      database_record: toDashboardRow(updated),
    };
    try {
      await this.jobs.enqueue({
        kind: 'status-change-log',
        invoiceId,
        changedAt,
        body: JSON.stringify(log, null, 2),
      });
    } catch (error) {
      logger.error(
        `Status change log for invoice ${invoiceId} not queued: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    return toDashboardRow(updated);
  }

  /**
   * Saves dashboard edits. Fields left out of `input` keep their values.
   */
  async updateInvoice(invoiceId: string, input: InvoiceEditInput): Promise<DashboardRow> {
    const fields = toEditFields(input);
    const updated = await this.store.updateFields(invoiceId, fields);
    if (!updated) {
      throw AppError.notFound('Invoice not found');
    }

    const edited = Object.entries(fields)
      .filter(([, value]) => value !== undefined)
      .map(([column]) => column);
    logger.info(`Invoice ${invoiceId} edited from the dashboard: ${edited.join(', ') || 'no changes'}`);

    return toDashboardRow(updated);
  }

  async deleteInvoice(invoiceId: string): Promise<void> {
    const deleted = await this.store.deleteInvoice(invoiceId);
    if (!deleted) {
      throw AppError.notFound('Invoice not found');
    }
    logger.info(`Deleted invoice ${invoiceId}`);
  }
}
