/**
 * Database schema (Drizzle ORM)
 *
 * The `invoices` table is shared with the document-intake pipeline: it
 * inserts rows after analysing vendor PDFs, this service reads them for the
 * dashboard and writes the timesheet-derived fields during a sync.
 *
 * Numeric columns come back from `pg` as strings and `date` columns as
 * `YYYY-MM-DD` strings; the store converts them at the boundary.
 */

import { pgTable, varchar, text, numeric, date, timestamp, index } from 'drizzle-orm/pg-core';

export const invoices = pgTable(
  'invoices',
  {
    invoiceId: varchar('invoice_id', { length: 64 }).primaryKey(),
    vendorId: varchar('vendor_id', { length: 64 }),
    vendorName: varchar('vendor_name', { length: 255 }),
    docName: varchar('doc_name', { length: 255 }),
    pdfUrl: text('pdf_url'),
    invoiceNumber: varchar('invoice_number', { length: 100 }),
    invoiceAmount: numeric('invoice_amount', { precision: 12, scale: 2 }),
    invoiceHours: numeric('invoice_hours', { precision: 10, scale: 2 }),
    hourlyRate: numeric('hourly_rate', { precision: 10, scale: 2 }),
    invoiceDate: date('invoice_date'),
    dueDate: date('due_date'),
    status: varchar('status', { length: 50 }),
    approvalStatus: varchar('approval_status', { length: 50 }),
    resourceName: varchar('resource_name', { length: 255 }),
    projectName: varchar('project_name', { length: 255 }),
    paymentTerms: varchar('payment_terms', { length: 100 }),
    businessUnit: varchar('business_unit', { length: 255 }),
    payPeriodStart: date('start_date'),
    payPeriodEnd: date('end_date'),
    approvedHours: numeric('approved_hours', { precision: 10, scale: 2 }),
    vendorHours: numeric('vendor_hours', { precision: 10, scale: 2 }),
    approvedBy: varchar('approved_by', { length: 255 }),
    notes: text('notes'),
    template: varchar('template', { length: 100 }),
    addlComments: text('addl_comments'),
    division: varchar('division', { length: 255 }),
    clientName: varchar('client_name', { length: 255 }),
    projectNameExcel: varchar('project_name_excel', { length: 255 }),
    billPayInitiatedOn: timestamp('bill_pay_initiated_on', { withTimezone: true }),
    invoiceReceivedDate: timestamp('invoice_received_date', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow(),
    lastUpdatedAt: timestamp('last_updated_at', { withTimezone: true }).defaultNow(),
    lastSyncedAt: timestamp('last_synced_at', { withTimezone: true }),
  },
  (table) => ({
    vendorIdx: index('idx_invoices_vendor_id').on(table.vendorId),
    approvalStatusIdx: index('idx_invoices_approval_status').on(table.approvalStatus),
  })
);

export type InvoiceRow = typeof invoices.$inferSelect;
