/**
 * Discrepancy Report Service
 *
 * Builds the audit workbook for a sync run: which timesheet people could not
 * be tied to exactly one invoice (with suggestions), the pending pool as it
 * was read, and what was matched.
 */

import ExcelJS from 'exceljs';
import { findPartialMatches } from '../matching';
import type { GroupOutcome, GroupStatus, PendingInvoice } from '../matching';

// ============================================
// Types
// ============================================

export interface DiscrepancyReportInput {
  sourceFileName: string;
  outcomes: readonly GroupOutcome[];
  pendingInvoices: readonly PendingInvoice[];
}

export interface DiscrepancyRow {
  timesheetName: string;
  firstName: string;
  lastName: string;
  year: number;
  month: number;
  rowCount: number;
  status: GroupStatus;
  possibleMatches: string;
  suggestedAction: string;
}

// ============================================
// Constants
// ============================================

export const SHEET_NAMES = {
  DISCREPANCIES: 'Unmatched & Ambiguous',
  PENDING: 'Pending Invoices',
  MATCHED: 'Matched',
} as const;

const SUGGESTED_ACTIONS: Partial<Record<GroupStatus, string>> = {
  UNMATCHED:
    'No pending invoice carries this name. Confirm the invoice was received and is pending, or correct the name on the timesheet.',
  AMBIGUOUS:
    'Several pending invoices carry this name. Pick the right invoice and update it manually.',
};

const REPORTED_STATUSES: ReadonlySet<GroupStatus> = new Set(['UNMATCHED', 'AMBIGUOUS']);

// ============================================
// Row Builders
// ============================================

export const needsReport = (outcomes: readonly GroupOutcome[]): boolean =>
  outcomes.some((outcome) => REPORTED_STATUSES.has(outcome.status));

const formatCandidate = (invoice: PendingInvoice): string =>
  `${invoice.resourceName ?? ''} (${invoice.invoiceId})`;

/**
 * Rows of the discrepancy sheet. Suggestions are recomputed with the
 * partial-match rule over the full pool.
 */
export function buildDiscrepancyRows(
  outcomes: readonly GroupOutcome[],
  pendingInvoices: readonly PendingInvoice[]
): DiscrepancyRow[] {
  return outcomes
    .filter((outcome) => REPORTED_STATUSES.has(outcome.status))
    .map((outcome) => ({
      timesheetName: outcome.timesheetName,
      firstName: outcome.key.firstName,
      lastName: outcome.key.lastName,
      year: outcome.key.year,
      month: outcome.key.month,
      rowCount: outcome.rowCount,
      status: outcome.status,
      possibleMatches: findPartialMatches(outcome.key.firstName, outcome.key.lastName, pendingInvoices)
        .map(formatCandidate)
        .join('; '),
      suggestedAction: SUGGESTED_ACTIONS[outcome.status] ?? '',
    }));
}

// ============================================
// Workbook
// ============================================

function addSheet(
  workbook: ExcelJS.Workbook,
  name: string,
  columns: Array<{ header: string; key: string; width: number }>,
  rows: Array<Record<string, string | number | null>>
): void {
  const sheet = workbook.addWorksheet(name);
  sheet.columns = columns;
  sheet.addRows(rows);
  sheet.getRow(1).font = { bold: true };
  sheet.views = [{ state: 'frozen', ySplit: 1 }];
}

/**
 * Renders the three-sheet `.xlsx` report.
 */
export async function buildDiscrepancyReport(input: DiscrepancyReportInput): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date();
  workbook.title = `Discrepancies for ${input.sourceFileName}`;

  addSheet(
    workbook,
    SHEET_NAMES.DISCREPANCIES,
    [
      { header: 'Timesheet Name', key: 'timesheetName', width: 28 },
      { header: 'First Name', key: 'firstName', width: 16 },
      { header: 'Last Name', key: 'lastName', width: 16 },
      { header: 'Year', key: 'year', width: 8 },
      { header: 'Month', key: 'month', width: 8 },
      { header: 'Rows', key: 'rowCount', width: 8 },
      { header: 'Status', key: 'status', width: 14 },
      { header: 'Possible Matches', key: 'possibleMatches', width: 48 },
      { header: 'Suggested Action', key: 'suggestedAction', width: 60 },
    ],
    buildDiscrepancyRows(input.outcomes, input.pendingInvoices).map((row) => ({ ...row }))
  );

  addSheet(
    workbook,
    SHEET_NAMES.PENDING,
    [
      { header: 'Invoice ID', key: 'invoiceId', width: 24 },
      { header: 'Resource Name', key: 'resourceName', width: 28 },
      { header: 'Pay Period Start', key: 'payPeriodStart', width: 16 },
      { header: 'Pay Period End', key: 'payPeriodEnd', width: 16 },
      { header: 'Vendor Hours', key: 'vendorHours', width: 14 },
      { header: 'Approval Status', key: 'approvalStatus', width: 16 },
    ],
    input.pendingInvoices.map((invoice) => ({
      invoiceId: invoice.invoiceId,
      resourceName: invoice.resourceName,
      payPeriodStart: invoice.payPeriodStart,
      payPeriodEnd: invoice.payPeriodEnd,
      vendorHours: invoice.vendorHours,
      approvalStatus: invoice.approvalStatus,
    }))
  );

  addSheet(
    workbook,
    SHEET_NAMES.MATCHED,
    [
      { header: 'Timesheet Name', key: 'timesheetName', width: 28 },
      { header: 'Invoice ID', key: 'invoiceId', width: 24 },
      { header: 'Matched To', key: 'matchedTo', width: 28 },
      { header: 'Year', key: 'year', width: 8 },
      { header: 'Month', key: 'month', width: 8 },
      { header: 'Approved Hours', key: 'approvedHours', width: 14 },
      { header: 'Vendor Hours', key: 'vendorHours', width: 14 },
      { header: 'New Status', key: 'newStatus', width: 16 },
    ],
    input.outcomes
      .filter((outcome) => outcome.status === 'MATCHED')
      .map((outcome) => ({
        timesheetName: outcome.timesheetName,
        invoiceId: outcome.invoiceId,
        matchedTo: outcome.matchedTo ?? null,
        year: outcome.key.year,
        month: outcome.key.month,
        approvedHours: outcome.approvedHours ?? null,
        vendorHours: outcome.vendorHours ?? null,
        newStatus: outcome.newStatus ?? null,
      }))
  );

  return Buffer.from(await workbook.xlsx.writeBuffer());
}
