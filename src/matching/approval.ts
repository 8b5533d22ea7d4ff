/**
 * Timesheet approval aggregation
 */

import { APPROVAL_COLUMNS, HOURS_TOLERANCE, INVOICE_APPROVAL } from './constants';
import { getColumnText, parseRowHours } from './columns';
import type { TimesheetApproval, TimesheetRow } from './types';

const APPROVAL_VALUES: Readonly<Record<string, TimesheetApproval>> = {
  approved: 'APPROVED',
  rejected: 'REJECTED',
  pending: 'PENDING',
};

/**
 * Parses the free-text approval cell. Only an exact "approved"
 * (any case, surrounding spaces ignored) counts as approved.
 */
export function parseTimesheetApproval(raw: string): TimesheetApproval {
  return APPROVAL_VALUES[raw.trim().toLowerCase()] ?? 'OTHER';
}

export type ApprovalSummary =
  | { state: 'all_approved'; totalHours: number }
  | { state: 'mixed' }
  | { state: 'none_approved' };

/**
 * Classifies a group by how many of its rows are approved.
 * Hours are only summed when every row is approved.
 */
export function summarizeApproval(rows: readonly TimesheetRow[]): ApprovalSummary {
  const approvals = rows.map((row) => parseTimesheetApproval(getColumnText(row, APPROVAL_COLUMNS)));
  const approvedCount = approvals.filter((approval) => approval === 'APPROVED').length;

  if (rows.length > 0 && approvedCount === rows.length) {
    const totalHours = rows.reduce((sum, row) => sum + parseRowHours(row), 0);
    return { state: 'all_approved', totalHours };
  }
  if (approvedCount > 0) {
    return { state: 'mixed' };
  }
  return { state: 'none_approved' };
}

/**
 * True when timesheet hours agree with the vendor's billed hours.
 * Missing vendor hours compare as zero. The difference is rounded to
 * micro-hours first so float noise cannot pull 0.01 under the tolerance.
 *
 * @example
 * hoursMatch(40, 40.009) // Returns: true
 * hoursMatch(40, 40.01)  // Returns: false
 */
export function hoursMatch(timesheetHours: number, vendorHours: number | null): boolean {
  const delta = Number(Math.abs(timesheetHours - (vendorHours ?? 0)).toFixed(6));
  return delta < HOURS_TOLERANCE;
}

/**
 * approval_status for a fully approved group.
 */
export function approvedInvoiceStatus(timesheetHours: number, vendorHours: number | null): string {
  return hoursMatch(timesheetHours, vendorHours)
    ? INVOICE_APPROVAL.COMPLETE
    : INVOICE_APPROVAL.NEED_APPROVAL;
}
