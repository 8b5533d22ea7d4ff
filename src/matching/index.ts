/**
 * Timesheet Reconciliation Engine
 *
 * Groups uploaded timesheet rows by person and month, matches each group to
 * a pending invoice by name tokens and decides how the invoice's approval
 * state changes.
 *
 * Usage:
 * ```typescript
 * import { groupRows, matchInvoice, resolveGroup, RunClaims } from './matching';
 *
 * const claims = new RunClaims();
 * for (const group of groupRows(rows)) {
 *   const match = matchInvoice(group.key.firstName, group.key.lastName, pool);
 *   const outcome = await resolveGroup(group, match, store, claims);
 * }
 * ```
 */

export { groupRows, hasNamedRows, displayName } from './groupRows';
export { matchInvoice, findPartialMatches } from './matchInvoice';
export { resolveGroup, RunClaims } from './resolveGroup';

export { normalizeName, tokenizeName, containsToken } from './normalizeName';
export { extractPayPeriod, parseDateValue, parseDateString, isInPeriod } from './extractPeriod';
export { getColumnText, parseRowHours, collectDimensions, cellToText } from './columns';
export {
  parseTimesheetApproval,
  summarizeApproval,
  hoursMatch,
  approvedInvoiceStatus,
  type ApprovalSummary,
} from './approval';

export {
  FIRST_NAME_COLUMNS,
  LAST_NAME_COLUMNS,
  APPROVAL_COLUMNS,
  HOURS_COLUMNS,
  DATE_COLUMNS,
  DIMENSION_COLUMNS,
  DATE_FORMATS,
  HOURS_TOLERANCE,
  INVOICE_APPROVAL,
} from './constants';

export type {
  CellValue,
  TimesheetRow,
  PayPeriod,
  GroupKey,
  PersonPeriodGroup,
  PendingInvoice,
  MatchResult,
  TimesheetApproval,
  GroupStatus,
  GroupOutcome,
  InvoiceSyncFields,
  InvoiceSyncStore,
} from './types';
