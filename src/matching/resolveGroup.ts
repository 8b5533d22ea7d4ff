/**
 * Group Resolution
 *
 * Turns a match into a decision and, where the decision calls for it, a
 * write. Order matters:
 * 1. No single invoice → report only
 * 2. Invoice already written by an earlier group in this run → duplicate
 * 3. Invoice no longer pending in the store → skip
 * 4. Invoice period does not cover the group's month → mismatch
 * 5. Aggregate approvals, decide the new status, write conditionally
 *
 * A partial-name match is never trusted to complete an invoice: at most it
 * marks the invoice "Need Approval" for a person to confirm.
 *
 * Store errors never escape: they become a WRITE_FAILED outcome so the rest
 * of the batch still runs.
 */

import { logger } from '../utils';
import { INVOICE_APPROVAL } from './constants';
import { collectDimensions } from './columns';
import { approvedInvoiceStatus, summarizeApproval } from './approval';
import { isInPeriod } from './extractPeriod';
import { displayName } from './groupRows';
import type {
  GroupOutcome,
  GroupStatus,
  InvoiceSyncFields,
  InvoiceSyncStore,
  MatchResult,
  PendingInvoice,
  PersonPeriodGroup,
} from './types';

/**
 * Invoice ids written during the current run.
 * The first group to write an invoice owns it for the rest of the run.
 */
export class RunClaims {
  private readonly claimed = new Map<string, string>();

  has(invoiceId: string): boolean {
    return this.claimed.has(invoiceId);
  }

  claimedBy(invoiceId: string): string | undefined {
    return this.claimed.get(invoiceId);
  }

  claim(invoiceId: string, owner: string): void {
    if (!this.claimed.has(invoiceId)) {
      this.claimed.set(invoiceId, owner);
    }
  }
}

const isPending = (status: string | null): boolean =>
  status !== null && status.trim().toLowerCase() === INVOICE_APPROVAL.PENDING;

const hasFields = (fields: InvoiceSyncFields): boolean =>
  Object.values(fields).some((value) => value !== undefined);

interface Decision {
  status: Extract<GroupStatus, 'MATCHED' | 'NEED_APPROVAL' | 'PENDING'>;
  fields: InvoiceSyncFields;
  approvedHours?: number;
  newStatus?: string;
}

/**
 * @param confirmed - false for a partial-name match, which may flag the
 *   invoice for approval but never completes it or writes hours
 */
function decide(group: PersonPeriodGroup, invoice: PendingInvoice, confirmed: boolean): Decision {
  const dimensions = collectDimensions(group.rows);
  const approval = summarizeApproval(group.rows);

  switch (approval.state) {
    case 'all_approved': {
      if (!confirmed) {
        return {
          status: 'NEED_APPROVAL',
          fields: { approvalStatus: INVOICE_APPROVAL.NEED_APPROVAL, ...dimensions },
          approvedHours: approval.totalHours,
          newStatus: INVOICE_APPROVAL.NEED_APPROVAL,
        };
      }
      const newStatus = approvedInvoiceStatus(approval.totalHours, invoice.vendorHours);
      return {
        status: 'MATCHED',
        fields: { approvedHours: approval.totalHours, approvalStatus: newStatus, ...dimensions },
        approvedHours: approval.totalHours,
        newStatus,
      };
    }
    case 'mixed':
      return {
        status: 'NEED_APPROVAL',
        fields: { approvalStatus: INVOICE_APPROVAL.NEED_APPROVAL, ...dimensions },
        newStatus: INVOICE_APPROVAL.NEED_APPROVAL,
      };
    case 'none_approved':
      return { status: 'PENDING', fields: dimensions };
  }
}

/**
 * Resolves one group against its match result.
 *
 * @param claims - Invoices already written in this run; updated on success
 */
export async function resolveGroup(
  group: PersonPeriodGroup,
  match: MatchResult,
  store: InvoiceSyncStore,
  claims: RunClaims
): Promise<GroupOutcome> {
  const base = {
    key: group.key,
    timesheetName: displayName(group.key),
    rowCount: group.rows.length,
  };

  if (match.kind === 'unmatched') {
    return { ...base, status: 'UNMATCHED', invoiceId: null };
  }
  if (match.kind === 'ambiguous') {
    return { ...base, status: 'AMBIGUOUS', invoiceId: null };
  }

  const { invoice } = match;
  const matched = {
    ...base,
    invoiceId: invoice.invoiceId,
    matchedTo: invoice.resourceName,
    vendorHours: invoice.vendorHours,
  };

  if (claims.has(invoice.invoiceId)) {
    logger.warn(
      `Invoice ${invoice.invoiceId} already updated by "${claims.claimedBy(invoice.invoiceId)}"; skipping "${base.timesheetName}"`
    );
    return { ...matched, status: 'DUPLICATE_MATCH' };
  }

  try {
    const currentStatus = await store.getApprovalStatus(invoice.invoiceId);
    if (!isPending(currentStatus)) {
      return { ...matched, status: 'SKIPPED_NOT_PENDING', currentStatus };
    }

    const { year, month } = group.key;
    if (
      year !== 0 &&
      !isInPeriod(invoice.payPeriodStart, { year, month }) &&
      !isInPeriod(invoice.payPeriodEnd, { year, month })
    ) {
      return { ...matched, status: 'PERIOD_MISMATCH', invoicePeriodStart: invoice.payPeriodStart };
    }

    const decision = decide(group, invoice, match.kind === 'matched');
    const outcome: GroupOutcome = {
      ...matched,
      status: decision.status,
      approvedHours: decision.approvedHours,
      newStatus: decision.newStatus,
    };

    if (!hasFields(decision.fields)) {
      return outcome;
    }

    const written = await store.applySyncUpdate(invoice.invoiceId, decision.fields);
    if (!written) {
      // Approved elsewhere between the freshness check and the write
      return { ...matched, status: 'SKIPPED_NOT_PENDING', currentStatus: null };
    }

    claims.claim(invoice.invoiceId, base.timesheetName);
    return outcome;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Failed to update invoice ${invoice.invoiceId} for "${base.timesheetName}": ${message}`);
    return { ...matched, status: 'WRITE_FAILED', error: message };
  }
}
