/**
 * Type Definitions for the Timesheet Reconciliation Engine
 *
 * The engine is deterministic given its inputs. The only side effects go
 * through the `InvoiceSyncStore` port, which the caller injects.
 */

// ============================================
// INPUT TYPES
// ============================================

/** Value of a single spreadsheet cell after decoding */
export type CellValue = string | number | boolean | Date | null;

/**
 * One data row of the uploaded timesheet.
 * Keys are the header cells, trimmed and lower-cased.
 */
export type TimesheetRow = Readonly<Record<string, CellValue>>;

/** Calendar month a row is billed against */
export interface PayPeriod {
  year: number;
  month: number;
}

/**
 * Identity of a person-period bucket.
 * Names are normalized; `year = month = 0` means no row carried a usable date.
 */
export interface GroupKey {
  firstName: string;
  lastName: string;
  year: number;
  month: number;
}

export interface PersonPeriodGroup {
  key: GroupKey;
  rows: TimesheetRow[];
}

/**
 * Snapshot of an invoice awaiting timesheet approval,
 * read once at the start of a sync run.
 */
export interface PendingInvoice {
  invoiceId: string;
  resourceName: string | null;
  /** `YYYY-MM-DD` */
  payPeriodStart: string | null;
  /** `YYYY-MM-DD` */
  payPeriodEnd: string | null;
  vendorHours: number | null;
  approvalStatus: string | null;
  division: string | null;
  clientName: string | null;
  projectNameExcel: string | null;
}

// ============================================
// MATCHING
// ============================================

export type MatchResult =
  | { kind: 'matched'; invoice: PendingInvoice }
  | { kind: 'needs_approval'; invoice: PendingInvoice }
  | { kind: 'ambiguous'; candidates: PendingInvoice[] }
  | { kind: 'unmatched' };

/** Timesheet approval state, parsed from free text once per row */
export type TimesheetApproval = 'APPROVED' | 'REJECTED' | 'PENDING' | 'OTHER';

// ============================================
// OUTCOMES
// ============================================

export type GroupStatus =
  | 'MATCHED'
  | 'NEED_APPROVAL'
  | 'PENDING'
  | 'SKIPPED_NOT_PENDING'
  | 'PERIOD_MISMATCH'
  | 'UNMATCHED'
  | 'AMBIGUOUS'
  | 'DUPLICATE_MATCH'
  | 'WRITE_FAILED';

/** Per-group result of a sync run */
export interface GroupOutcome {
  readonly key: GroupKey;
  /** `first last` as it appears in the report */
  readonly timesheetName: string;
  readonly rowCount: number;
  readonly status: GroupStatus;
  readonly invoiceId: string | null;
  /** resource_name of the invoice the group resolved to */
  readonly matchedTo?: string | null;
  readonly approvedHours?: number;
  readonly vendorHours?: number | null;
  /** approval_status written to the invoice, when one was */
  readonly newStatus?: string;
  /** approval_status found on the invoice when the group was skipped */
  readonly currentStatus?: string | null;
  readonly invoicePeriodStart?: string | null;
  readonly error?: string;
}

// ============================================
// PERSISTENCE PORT
// ============================================

/** Fields a sync may set on an invoice; absent fields are left untouched */
export interface InvoiceSyncFields {
  approvedHours?: number;
  approvalStatus?: string;
  division?: string;
  clientName?: string;
  projectNameExcel?: string;
}

/**
 * Persistence operations the engine needs. Each call commits on its own.
 */
export interface InvoiceSyncStore {
  fetchPendingInvoices(): Promise<PendingInvoice[]>;
  /** Current approval_status, or null when the invoice no longer exists */
  getApprovalStatus(invoiceId: string): Promise<string | null>;
  /**
   * Writes `fields` only while the invoice is still pending.
   * @returns false when no row was updated
   */
  applySyncUpdate(invoiceId: string, fields: InvoiceSyncFields): Promise<boolean>;
}
