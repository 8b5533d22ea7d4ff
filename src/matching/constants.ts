/**
 * Constants for the Timesheet Reconciliation Engine
 *
 * Header aliases, date formats and thresholds used when turning an
 * uploaded timesheet into invoice updates. Headers are compared after
 * trimming and lower-casing.
 */

// ============================================
// COLUMN ALIASES
// ============================================

/** Accepted headers for the person's first name, in lookup order */
export const FIRST_NAME_COLUMNS = ['first name', 'firstname', 'first_name', 'given name'] as const;

/** Accepted headers for the person's last name, in lookup order */
export const LAST_NAME_COLUMNS = ['last name', 'lastname', 'last_name', 'surname'] as const;

/** Per-row approval state written by the timesheet system */
export const APPROVAL_COLUMNS = ['approval status', 'approval_status'] as const;

/** Hours worked on the row; the first non-empty alias wins */
export const HOURS_COLUMNS = ['hour(s)', 'hours'] as const;

/**
 * Columns tried, in order, when deriving a row's pay period.
 * The first column whose value parses as a date wins.
 */
export const DATE_COLUMNS = ['from time', 'date', 'to time', 'pay period start', 'period'] as const;

/**
 * Dimension columns copied onto the matched invoice.
 * Keys are the timesheet headers, values the invoice fields they land in.
 */
export const DIMENSION_COLUMNS = {
  division: 'division',
  'client name': 'clientName',
  'project name': 'projectNameExcel',
} as const;

// ============================================
// DATE PARSING
// ============================================

/**
 * date-fns patterns tried in order against string cells.
 * Month-first comes before day-first, so 03/04/2025 is March 4th.
 */
export const DATE_FORMATS = [
  'yyyy-M-d',
  'M/d/yyyy',
  'd/M/yyyy',
  'M-d-yyyy',
  'd-M-yyyy',
  'yyyy/M/d',
  'M/d/yy',
  'd-MMM-yyyy',
] as const;

/** Patterns containing a month name need one extra character (`5-Jan-2025` vs `05-Jan-2025`) */
export const NUMERIC_DATE_LENGTH = 10;
export const NAMED_MONTH_DATE_LENGTH = 11;

// ============================================
// NAME MATCHING
// ============================================

/** Tokens shorter than this are initials and carry no signal */
export const MIN_TOKEN_LENGTH = 2;

export const NAME_PREFIX_PATTERN = /\b(mr\.?|mrs\.?|ms\.?|dr\.?|prof\.?)\b/g;
export const NAME_SUFFIX_PATTERN = /\b(jr\.?|sr\.?|ii|iii|iv|ph\.?d\.?|md|esq\.?|cpa)\b/g;

/** Hyphens, apostrophes (straight and curly), low-9 quotes and backticks */
export const NAME_SEPARATOR_PATTERN = /[-'‘’‚‛`]/g;

// ============================================
// HOURS & STATUSES
// ============================================

/**
 * Approved hours within this distance of the vendor's billed hours are a
 * match. The comparison is strict: a difference of exactly 0.01 is not.
 */
export const HOURS_TOLERANCE = 0.01;

/** Invoice approval_status values written by the sync */
export const INVOICE_APPROVAL = {
  PENDING: 'pending',
  COMPLETE: 'Complete',
  NEED_APPROVAL: 'Need Approval',
} as const;
