/**
 * Pay period extraction
 *
 * Timesheet exports are inconsistent about which column carries the date
 * and how it is written. Cells decoded by the spreadsheet reader arrive as
 * `Date` objects; hand-edited sheets often hold text instead.
 */

import { isValid, parse } from 'date-fns';
import {
  DATE_COLUMNS,
  DATE_FORMATS,
  NAMED_MONTH_DATE_LENGTH,
  NUMERIC_DATE_LENGTH,
} from './constants';
import type { CellValue, PayPeriod, TimesheetRow } from './types';

// Two-digit years resolve relative to this date (yy=25 → 2025, yy=99 → 1999)
const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Parses a date string against the accepted formats, in order.
 *
 * @returns The calendar month of the first format that parses, or null
 *
 * @example
 * parseDateString("2025-03-15T00:00:00") // Returns: { year: 2025, month: 3 }
 * parseDateString("15-Mar-2025")         // Returns: { year: 2025, month: 3 }
 */
export function parseDateString(value: string): PayPeriod | null {
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }

  for (const format of DATE_FORMATS) {
    const length = format.includes('MMM') ? NAMED_MONTH_DATE_LENGTH : NUMERIC_DATE_LENGTH;
    const candidate = trimmed.slice(0, length).trim();
    const parsed = parse(candidate, format, REFERENCE_DATE);

    // A four-digit year token must not accept "25" as the year 25 AD
    if (isValid(parsed) && (!format.includes('yyyy') || parsed.getFullYear() >= 1000)) {
      return { year: parsed.getFullYear(), month: parsed.getMonth() + 1 };
    }
  }

  return null;
}

/**
 * Reads the calendar month out of a single cell value.
 * Numbers and booleans are never treated as dates.
 */
export function parseDateValue(value: CellValue | undefined): PayPeriod | null {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      return null;
    }
    // Spreadsheet dates decode as UTC midnight
    return { year: value.getUTCFullYear(), month: value.getUTCMonth() + 1 };
  }

  if (typeof value === 'string') {
    return parseDateString(value);
  }

  return null;
}

/**
 * Derives a row's pay period from the first date-like column that parses.
 *
 * @returns The period, or null when no candidate column holds a date
 */
export function extractPayPeriod(row: TimesheetRow): PayPeriod | null {
  for (const column of DATE_COLUMNS) {
    const value = row[column];
    if (value === null || value === undefined || value === '') {
      continue;
    }

    const period = parseDateValue(value);
    if (period) {
      return period;
    }
  }

  return null;
}

/**
 * True when the ISO date string falls in the given calendar month.
 */
export function isInPeriod(isoDate: string | null, period: PayPeriod): boolean {
  if (!isoDate) {
    return false;
  }
  const parsed = parseDateString(isoDate);
  return parsed !== null && parsed.year === period.year && parsed.month === period.month;
}
