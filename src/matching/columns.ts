/**
 * Header-alias lookups over timesheet rows.
 */

import { DIMENSION_COLUMNS, HOURS_COLUMNS } from './constants';
import type { CellValue, InvoiceSyncFields, TimesheetRow } from './types';

/**
 * Renders a cell as trimmed text. Dates become `YYYY-MM-DD`.
 */
export function cellToText(value: CellValue | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '' : value.toISOString().slice(0, 10);
  }
  return String(value).trim();
}

/**
 * Finds a cell by header alias. Exact keys are tried first, then a
 * case-insensitive scan, so rows built outside the parser still resolve.
 */
function lookupCell(row: TimesheetRow, alias: string): CellValue | undefined {
  if (alias in row) {
    return row[alias];
  }
  const header = Object.keys(row).find((key) => key.trim().toLowerCase() === alias);
  return header === undefined ? undefined : row[header];
}

/**
 * Returns the first non-empty value among the aliases, as text.
 *
 * @example
 * getColumnText({ surname: ' Doe ' }, ['last name', 'surname']) // Returns: "Doe"
 */
export function getColumnText(row: TimesheetRow, aliases: readonly string[]): string {
  for (const alias of aliases) {
    const text = cellToText(lookupCell(row, alias));
    if (text) {
      return text;
    }
  }
  return '';
}

/**
 * Hours recorded on a row. Missing or non-numeric values count as zero.
 */
export function parseRowHours(row: TimesheetRow): number {
  for (const alias of HOURS_COLUMNS) {
    const value = lookupCell(row, alias);
    if (value === null || value === undefined || cellToText(value) === '') {
      continue;
    }
    if (typeof value === 'number') {
      return Number.isFinite(value) ? value : 0;
    }
    if (typeof value === 'string') {
      const parsed = Number(value.trim());
      return Number.isFinite(parsed) ? parsed : 0;
    }
    return 0;
  }
  return 0;
}

/**
 * Division, client and project for the group. Each field takes the first
 * non-empty value across the rows; fields no row carries are omitted.
 */
export function collectDimensions(rows: readonly TimesheetRow[]): InvoiceSyncFields {
  const fields: InvoiceSyncFields = {};

  for (const [header, field] of Object.entries(DIMENSION_COLUMNS)) {
    for (const row of rows) {
      const text = getColumnText(row, [header]);
      if (text) {
        fields[field] = text;
        break;
      }
    }
  }

  return fields;
}
