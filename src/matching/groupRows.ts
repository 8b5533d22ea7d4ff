/**
 * Buckets timesheet rows by person and pay period.
 *
 * One invoice covers one person for one month, so every group is resolved
 * against at most one invoice. Rows without any usable date share the
 * sentinel period 0/0.
 */

import { FIRST_NAME_COLUMNS, LAST_NAME_COLUMNS } from './constants';
import { getColumnText } from './columns';
import { extractPayPeriod } from './extractPeriod';
import { normalizeName } from './normalizeName';
import type { GroupKey, PersonPeriodGroup, TimesheetRow } from './types';

const keyOf = (key: GroupKey): string =>
  `${key.firstName}\u0000${key.lastName}\u0000${key.year}\u0000${key.month}`;

/**
 * Groups rows by normalized (first, last, year, month).
 * Rows with neither a first nor a last name are dropped.
 *
 * @returns Groups in order of first appearance, rows in input order
 */
export function groupRows(rows: readonly TimesheetRow[]): PersonPeriodGroup[] {
  const groups = new Map<string, PersonPeriodGroup>();

  for (const row of rows) {
    const first = getColumnText(row, FIRST_NAME_COLUMNS);
    const last = getColumnText(row, LAST_NAME_COLUMNS);
    if (!first && !last) {
      continue;
    }

    const period = extractPayPeriod(row);
    const key: GroupKey = {
      firstName: normalizeName(first),
      lastName: normalizeName(last),
      year: period?.year ?? 0,
      month: period?.month ?? 0,
    };

    const id = keyOf(key);
    const existing = groups.get(id);
    if (existing) {
      existing.rows.push(row);
    } else {
      groups.set(id, { key, rows: [row] });
    }
  }

  return [...groups.values()];
}

/**
 * True when at least one row carries a first or last name.
 */
export function hasNamedRows(rows: readonly TimesheetRow[]): boolean {
  return rows.some(
    (row) => getColumnText(row, FIRST_NAME_COLUMNS) !== '' || getColumnText(row, LAST_NAME_COLUMNS) !== ''
  );
}

/** `first last` label used in responses and reports */
export function displayName(key: GroupKey): string {
  return `${key.firstName} ${key.lastName}`.trim();
}
