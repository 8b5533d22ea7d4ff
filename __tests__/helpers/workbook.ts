/**
 * Builds timesheet workbooks in memory for tests.
 */

import ExcelJS from 'exceljs';

export type SheetCell = string | number | Date | null;

/** UTC midnight, the way spreadsheet dates decode */
export const utcDate = (year: number, month: number, day: number): Date =>
  new Date(Date.UTC(year, month - 1, day));

/**
 * Writes `rows` under a header row. Headers default to the union of row
 * keys in first-seen order.
 */
export async function buildWorkbook(
  rows: Array<Record<string, SheetCell>>,
  options: { headers?: string[]; sheetName?: string } = {}
): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(options.sheetName ?? 'Timesheet');
  const headers = options.headers ?? [...new Set(rows.flatMap((row) => Object.keys(row)))];

  sheet.addRow(headers);
  for (const row of rows) {
    sheet.addRow(headers.map((header) => row[header] ?? null));
  }

  return Buffer.from(await workbook.xlsx.writeBuffer());
}

/** A standard timesheet line */
export const timesheetLine = (
  first: string,
  last: string,
  date: Date | string,
  hours: number | string,
  approval: string,
  extra: Record<string, SheetCell> = {}
): Record<string, SheetCell> => ({
  'First Name': first,
  'Last Name': last,
  'From Time': date,
  'Hour(s)': hours,
  'Approval Status': approval,
  ...extra,
});
