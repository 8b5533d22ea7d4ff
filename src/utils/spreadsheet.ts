/**
 * Spreadsheet Utilities for Timesheet Reconciliation
 *
 * Reads an uploaded `.xlsx` workbook into plain row records keyed by
 * lower-cased header. Only the first worksheet is read; row 1 is the header.
 *
 * Key features:
 * - Native cell types kept (dates stay Date, numbers stay number)
 * - Formula cells yield their cached result
 * - Rich text and hyperlinks flattened to plain text
 */

import { Readable } from 'stream';
import ExcelJS from 'exceljs';
import { SpreadsheetParseError } from './AppError';
import type { CellValue, TimesheetRow } from '../matching/types';

// ============================================
// Cell Decoding
// ============================================

/**
 * Converts an exceljs cell value into a plain cell value.
 */
export function decodeCell(value: ExcelJS.CellValue): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  if ('error' in value) {
    return null;
  }
  if ('richText' in value) {
    return value.richText.map((run) => run.text).join('');
  }
  if ('hyperlink' in value) {
    return value.text;
  }
  if ('result' in value) {
    const { result } = value;
    // Formula errors arrive as { error } objects
    if (result === undefined || (typeof result === 'object' && !(result instanceof Date))) {
      return null;
    }
    return result;
  }
  return null;
}

const isBlank = (value: CellValue): boolean =>
  value === null || (typeof value === 'string' && value.trim() === '');

// ============================================
// Workbook Parsing
// ============================================

/**
 * Reads the header row: column number → trimmed, lower-cased header.
 * Empty and repeated headers are ignored.
 */
function readHeaders(worksheet: ExcelJS.Worksheet): Map<number, string> {
  const headers = new Map<number, string>();
  const seen = new Set<string>();

  worksheet.getRow(1).eachCell({ includeEmpty: false }, (cell, columnNumber) => {
    const decoded = decodeCell(cell.value);
    const header = decoded === null ? '' : String(decoded).trim().toLowerCase();
    if (header && !seen.has(header)) {
      seen.add(header);
      headers.set(columnNumber, header);
    }
  });

  return headers;
}

/**
 * Parses timesheet workbook bytes into rows.
 *
 * @throws SpreadsheetParseError when the bytes are not a readable workbook
 *
 * @example
 * const rows = await parseTimesheetWorkbook(req.file.buffer);
 * rows[0]['first name'] // "Jane"
 */
export async function parseTimesheetWorkbook(bytes: Buffer): Promise<TimesheetRow[]> {
  const workbook = new ExcelJS.Workbook();

  try {
    await workbook.xlsx.read(Readable.from([bytes]));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SpreadsheetParseError(`Could not parse Excel file: ${message}`);
  }

  const worksheet = workbook.worksheets[0];
  if (!worksheet) {
    throw new SpreadsheetParseError('Could not parse Excel file: workbook contains no worksheets');
  }

  const headers = readHeaders(worksheet);
  const rows: TimesheetRow[] = [];

  worksheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    if (rowNumber === 1) {
      return;
    }

    const record: Record<string, CellValue> = {};
    for (const [columnNumber, header] of headers) {
      record[header] = decodeCell(row.getCell(columnNumber).value);
    }

    if (!Object.values(record).every(isBlank)) {
      rows.push(record);
    }
  });

  return rows;
}
