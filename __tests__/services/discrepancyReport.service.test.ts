import ExcelJS from 'exceljs';
import {
  buildDiscrepancyReport,
  buildDiscrepancyRows,
  needsReport,
  SHEET_NAMES,
} from '../../src/services/discrepancyReport.service';
import type { GroupOutcome, PendingInvoice } from '../../src/matching';

const pending = (invoiceId: string, resourceName: string): PendingInvoice => ({
  invoiceId,
  resourceName,
  payPeriodStart: '2025-03-01',
  payPeriodEnd: '2025-03-31',
  vendorHours: 40,
  approvalStatus: 'pending',
  division: null,
  clientName: null,
  projectNameExcel: null,
});

const outcome = (
  firstName: string,
  lastName: string,
  status: GroupOutcome['status'],
  extra: Partial<GroupOutcome> = {}
): GroupOutcome => ({
  key: { firstName, lastName, year: 2025, month: 3 },
  timesheetName: `${firstName} ${lastName}`,
  rowCount: 2,
  status,
  invoiceId: null,
  ...extra,
});

describe('Discrepancy report', () => {
  const pool = [pending('INV-B', 'John Smith'), pending('INV-C', 'Smith, John A'), pending('INV-A', 'Doe, Jane')];
  const outcomes = [
    outcome('john', 'smith', 'AMBIGUOUS'),
    outcome('unknown', 'person', 'UNMATCHED'),
    outcome('jane', 'doe', 'MATCHED', {
      invoiceId: 'INV-A',
      matchedTo: 'Doe, Jane',
      approvedHours: 40,
      vendorHours: 40,
      newStatus: 'Complete',
    }),
    outcome('mary', 'major', 'PERIOD_MISMATCH'),
  ];

  describe('needsReport', () => {
    it('should only ask for a report when something is unmatched or ambiguous', () => {
      expect(needsReport(outcomes)).toBe(true);
      expect(needsReport([outcomes[2], outcomes[3]])).toBe(false);
      expect(needsReport([])).toBe(false);
    });
  });

  describe('buildDiscrepancyRows', () => {
    it('should list unmatched and ambiguous groups with suggestions', () => {
      const rows = buildDiscrepancyRows(outcomes, pool);

      expect(rows).toHaveLength(2);
      expect(rows[0]).toMatchObject({
        timesheetName: 'john smith',
        status: 'AMBIGUOUS',
        possibleMatches: 'John Smith (INV-B); Smith, John A (INV-C)',
        rowCount: 2,
        year: 2025,
        month: 3,
      });
      expect(rows[1]).toMatchObject({ timesheetName: 'unknown person', status: 'UNMATCHED', possibleMatches: '' });
      expect(rows[1].suggestedAction).toContain('No pending invoice carries this name');
    });
  });

  describe('buildDiscrepancyReport', () => {
    it('should write the three sheets', async () => {
      const bytes = await buildDiscrepancyReport({
        sourceFileName: 'march.xlsx',
        outcomes,
        pendingInvoices: pool,
      });

      const workbook = new ExcelJS.Workbook();
      await workbook.xlsx.load(bytes);

      expect(workbook.worksheets.map((sheet) => sheet.name)).toEqual([
        SHEET_NAMES.DISCREPANCIES,
        SHEET_NAMES.PENDING,
        SHEET_NAMES.MATCHED,
      ]);

      const discrepancies = workbook.getWorksheet(SHEET_NAMES.DISCREPANCIES);
      expect(discrepancies?.rowCount).toBe(3);
      expect(discrepancies?.getRow(1).getCell(1).value).toBe('Timesheet Name');
      expect(discrepancies?.getRow(2).getCell(7).value).toBe('AMBIGUOUS');
      expect(discrepancies?.getRow(3).getCell(1).value).toBe('unknown person');

      const pendingSheet = workbook.getWorksheet(SHEET_NAMES.PENDING);
      expect(pendingSheet?.rowCount).toBe(4);
      expect(pendingSheet?.getRow(4).getCell(1).value).toBe('INV-A');
      expect(pendingSheet?.getRow(4).getCell(5).value).toBe(40);

      const matched = workbook.getWorksheet(SHEET_NAMES.MATCHED);
      expect(matched?.rowCount).toBe(2);
      expect(matched?.getRow(2).getCell(2).value).toBe('INV-A');
      expect(matched?.getRow(2).getCell(8).value).toBe('Complete');
    });
  });
});
