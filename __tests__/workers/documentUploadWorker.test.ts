import ExcelJS from 'exceljs';
import { processDocumentJob } from '../../src/workers/documentUploadWorker';
import type { DocumentJobData, DocumentUploadDependencies } from '../../src/workers';
import type { GroupOutcome } from '../../src/matching';
import { InMemoryBlobStore, InMemoryJobPayloadStore, InMemoryRunSummaryStore } from '../helpers/fakes';

const STARTED_AT = new Date(2025, 3, 2, 9, 0, 0).toISOString();
const ARCHIVE_PATH = 'Timesheet/2025/04/20250402-090000_march.xlsx';
const REPORT_PATH = 'Timesheet/Discrepancy Reports/2025/04/discrepancy_march_20250402-090000.xlsx';

const unmatched: GroupOutcome = {
  key: { firstName: 'unknown', lastName: 'person', year: 2025, month: 3 },
  timesheetName: 'unknown person',
  rowCount: 1,
  status: 'UNMATCHED',
  invoiceId: null,
};

describe('processDocumentJob', () => {
  let deps: DocumentUploadDependencies & {
    blobStore: InMemoryBlobStore;
    payloads: InMemoryJobPayloadStore;
    runSummaries: InMemoryRunSummaryStore;
  };

  beforeEach(() => {
    deps = {
      blobStore: new InMemoryBlobStore(),
      payloads: new InMemoryJobPayloadStore(),
      runSummaries: new InMemoryRunSummaryStore(),
    };
  });

  describe('timesheet-archive', () => {
    const job: DocumentJobData = {
      kind: 'timesheet-archive',
      runId: 'run-1',
      fileName: 'march.xlsx',
      startedAt: STARTED_AT,
      payloadKey: 'sync:payload:run-1',
    };

    it('should store the stashed bytes and consume the payload', async () => {
      await deps.payloads.stash('sync:payload:run-1', Buffer.from('workbook bytes'));

      await expect(processDocumentJob(job, deps)).resolves.toBe(`memory://${ARCHIVE_PATH}`);

      expect(deps.blobStore.objects.get(ARCHIVE_PATH)?.body.toString()).toBe('workbook bytes');
      expect(deps.payloads.payloads.has('sync:payload:run-1')).toBe(false);
    });

    it('should fail when the payload has expired', async () => {
      await expect(processDocumentJob(job, deps)).rejects.toThrow(
        'Timesheet payload sync:payload:run-1 is missing or expired'
      );
      expect(deps.blobStore.paths()).toEqual([]);
    });
  });

  describe('discrepancy-report', () => {
    const job: DocumentJobData = {
      kind: 'discrepancy-report',
      runId: 'run-2',
      fileName: 'march.xlsx',
      startedAt: STARTED_AT,
      outcomes: [unmatched],
      pendingInvoices: [],
    };

    it('should store the report workbook and record it on the run', async () => {
      await expect(processDocumentJob(job, deps)).resolves.toBe(`memory://${REPORT_PATH}`);

      const stored = deps.blobStore.objects.get(REPORT_PATH);
      expect(stored?.contentType).toBe('application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');

      const workbook = new ExcelJS.Workbook();
      await workbook.xlsx.load(stored?.body ?? Buffer.alloc(0));
      expect(workbook.worksheets.length).toBeGreaterThan(0);

      await deps.runSummaries.save({
        run_id: 'run-2',
        file_name: 'march.xlsx',
        processed: 1,
        matched: 0,
        need_approval: 0,
        pending: 0,
        unmatched: 1,
        ambiguous: 0,
        skipped_not_pending: 0,
        period_mismatch: 0,
        duplicate_match: 0,
        write_failed: 0,
        archive: { status: 'running' },
        report: { status: 'running' },
        details: [],
      });
      await expect(deps.runSummaries.get('run-2')).resolves.toMatchObject({
        report: { status: 'completed', reference: `memory://${REPORT_PATH}` },
      });
    });

    it('should record a failed upload and rethrow', async () => {
      deps.blobStore.failWith = new Error('AccessDenied');
      const updateReport = jest.spyOn(deps.runSummaries, 'updateReport');

      await expect(processDocumentJob(job, deps)).rejects.toThrow('AccessDenied');

      expect(updateReport).toHaveBeenCalledWith('run-2', { status: 'failed', error: 'AccessDenied' });
    });
  });

  describe('status-change-log', () => {
    it('should store the log as JSON under the audit prefix', async () => {
      const job: DocumentJobData = {
        kind: 'status-change-log',
        invoiceId: 'INV-1',
        changedAt: STARTED_AT,
        body: '{"invoice_id":"INV-1"}',
      };

      await processDocumentJob(job, deps);

      expect(deps.blobStore.objects.get('JSON_Logs/2025/04/invoice_INV-1_status_change.json')).toEqual({
        body: Buffer.from('{"invoice_id":"INV-1"}'),
        contentType: 'application/json',
      });
    });
  });
});
