/**
 * Timesheet Sync Service
 *
 * Orchestrates one sync run:
 * 1. Queue the archive upload
 * 2. Parse rows and validate there is something to reconcile
 * 3. Read the pending invoice pool once
 * 4. Group → match → resolve each group, one at a time
 * 5. Queue the discrepancy report when anything went unmatched
 * 6. Cache the run summary and answer, waiting briefly for the uploads
 */

import { randomUUID } from 'crypto';
import {
  groupRows,
  hasNamedRows,
  matchInvoice,
  resolveGroup,
  RunClaims,
  type GroupOutcome,
  type GroupStatus,
  type InvoiceSyncStore,
  type PendingInvoice,
} from '../matching';
import { payloadKey, type JobPayloadStore } from '../redis/jobPayloads';
import type { RunSummaryStore } from '../redis/runSummary';
import type { BackgroundArtifact, OutcomeRecord, SyncCounts, SyncRunReport } from '../types';
import { AppError, Logging, logger } from '../utils';
import { parseTimesheetWorkbook } from '../utils/spreadsheet';
import type { DocumentJobData, DocumentJobQueue, DocumentJobResult, TrackedJob } from '../workers/types';
import { needsReport } from './discrepancyReport.service';

// ============================================
// Types
// ============================================

export interface TimesheetUpload {
  bytes: Buffer;
  fileName: string;
}

export interface TimesheetSyncDependencies {
  store: InvoiceSyncStore;
  jobs: DocumentJobQueue;
  payloads: JobPayloadStore;
  runSummaries: RunSummaryStore;
  /** Longest the response waits for its background uploads */
  graceMs: number;
  now?: () => Date;
}

// ============================================
// Response Shaping
// ============================================

const COUNT_KEYS: Record<GroupStatus, keyof SyncCounts> = {
  MATCHED: 'matched',
  NEED_APPROVAL: 'need_approval',
  PENDING: 'pending',
  UNMATCHED: 'unmatched',
  AMBIGUOUS: 'ambiguous',
  SKIPPED_NOT_PENDING: 'skipped_not_pending',
  PERIOD_MISMATCH: 'period_mismatch',
  DUPLICATE_MATCH: 'duplicate_match',
  WRITE_FAILED: 'write_failed',
};

export function countOutcomes(outcomes: readonly GroupOutcome[]): SyncCounts {
  const counts: SyncCounts = {
    processed: outcomes.length,
    matched: 0,
    need_approval: 0,
    pending: 0,
    unmatched: 0,
    ambiguous: 0,
    skipped_not_pending: 0,
    period_mismatch: 0,
    duplicate_match: 0,
    write_failed: 0,
  };
  for (const outcome of outcomes) {
    counts[COUNT_KEYS[outcome.status]] += 1;
  }
  return counts;
}

export function toOutcomeRecord(outcome: GroupOutcome): OutcomeRecord {
  return {
    excel_name: outcome.timesheetName,
    first_name: outcome.key.firstName,
    last_name: outcome.key.lastName,
    year: outcome.key.year,
    month: outcome.key.month,
    row_count: outcome.rowCount,
    status: outcome.status,
    invoice_uuid: outcome.invoiceId,
    ...(outcome.approvedHours !== undefined && { approved_hours: outcome.approvedHours }),
    ...(outcome.vendorHours !== undefined && { vendor_hours: outcome.vendorHours }),
    ...(outcome.newStatus !== undefined && { new_db_status: outcome.newStatus }),
    ...(outcome.matchedTo !== undefined && { matched_to: outcome.matchedTo }),
    ...(outcome.currentStatus !== undefined && { db_status: outcome.currentStatus }),
    ...(outcome.invoicePeriodStart !== undefined && {
      invoice_period_start: outcome.invoicePeriodStart,
    }),
    ...(outcome.error !== undefined && { error: outcome.error }),
  };
}

/** A queued job, or why it could not be queued */
type Submission = { job: TrackedJob } | { error: string };

function toArtifact(result: DocumentJobResult | null): BackgroundArtifact {
  if (!result) {
    return { status: 'running' };
  }
  return result.status === 'completed'
    ? { status: 'completed', reference: result.reference }
    : { status: 'failed', error: result.error };
}

// ============================================
// Service
// ============================================

export class TimesheetSyncService {
  private readonly now: () => Date;

  constructor(private readonly deps: TimesheetSyncDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Runs a sync over an uploaded workbook.
   *
   * @throws AppError 400 for unusable uploads, 503 when invoices cannot be read
   */
  async syncTimesheet(upload: TimesheetUpload): Promise<SyncRunReport> {
    const { store, payloads, runSummaries } = this.deps;

    if (upload.bytes.length === 0) {
      throw AppError.badRequest(
        'No file uploaded. Send the workbook as multipart/form-data or as the raw request body.'
      );
    }

    const runId = randomUUID();
    const startedAt = this.now().toISOString();
    logger.info(`Sync run ${runId} started for "${upload.fileName}" (${upload.bytes.length} bytes)`);

    // Archived even when the workbook turns out to be unusable
    const key = payloadKey(runId);
    const archive = await this.submit(
      { kind: 'timesheet-archive', runId, fileName: upload.fileName, startedAt, payloadKey: key },
      () => payloads.stash(key, upload.bytes)
    );

    const rows = await parseTimesheetWorkbook(upload.bytes);
    if (rows.length === 0) {
      throw AppError.badRequest('Excel file contained no data rows.');
    }
    if (!hasNamedRows(rows)) {
      throw AppError.badRequest(
        'No rows with a first or last name found. Expected columns such as "First Name" and "Last Name".'
      );
    }

    let pool: PendingInvoice[];
    try {
      pool = await store.fetchPendingInvoices();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Sync run ${runId}: pending invoices could not be read: ${message}`);
      throw AppError.serviceUnavailable(`Could not load pending invoices: ${message}`);
    }

    const groups = groupRows(rows);
    logger.info(`Sync run ${runId}: ${rows.length} rows in ${groups.length} groups, ${pool.length} pending invoices`);

    const claims = new RunClaims();
    const outcomes: GroupOutcome[] = [];
    for (const group of groups) {
      const match = matchInvoice(group.key.firstName, group.key.lastName, pool);
      outcomes.push(await resolveGroup(group, match, store, claims));
    }

    const report = needsReport(outcomes)
      ? await this.submit({
          kind: 'discrepancy-report',
          runId,
          fileName: upload.fileName,
          startedAt,
          outcomes,
          pendingInvoices: pool,
        })
      : null;

    const deadline = Date.now() + this.deps.graceMs;
    const remaining = (): number => Math.max(0, deadline - Date.now());

    const summary: SyncRunReport = {
      run_id: runId,
      file_name: upload.fileName,
      ...countOutcomes(outcomes),
      archive: await this.settle(archive, remaining()),
      report: report ? await this.settle(report, remaining()) : { status: 'skipped' },
      details: outcomes.map(toOutcomeRecord),
    };

    // A report still running records its own result when the job ends
    await runSummaries.save(summary);

    Logging.info(
      `Sync run ${runId} finished: ${summary.processed} groups, ${summary.matched} matched, ` +
        `${summary.need_approval} need approval, ${summary.unmatched} unmatched, ${summary.ambiguous} ambiguous`
    );

    return summary;
  }

  /**
   * Queues an upload job. Queueing failures are logged and reported as a
   * failed upload; they never fail the sync.
   */
  private async submit(data: DocumentJobData, prepare?: () => Promise<void>): Promise<Submission> {
    try {
      await prepare?.();
      return { job: await this.deps.jobs.enqueue(data) };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Could not queue ${data.kind} job: ${message}`);
      return { error: message };
    }
  }

  private async settle(submission: Submission, ms: number): Promise<BackgroundArtifact> {
    if ('error' in submission) {
      return { status: 'failed', error: submission.error };
    }
    try {
      return toArtifact(await submission.job.waitFor(ms));
    } catch (error) {
      // Job state unknown; it may still finish
      logger.warn(`Could not read job ${submission.job.id}: ${error instanceof Error ? error.message : String(error)}`);
      return { status: 'running' };
    }
  }

  async getRun(runId: string): Promise<SyncRunReport> {
    const summary = await this.deps.runSummaries.get(runId);
    if (!summary) {
      throw AppError.notFound(`Sync run ${runId} not found`);
    }
    return summary;
  }
}
