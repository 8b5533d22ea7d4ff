/**
 * Document upload job types
 *
 * Job data is stored by BullMQ in Redis, so it stays plain JSON. Timesheet
 * bytes are too large for job data and are stashed under `payloadKey`.
 */

import type { GroupOutcome, PendingInvoice } from '../matching';

// ============================================
// Job Data
// ============================================

export interface TimesheetArchiveJob {
  kind: 'timesheet-archive';
  runId: string;
  fileName: string;
  /** ISO timestamp the run started at; stamps the archive path */
  startedAt: string;
  payloadKey: string;
}

export interface DiscrepancyReportJob {
  kind: 'discrepancy-report';
  runId: string;
  fileName: string;
  startedAt: string;
  outcomes: GroupOutcome[];
  pendingInvoices: PendingInvoice[];
}

export interface StatusChangeLogJob {
  kind: 'status-change-log';
  invoiceId: string;
  changedAt: string;
  /** Serialized JSON document */
  body: string;
}

export type DocumentJobData = TimesheetArchiveJob | DiscrepancyReportJob | StatusChangeLogJob;

export type DocumentJobKind = DocumentJobData['kind'];

// ============================================
// Queue Port
// ============================================

export type DocumentJobResult =
  | { status: 'completed'; reference: string }
  | { status: 'failed'; error: string };

export interface TrackedJob {
  readonly id: string;
  /**
   * Waits at most `ms` for the job to finish.
   * @returns null when the job is still running
   */
  waitFor(ms: number): Promise<DocumentJobResult | null>;
}

/**
 * Where services submit uploads. Production runs them on BullMQ; tests use
 * an in-process queue.
 */
export interface DocumentJobQueue {
  enqueue(data: DocumentJobData): Promise<TrackedJob>;
}
