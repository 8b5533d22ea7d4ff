/**
 * Document Upload Worker
 *
 * Runs the uploads a sync or an approval leaves behind:
 * - timesheet-archive: the uploaded workbook, read back from its payload key
 * - discrepancy-report: builds the report workbook, then records its
 *   reference (or failure) on the cached run summary
 * - status-change-log: the JSON log of a dashboard approval
 *
 * Each job makes a single attempt. The returned value is the stored object's
 * reference.
 */

import type { Job } from 'bullmq';
import type { JobPayloadStore, RunSummaryStore } from '../redis';
import { buildDiscrepancyReport } from '../services/discrepancyReport.service';
import {
  discrepancyReportPath,
  statusChangeLogPath,
  timesheetArchivePath,
  XLSX_CONTENT_TYPE,
  type BlobStore,
} from '../services/documentStorage.service';
import { logger } from '../utils';
import type { DiscrepancyReportJob, DocumentJobData, TimesheetArchiveJob } from './types';

export interface DocumentUploadDependencies {
  blobStore: BlobStore;
  payloads: JobPayloadStore;
  runSummaries: RunSummaryStore;
}

const errorText = (error: unknown): string => (error instanceof Error ? error.message : String(error));

async function archiveTimesheet(data: TimesheetArchiveJob, deps: DocumentUploadDependencies): Promise<string> {
  const bytes = await deps.payloads.take(data.payloadKey);
  if (!bytes) {
    throw new Error(`Timesheet payload ${data.payloadKey} is missing or expired`);
  }
  return deps.blobStore.put(
    timesheetArchivePath(data.fileName, new Date(data.startedAt)),
    bytes,
    XLSX_CONTENT_TYPE
  );
}

async function publishReport(data: DiscrepancyReportJob, deps: DocumentUploadDependencies): Promise<string> {
  try {
    const workbook = await buildDiscrepancyReport({
      sourceFileName: data.fileName,
      outcomes: data.outcomes,
      pendingInvoices: data.pendingInvoices,
    });
    const reference = await deps.blobStore.put(
      discrepancyReportPath(data.fileName, new Date(data.startedAt)),
      workbook,
      XLSX_CONTENT_TYPE
    );
    await deps.runSummaries.updateReport(data.runId, { status: 'completed', reference });
    return reference;
  } catch (error) {
    await deps.runSummaries.updateReport(data.runId, { status: 'failed', error: errorText(error) });
    throw error;
  }
}

/**
 * Runs one document job.
 *
 * @returns Reference of the stored object
 */
export async function processDocumentJob(
  data: DocumentJobData,
  deps: DocumentUploadDependencies
): Promise<string> {
  switch (data.kind) {
    case 'timesheet-archive':
      return archiveTimesheet(data, deps);
    case 'discrepancy-report':
      return publishReport(data, deps);
    case 'status-change-log':
      return deps.blobStore.put(
        statusChangeLogPath(data.invoiceId, new Date(data.changedAt)),
        Buffer.from(data.body),
        'application/json'
      );
  }
}

/**
 * BullMQ processor bound to its dependencies
 */
export const createDocumentUploadProcessor =
  (deps: DocumentUploadDependencies) =>
  async (job: Job<DocumentJobData, string>): Promise<string> => {
    const startTime = Date.now();
    logger.debug(`[Job ${job.id}] ${job.data.kind} started`);

    const reference = await processDocumentJob(job.data, deps);

    logger.info(`[Job ${job.id}] ✅ ${job.data.kind} stored at ${reference} in ${Date.now() - startTime}ms`);
    return reference;
  };

export default createDocumentUploadProcessor;
