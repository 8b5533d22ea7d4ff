import { env } from '../config';
import { redisJobPayloadStore, redisRunSummaryStore } from '../redis';
import { checkDatabaseHealth, db } from '../utils/db';
import { bullDocumentJobQueue, type DocumentUploadDependencies } from '../workers';
import { createS3Client, S3BlobStore } from './documentStorage.service';
import { HealthService } from './health.service';
import { InvoiceService } from './invoice.service';
import { DrizzleInvoiceStore } from './invoiceStore.service';
import { TimesheetSyncService } from './timesheetSync.service';

export { HealthService, type DependencyCheck } from './health.service';
export * from './invoice.service';
export * from './timesheetSync.service';
export {
  DrizzleInvoiceStore,
  type InvoiceStore,
  type InvoiceApprovalFields,
  type InvoiceEditFields,
} from './invoiceStore.service';
export { S3BlobStore, type BlobStore } from './documentStorage.service';
export { buildDiscrepancyReport, buildDiscrepancyRows, SHEET_NAMES } from './discrepancyReport.service';

/**
 * Services the HTTP layer depends on
 */
export interface AppServices {
  health: HealthService;
  invoices: InvoiceService;
  timesheetSync: TimesheetSyncService;
}

/**
 * What the document upload worker writes to: S3 and the Redis run cache.
 */
export const createDocumentUploadDependencies = (): DocumentUploadDependencies => ({
  blobStore: new S3BlobStore(createS3Client(), env.S3_DOCUMENT_BUCKET),
  payloads: redisJobPayloadStore,
  runSummaries: redisRunSummaryStore,
});

/**
 * Wires the production services: Postgres via Drizzle, BullMQ uploads,
 * Redis run cache.
 */
export const createDefaultServices = (): AppServices => {
  const store = new DrizzleInvoiceStore(db);

  return {
    health: new HealthService({ database: checkDatabaseHealth }),
    invoices: new InvoiceService(store, bullDocumentJobQueue),
    timesheetSync: new TimesheetSyncService({
      store,
      jobs: bullDocumentJobQueue,
      payloads: redisJobPayloadStore,
      runSummaries: redisRunSummaryStore,
      graceMs: env.BACKGROUND_GRACE_MS,
    }),
  };
};
