/**
 * Workers Module
 *
 * BullMQ queue and worker for the document uploads a sync or an approval
 * leaves behind.
 */

export {
  bullDocumentJobQueue,
  closeDocumentUploadQueue,
  setupDocumentUploadWorker,
  DOCUMENT_UPLOAD_QUEUE_NAME,
} from './documentUpload.queue';
export {
  createDocumentUploadProcessor,
  processDocumentJob,
  type DocumentUploadDependencies,
} from './documentUploadWorker';
export type {
  DocumentJobData,
  DocumentJobKind,
  DocumentJobQueue,
  DocumentJobResult,
  TrackedJob,
} from './types';
