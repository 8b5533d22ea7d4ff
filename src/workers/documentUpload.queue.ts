import { Queue, Worker, QueueEvents, Job, ConnectionOptions, type Processor } from 'bullmq';
import { env } from '../config';
import { logger } from '../utils';
import type { DocumentJobData, DocumentJobQueue, DocumentJobResult, TrackedJob } from './types';

// ============================================
// Redis Connection for BullMQ
// ============================================

const connection: ConnectionOptions = {
  host: env.REDIS_HOST,
  port: env.REDIS_PORT,
  // BullMQ requires maxRetriesPerRequest to be null
  maxRetriesPerRequest: null,
};

// ============================================
// Queue Definition
// ============================================

export const DOCUMENT_UPLOAD_QUEUE_NAME = 'document-uploads';

let queue: Queue<DocumentJobData, string> | null = null;
let queueEvents: QueueEvents | null = null;

// Created on first use so importing this module opens no connection
function getQueue(): Queue<DocumentJobData, string> {
  queue ??= new Queue<DocumentJobData, string>(DOCUMENT_UPLOAD_QUEUE_NAME, {
    connection,
    defaultJobOptions: {
      // Uploads are not retried; a failure is logged and reported once
      attempts: 1,
      removeOnComplete: { age: env.JOB_PAYLOAD_TTL_SECONDS },
      removeOnFail: { age: env.RUN_CACHE_TTL_SECONDS },
    },
  });
  return queue;
}

function getQueueEvents(): QueueEvents {
  queueEvents ??= new QueueEvents(DOCUMENT_UPLOAD_QUEUE_NAME, { connection });
  return queueEvents;
}

// ============================================
// Worker Setup
// ============================================

export function setupDocumentUploadWorker(
  processor: Processor<DocumentJobData, string>
): Worker<DocumentJobData, string> {
  const worker = new Worker<DocumentJobData, string>(DOCUMENT_UPLOAD_QUEUE_NAME, processor, {
    connection,
    concurrency: env.DOCUMENT_QUEUE_CONCURRENCY,
  });

  worker.on('completed', (job) => {
    logger.info(`[Job ${job.id}] ${job.data.kind} upload completed`);
  });

  worker.on('failed', (job, err) => {
    logger.error(`[Job ${job?.id}] ${job?.data.kind ?? 'document'} upload failed: ${err.message}`);
  });

  worker.on('error', (err) => {
    logger.error(`Document upload worker error: ${err.message}`);
  });

  return worker;
}

// ============================================
// Tracked Jobs
// ============================================

const errorText = (error: unknown): string => (error instanceof Error ? error.message : String(error));

class BullTrackedJob implements TrackedJob {
  constructor(
    private readonly job: Job<DocumentJobData, string>,
    readonly id: string
  ) {}

  async waitFor(ms: number): Promise<DocumentJobResult | null> {
    // A zero ttl would wait forever
    if (ms > 0) {
      try {
        const reference = await this.job.waitUntilFinished(getQueueEvents(), ms);
        return { status: 'completed', reference };
      } catch (error) {
        // Either the job failed or the wait timed out
        logger.debug(`[Job ${this.id}] wait ended: ${errorText(error)}`);
      }
    }
    return this.settledResult();
  }

  private async settledResult(): Promise<DocumentJobResult | null> {
    const state = await getQueue().getJobState(this.id);
    if (state !== 'completed' && state !== 'failed') {
      return null;
    }

    const finished = await Job.fromId<DocumentJobData, string>(getQueue(), this.id);
    if (state === 'failed') {
      return { status: 'failed', error: finished?.failedReason ?? 'Upload job failed' };
    }
    return finished ? { status: 'completed', reference: finished.returnvalue } : null;
  }
}

/**
 * Production queue: jobs go through Redis to the document upload worker.
 */
export const bullDocumentJobQueue: DocumentJobQueue = {
  async enqueue(data) {
    const job = await getQueue().add(data.kind, data);
    if (!job.id) {
      throw new Error(`Queue returned no id for ${data.kind} job`);
    }
    logger.debug(`[Job ${job.id}] ${data.kind} queued`);
    return new BullTrackedJob(job, job.id);
  },
};

/**
 * Closes the queue connections. Workers are closed by their owner.
 */
export async function closeDocumentUploadQueue(): Promise<void> {
  const closing = [queueEvents, queue];
  queue = null;
  queueEvents = null;
  await Promise.all(closing.map((resource) => resource?.close()));
}
