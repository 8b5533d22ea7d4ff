/**
 * Job Payload Store
 *
 * Binary payloads handed from the HTTP request to a document upload job.
 * Unlike the run cache these calls throw when Redis is unavailable: a job
 * without its payload cannot run.
 *
 * KEY FORMAT: sync:payload:{runId}
 */

import { env } from '../config';
import { requireRedisClient } from './client';

export interface JobPayloadStore {
  stash(key: string, bytes: Buffer): Promise<void>;
  /** Reads and removes a payload; null once taken or expired */
  take(key: string): Promise<Buffer | null>;
}

export const payloadKey = (runId: string): string => `sync:payload:${runId}`;

export const redisJobPayloadStore: JobPayloadStore = {
  async stash(key, bytes) {
    await requireRedisClient().set(key, bytes, 'EX', env.JOB_PAYLOAD_TTL_SECONDS);
  },

  async take(key) {
    const redis = requireRedisClient();
    const bytes = await redis.getBuffer(key);
    if (bytes) {
      await redis.del(key);
    }
    return bytes;
  },
};

export default redisJobPayloadStore;
