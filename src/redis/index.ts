/**
 * Redis Module
 *
 * Sync run summary cache and document job payloads.
 */

export {
  getRedisClient,
  requireRedisClient,
  disconnectRedis,
  safeRedisOperation,
  safeRedisWrite,
} from './client';
export { redisJobPayloadStore, payloadKey, type JobPayloadStore } from './jobPayloads';

export { redisRunSummaryStore, type RunSummaryStore } from './runSummary';
