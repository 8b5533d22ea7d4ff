/**
 * Sync Run Summary Cache
 *
 * Keeps the response of each timesheet sync for a day so clients can look a
 * run up again, including the discrepancy report reference, which is only
 * known once the report job finishes. The job may finish before or after
 * the summary is saved; whichever writes the report fields first, a
 * finished result is never overwritten by "running".
 *
 * KEY FORMAT: sync:run:{runId} (hash: summary JSON + report fields)
 */

import { env } from '../config';
import type { BackgroundArtifact, BackgroundStatus, SyncRunReport } from '../types';
import { logger } from '../utils';
import { safeRedisOperation, safeRedisWrite } from './client';

// ============================================
// Store Interface
// ============================================

/**
 * Where run summaries live. The sync service depends on this interface so
 * tests can use an in-memory map.
 */
export interface RunSummaryStore {
  save(summary: SyncRunReport): Promise<void>;
  get(runId: string): Promise<SyncRunReport | null>;
  updateReport(runId: string, report: BackgroundArtifact): Promise<void>;
}

// ============================================
// Redis Implementation
// ============================================

const getCacheKey = (runId: string): string => `sync:run:${runId}`;

const BACKGROUND_STATUSES: readonly BackgroundStatus[] = ['completed', 'failed', 'running', 'skipped'];

function toBackgroundStatus(value: string | undefined): BackgroundStatus | null {
  return BACKGROUND_STATUSES.find((status) => status === value) ?? null;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function isSyncRunReport(value: unknown): value is SyncRunReport {
  return (
    isRecord(value) &&
    typeof value.run_id === 'string' &&
    typeof value.file_name === 'string' &&
    typeof value.processed === 'number' &&
    isRecord(value.archive) &&
    isRecord(value.report) &&
    Array.isArray(value.details)
  );
}

/** Summaries written by another release or truncated in Redis read as null */
function parseSummary(raw: string): SyncRunReport | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  return isSyncRunReport(value) ? value : null;
}

function reportFields(report: BackgroundArtifact): Record<string, string> {
  return {
    reportStatus: report.status,
    reportReference: report.reference ?? '',
    reportError: report.error ?? '',
  };
}

export const redisRunSummaryStore: RunSummaryStore = {
  async save(summary) {
    const cacheKey = getCacheKey(summary.run_id);

    await safeRedisWrite(async (client) => {
      const multi = client.multi();
      multi.hset(cacheKey, 'summary', JSON.stringify(summary));
      const fields = Object.entries(reportFields(summary.report));
      if (summary.report.status === 'running') {
        // The report job may already have recorded its result
        for (const [field, value] of fields) {
          multi.hsetnx(cacheKey, field, value);
        }
      } else {
        multi.hset(cacheKey, Object.fromEntries(fields));
      }
      multi.expire(cacheKey, env.RUN_CACHE_TTL_SECONDS);
      await multi.exec();
    }, `Run summary SET (${summary.run_id})`);
  },

  async get(runId) {
    const cacheKey = getCacheKey(runId);

    return safeRedisOperation(
      async (client) => {
        const data = await client.hgetall(cacheKey);
        if (!data.summary) {
          return null;
        }

        const summary = parseSummary(data.summary);
        if (!summary) {
          logger.warn(`Run summary ${runId} is not readable, ignoring it`);
          return null;
        }
        const reportStatus = toBackgroundStatus(data.reportStatus);
        if (reportStatus) {
          summary.report = {
            status: reportStatus,
            ...(data.reportReference ? { reference: data.reportReference } : {}),
            ...(data.reportError ? { error: data.reportError } : {}),
          };
        }
        return summary;
      },
      null,
      `Run summary GET (${runId})`
    );
  },

  async updateReport(runId, report) {
    const cacheKey = getCacheKey(runId);

    await safeRedisWrite(async (client) => {
      const multi = client.multi();
      multi.hset(cacheKey, reportFields(report));
      multi.expire(cacheKey, env.RUN_CACHE_TTL_SECONDS);
      await multi.exec();
    }, `Run summary report UPDATE (${runId})`);
  },
};

export default redisRunSummaryStore;
