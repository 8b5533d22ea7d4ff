/**
 * Run summary cache against an in-memory Redis stand-in
 */

import { redisRunSummaryStore } from '../../src/redis/runSummary';
import type { SyncRunReport } from '../../src/types';

const mockHashes = new Map<string, Record<string, string>>();
const mockExpiries = new Map<string, number>();

const mockHset = (key: string, fields: Record<string, string>): number => {
  mockHashes.set(key, { ...(mockHashes.get(key) ?? {}), ...fields });
  return Object.keys(fields).length;
};

const mockHsetnx = (key: string, field: string, value: string): number => {
  if (mockHashes.get(key)?.[field] !== undefined) {
    return 0;
  }
  return mockHset(key, { [field]: value });
};

const mockClient = {
  multi() {
    const queued: Array<() => void> = [];
    const chain = {
      hset(key: string, fieldsOrName: Record<string, string> | string, value?: string) {
        const fields = typeof fieldsOrName === 'string' ? { [fieldsOrName]: value ?? '' } : fieldsOrName;
        queued.push(() => mockHset(key, fields));
        return chain;
      },
      hsetnx(key: string, field: string, value: string) {
        queued.push(() => mockHsetnx(key, field, value));
        return chain;
      },
      expire(key: string, seconds: number) {
        queued.push(() => mockExpiries.set(key, seconds));
        return chain;
      },
      async exec() {
        queued.forEach((apply) => apply());
        return [];
      },
    };
    return chain;
  },
  async hgetall(key: string) {
    return { ...(mockHashes.get(key) ?? {}) };
  },
};

jest.mock('../../src/redis/client', () => ({
  safeRedisWrite: async (operation: (client: unknown) => Promise<unknown>) => {
    await operation(mockClient);
  },
  safeRedisOperation: async (operation: (client: unknown) => Promise<unknown>) => operation(mockClient),
}));

const summary = (runId: string): SyncRunReport => ({
  run_id: runId,
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
  archive: { status: 'completed', reference: 's3://test-bucket/Timesheet/a.xlsx' },
  report: { status: 'running' },
  details: [
    {
      excel_name: 'unknown person',
      first_name: 'unknown',
      last_name: 'person',
      year: 2025,
      month: 3,
      row_count: 1,
      status: 'UNMATCHED',
      invoice_uuid: null,
    },
  ],
});

describe('redisRunSummaryStore', () => {
  beforeEach(() => {
    mockHashes.clear();
    mockExpiries.clear();
  });

  it('should store the summary under its run key with a TTL', async () => {
    await redisRunSummaryStore.save(summary('run-1'));

    expect(mockHashes.get('sync:run:run-1')).toMatchObject({
      reportStatus: 'running',
      reportReference: '',
      reportError: '',
    });
    expect(mockExpiries.get('sync:run:run-1')).toBe(86400);
  });

  it('should read a stored summary back', async () => {
    await redisRunSummaryStore.save(summary('run-1'));

    await expect(redisRunSummaryStore.get('run-1')).resolves.toEqual(summary('run-1'));
  });

  it('should return null for unknown runs', async () => {
    await expect(redisRunSummaryStore.get('run-404')).resolves.toBeNull();
  });

  it('should merge a late report result into the summary', async () => {
    await redisRunSummaryStore.save(summary('run-1'));

    await redisRunSummaryStore.updateReport('run-1', {
      status: 'completed',
      reference: 's3://test-bucket/Timesheet/Discrepancy Reports/r.xlsx',
    });

    const stored = await redisRunSummaryStore.get('run-1');
    expect(stored?.report).toEqual({
      status: 'completed',
      reference: 's3://test-bucket/Timesheet/Discrepancy Reports/r.xlsx',
    });
    expect(stored?.archive).toEqual(summary('run-1').archive);
  });

  it('should keep a report result recorded before the summary was saved', async () => {
    await redisRunSummaryStore.updateReport('run-1', { status: 'failed', error: 'AccessDenied' });
    await redisRunSummaryStore.save(summary('run-1'));

    const stored = await redisRunSummaryStore.get('run-1');
    expect(stored?.report).toEqual({ status: 'failed', error: 'AccessDenied' });
    expect(stored?.run_id).toBe('run-1');
  });

  it('should write a finished report over earlier fields', async () => {
    await redisRunSummaryStore.updateReport('run-1', { status: 'running' });
    await redisRunSummaryStore.save({ ...summary('run-1'), report: { status: 'skipped' } });

    expect(mockHashes.get('sync:run:run-1')).toMatchObject({ reportStatus: 'skipped' });
  });

  it('should give late report results the run TTL', async () => {
    await redisRunSummaryStore.updateReport('run-2', { status: 'completed', reference: 's3://test-bucket/r.xlsx' });

    expect(mockExpiries.get('sync:run:run-2')).toBe(86400);
    await expect(redisRunSummaryStore.get('run-2')).resolves.toBeNull();
  });

  it.each([
    ['malformed JSON', '{"run_id": "run-3"'],
    ['a foreign shape', '{"run_id": 3, "details": "none"}'],
  ])('should ignore a stored summary holding %s', async (_label, raw) => {
    mockHashes.set('sync:run:run-3', { summary: raw, reportStatus: 'running' });

    await expect(redisRunSummaryStore.get('run-3')).resolves.toBeNull();
  });
});
