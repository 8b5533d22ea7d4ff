import dotenv from 'dotenv';
import { z } from 'zod';
import type { EnvConfig } from '../types';

dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('localhost'),
  API_PREFIX: z.string().default('/api'),
  CORS_ORIGIN: z
    .string()
    .default('*')
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter(Boolean)
    ),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),

  // Postgres (source of truth for invoices)
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  DATABASE_POOL_MAX: z.coerce.number().int().positive().default(10),

  // Redis (run summaries and the document upload queue)
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  RUN_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(24 * 60 * 60),

  // Document upload jobs (BullMQ on the same Redis)
  DOCUMENT_QUEUE_CONCURRENCY: z.coerce.number().int().positive().default(2),
  JOB_PAYLOAD_TTL_SECONDS: z.coerce.number().int().positive().default(60 * 60),

  // Document store
  AWS_REGION: z.string().default('us-east-1'),
  AWS_ACCESS_KEY_ID: z.string().optional(),
  AWS_SECRET_ACCESS_KEY: z.string().optional(),
  S3_DOCUMENT_BUCKET: z.string().default('invoice-documents'),
  TIMESHEET_ARCHIVE_PREFIX: z.string().default('Timesheet'),
  DISCREPANCY_REPORT_PREFIX: z.string().default('Timesheet/Discrepancy Reports'),
  AUDIT_LOG_PREFIX: z.string().default('JSON_Logs'),

  // Timesheet sync
  SYNC_DEFAULT_FILENAME: z.string().min(1).default('timesheet.xlsx'),
  BACKGROUND_GRACE_MS: z.coerce.number().int().nonnegative().default(2000),
  UPLOAD_MAX_MB: z.coerce.number().positive().default(25),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const issues = parsed.error.errors
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join('; ');
  throw new Error(`Invalid environment variables: ${issues}`);
}

export const env: EnvConfig = parsed.data;

export default env;
