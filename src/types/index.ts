// Environment configuration type
export interface EnvConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;
  HOST: string;
  API_PREFIX: string;
  CORS_ORIGIN: string[];
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX_REQUESTS: number;
  LOG_LEVEL: 'error' | 'warn' | 'info' | 'http' | 'debug';
  DATABASE_URL: string;
  DATABASE_POOL_MAX: number;
  // Redis (syncs still reconcile without it; uploads and the run cache need it)
  REDIS_HOST: string;
  REDIS_PORT: number;
  RUN_CACHE_TTL_SECONDS: number;
  DOCUMENT_QUEUE_CONCURRENCY: number;
  JOB_PAYLOAD_TTL_SECONDS: number;
  AWS_REGION: string;
  AWS_ACCESS_KEY_ID?: string;
  AWS_SECRET_ACCESS_KEY?: string;
  S3_DOCUMENT_BUCKET: string;
  TIMESHEET_ARCHIVE_PREFIX: string;
  DISCREPANCY_REPORT_PREFIX: string;
  AUDIT_LOG_PREFIX: string;
  SYNC_DEFAULT_FILENAME: string;
  BACKGROUND_GRACE_MS: number;
  UPLOAD_MAX_MB: number;
}

// API Response types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
  timestamp: string;
}

// Health check response
export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  environment: string;
  version: string;
}

// ============================================
// Timesheet sync run
// ============================================

export type BackgroundStatus = 'completed' | 'failed' | 'running' | 'skipped';

/** State of a background upload (archive or report) when the response was sent */
export interface BackgroundArtifact {
  status: BackgroundStatus;
  reference?: string;
  error?: string;
}

export interface SyncCounts {
  processed: number;
  matched: number;
  need_approval: number;
  pending: number;
  unmatched: number;
  ambiguous: number;
  skipped_not_pending: number;
  period_mismatch: number;
  duplicate_match: number;
  write_failed: number;
}

/** Wire form of a group outcome; absent values are omitted */
export interface OutcomeRecord {
  excel_name: string;
  first_name: string;
  last_name: string;
  year: number;
  month: number;
  row_count: number;
  status: string;
  invoice_uuid: string | null;
  approved_hours?: number;
  vendor_hours?: number | null;
  new_db_status?: string;
  matched_to?: string | null;
  db_status?: string | null;
  invoice_period_start?: string | null;
  error?: string;
}

export interface SyncRunReport extends SyncCounts {
  run_id: string;
  file_name: string;
  archive: BackgroundArtifact;
  report: BackgroundArtifact;
  details: OutcomeRecord[];
}
