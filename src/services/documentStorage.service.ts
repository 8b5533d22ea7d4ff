/**
 * Document Storage Service
 *
 * Uploaded timesheets, discrepancy reports and status-change logs are kept
 * in S3 under month-partitioned prefixes:
 *
 *   {TIMESHEET_ARCHIVE_PREFIX}/2025/03/20250314-101500_timesheet.xlsx
 *   {DISCREPANCY_REPORT_PREFIX}/2025/03/discrepancy_timesheet_20250314-101500.xlsx
 *   {AUDIT_LOG_PREFIX}/2025/03/invoice_INV-1_status_change.json
 */

import { basename, extname } from 'path';
import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { format } from 'date-fns';
import { env } from '../config';
import { logger } from '../utils';

// ============================================
// Store Interface
// ============================================

export interface BlobStore {
  /**
   * Stores `body` under `path`.
   * @returns A reference to the stored object
   */
  put(path: string, body: Buffer, contentType: string): Promise<string>;
}

export const XLSX_CONTENT_TYPE =
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

// ============================================
// S3 Implementation
// ============================================

export class S3BlobStore implements BlobStore {
  constructor(
    private readonly client: S3Client,
    private readonly bucket: string
  ) {}

  async put(path: string, body: Buffer, contentType: string): Promise<string> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: path,
          Body: body,
          ContentLength: body.length,
          ContentType: contentType,
        })
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`[S3 Upload Failed] Bucket=${this.bucket} Key=${path} Message=${message}`);
      throw new Error(`Upload of ${path} failed: ${message}`, { cause: error });
    }

    return `s3://${this.bucket}/${path}`;
  }
}

export const createS3Client = (): S3Client =>
  new S3Client({
    region: env.AWS_REGION,
    credentials:
      env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY
        ? { accessKeyId: env.AWS_ACCESS_KEY_ID, secretAccessKey: env.AWS_SECRET_ACCESS_KEY }
        : undefined,
  });

// ============================================
// Path Helpers
// ============================================

const monthPrefix = (prefix: string, at: Date): string =>
  `${prefix}/${format(at, 'yyyy')}/${format(at, 'MM')}`;

const stamp = (at: Date): string => format(at, 'yyyyMMdd-HHmmss');

/** Strips directories a client may have put in the file name */
const safeFileName = (fileName: string): string => basename(fileName.replace(/\\/g, '/'));

export function timesheetArchivePath(fileName: string, at: Date): string {
  return `${monthPrefix(env.TIMESHEET_ARCHIVE_PREFIX, at)}/${stamp(at)}_${safeFileName(fileName)}`;
}

export function discrepancyReportPath(sourceFileName: string, at: Date): string {
  const file = safeFileName(sourceFileName);
  const base = basename(file, extname(file)) || 'timesheet';
  return `${monthPrefix(env.DISCREPANCY_REPORT_PREFIX, at)}/discrepancy_${base}_${stamp(at)}.xlsx`;
}

export function statusChangeLogPath(invoiceId: string, at: Date): string {
  return `${monthPrefix(env.AUDIT_LOG_PREFIX, at)}/invoice_${safeFileName(invoiceId)}_status_change.json`;
}
