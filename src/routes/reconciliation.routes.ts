/**
 * Reconciliation API Routes
 *
 * Timesheet sync endpoints. These routes handle HTTP concerns only -
 * reconciliation logic lives in the timesheet sync service.
 *
 * Endpoints:
 * - POST /sync-excel - Reconcile an uploaded timesheet workbook
 * - GET /runs/:runId - Look up a cached sync run summary
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { env } from '../config';
import {
  commonSchemas,
  getUploadedFile,
  multipartUpload,
  rawUpload,
  validateRequest,
} from '../middlewares';
import type { TimesheetSyncService } from '../services';
import { asyncHandler, sendSuccess, AppError, Logging } from '../utils';

// ============================================
// Validation
// ============================================

const syncQuerySchema = z.object({
  filename: z.string().trim().min(1).max(255).optional(),
});

// ============================================
// Routes
// ============================================

export const createReconciliationRouter = (timesheetSync: TimesheetSyncService): Router => {
  const router = Router();

  /**
   * @route   POST /api/reconciliation/sync-excel
   * @desc    Reconcile a timesheet workbook against pending invoices
   * @access  Public
   *
   * Request:
   * - multipart/form-data (first file part), or the raw .xlsx bytes as body
   * - Query "filename" (optional): name used for the archive and report
   *
   * Response:
   * - 200 OK: run summary with per-status counts and per-group details
   * - 400 Bad Request: no file, unreadable workbook, no data rows
   * - 503 Service Unavailable: pending invoices could not be read
   */
  router.post(
    '/sync-excel',
    multipartUpload,
    rawUpload,
    validateRequest({ query: syncQuerySchema }),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const upload = getUploadedFile(req);
      if (!upload) {
        Logging.warn('❌ Sync rejected: no file provided');
        throw AppError.badRequest(
          'No file uploaded. Send the workbook as multipart/form-data or as the raw request body.'
        );
      }

      const { filename } = syncQuerySchema.parse(req.query);
      const fileName = filename ?? upload.originalName ?? env.SYNC_DEFAULT_FILENAME;

      Logging.info(`📥 Timesheet received: ${fileName} (${(upload.bytes.length / 1024).toFixed(2)} KB)`);

      const summary = await timesheetSync.syncTimesheet({ bytes: upload.bytes, fileName });

      sendSuccess(res, summary, `Processed ${summary.processed} timesheet groups`);
    })
  );

  /**
   * @route   GET /api/reconciliation/runs/:runId
   * @desc    Get the cached summary of a sync run
   * @access  Public
   *
   * Response:
   * - 200 OK: run summary, including the report reference once uploaded
   * - 404 Not Found: unknown or expired run
   */
  router.get(
    '/runs/:runId',
    validateRequest({ params: commonSchemas.runId }),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const summary = await timesheetSync.getRun(req.params.runId);
      sendSuccess(res, summary);
    })
  );

  return router;
};

export default createReconciliationRouter;
