/**
 * Invoice API Routes
 *
 * Dashboard endpoints for invoices produced by the document-intake pipeline.
 *
 * Endpoints:
 * - GET / - Dashboard rows and metrics
 * - GET /:id - Single invoice
 * - PATCH /:id (or POST /:id/update) - Save dashboard edits
 * - POST /:id/approve - Set status and approver
 * - DELETE /:id - Remove an invoice
 */

import { Router, Request, Response, RequestHandler } from 'express';
import { z } from 'zod';
import { commonSchemas, validateRequest } from '../middlewares';
import type { InvoiceService } from '../services';
import { asyncHandler, sendSuccess } from '../utils';

// ============================================
// Validation
// ============================================

const listQuerySchema = z.object({
  vendorId: z.string().trim().min(1).max(64).optional(),
});

const approveBodySchema = z
  .object({
    status: z.string().trim().min(1).max(50).optional(),
    notes: z.string().max(4000).optional(),
    approvedBy: z.string().trim().min(1).max(255).optional(),
  })
  .default({});

// The dashboard sends "" for a cleared input
const blankToNull = (value: unknown): unknown => (value === '' ? null : value);

const editableText = (max: number) => z.preprocess(blankToNull, z.string().trim().max(max).nullable()).optional();

const editableAmount = z.preprocess(blankToNull, z.coerce.number().finite().nonnegative().nullable()).optional();

const editableDate = z
  .preprocess(blankToNull, z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date').nullable())
  .optional();

const editBodySchema = z.object({
  invoice_number: editableText(100),
  consultancy_name: editableText(255),
  resource_name: editableText(255),
  pay_period_start: editableDate,
  pay_period_end: editableDate,
  net_terms: editableText(100),
  vendor_hours: editableAmount,
  approved_hours: editableAmount,
  pay_rate: editableAmount,
  invoice_amount: editableAmount,
  invoice_date: editableDate,
  due_date: editableDate,
  project_name: editableText(255),
  business_unit: editableText(255),
  template: editableText(100),
  current_comments: editableText(4000),
  addl_comments: editableText(4000),
});

// ============================================
// Routes
// ============================================

export const createInvoicesRouter = (invoices: InvoiceService): Router => {
  const router = Router();

  /**
   * @route   GET /api/invoices
   * @desc    Invoice rows shaped for the dashboard, plus summary metrics
   * @access  Public
   *
   * Query params:
   * - vendorId: string (optional) - only this vendor's invoices
   */
  router.get(
    '/',
    validateRequest({ query: listQuerySchema }),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const { vendorId } = listQuerySchema.parse(req.query);
      const dashboard = await invoices.getDashboard(vendorId);
      sendSuccess(res, dashboard);
    })
  );

  /**
   * @route   GET /api/invoices/:id
   * @desc    Get invoice by ID
   * @access  Public
   */
  router.get(
    '/:id',
    validateRequest({ params: commonSchemas.invoiceId }),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const invoice = await invoices.getInvoice(req.params.id);
      sendSuccess(res, invoice);
    })
  );

  const saveEdits: RequestHandler[] = [
    validateRequest({ params: commonSchemas.invoiceId, body: editBodySchema }),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const body = editBodySchema.parse(req.body);
      const invoice = await invoices.updateInvoice(req.params.id, body);
      sendSuccess(res, invoice, 'Invoice updated');
    }),
  ];

  /**
   * @route   PATCH /api/invoices/:id
   * @desc    Save dashboard edits; only the fields sent are changed
   * @access  Public
   *
   * Body: any of invoice_number, consultancy_name, resource_name,
   * pay_period_start, pay_period_end, net_terms, vendor_hours, approved_hours,
   * pay_rate, invoice_amount, invoice_date, due_date, project_name,
   * business_unit, template, current_comments, addl_comments ("" clears)
   */
  router.patch('/:id', ...saveEdits);

  /**
   * @route   POST /api/invoices/:id/update
   * @desc    Same as PATCH /:id, for clients that only send POST
   * @access  Public
   */
  router.post('/:id/update', ...saveEdits);

  /**
   * @route   POST /api/invoices/:id/approve
   * @desc    Approve (or set another status on) an invoice
   * @access  Public
   *
   * Body: { status?: string = "Approved", notes?: string, approvedBy?: string = "system" }
   */
  router.post(
    '/:id/approve',
    validateRequest({ params: commonSchemas.invoiceId, body: approveBodySchema }),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const body = approveBodySchema.parse(req.body);
      const invoice = await invoices.approveInvoice(req.params.id, body);
      sendSuccess(res, invoice, `Invoice status set to ${invoice.status}`);
    })
  );

  /**
   * @route   DELETE /api/invoices/:id
   * @desc    Delete an invoice
   * @access  Public
   */
  router.delete(
    '/:id',
    validateRequest({ params: commonSchemas.invoiceId }),
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      await invoices.deleteInvoice(req.params.id);
      sendSuccess(res, { invoice_id: req.params.id, deleted: true }, 'Invoice deleted');
    })
  );

  return router;
};

export default createInvoicesRouter;
