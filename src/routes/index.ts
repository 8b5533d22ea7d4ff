import { Router } from 'express';
import type { AppServices } from '../services';
import { createHealthRouter } from './health.routes';
import { createReconciliationRouter } from './reconciliation.routes';
import { createInvoicesRouter } from './invoices.routes';

export const createRoutes = (services: AppServices): Router => {
  const router = Router();

  // Health check routes
  router.use('/health', createHealthRouter(services.health));

  // Timesheet sync routes (upload + run lookup)
  router.use('/reconciliation', createReconciliationRouter(services.timesheetSync));

  // Invoice dashboard routes
  router.use('/invoices', createInvoicesRouter(services.invoices));

  return router;
};

export default createRoutes;
