import { Router } from 'express';
import { createMonthRouter } from './monthRoutes.js';
import { createTransactionRouter } from './transactionRoutes.js';
import { createAccountRouter } from './accountRoutes.js';
import { createCardRouter } from './cardRoutes.js';
import { createObjectiveRouter } from './objectiveRoutes.js';
import { createTemplateRouter } from './templateRoutes.js';
import { createAuditRouter } from './auditRoutes.js';
import type { LedgerService } from '../services/LedgerService.js';
import type { MasterDataService } from '../services/MasterDataService.js';
import type { MonthCloseService } from '../services/MonthCloseService.js';
import type { MonthReportService } from '../services/MonthReportService.js';
import type { ObjectiveService } from '../services/ObjectiveService.js';
import type { RecurrenceService } from '../services/RecurrenceService.js';
import type { TemplateService } from '../services/TemplateService.js';
import type { AuditRepository } from '../infra/repositories/AuditRepository.js';

export interface ApiDependencies {
  ledgerService: LedgerService;
  masterDataService: MasterDataService;
  monthCloseService: MonthCloseService;
  monthReportService: MonthReportService;
  objectiveService: ObjectiveService;
  recurrenceService: RecurrenceService;
  templateService: TemplateService;
  auditRepo: AuditRepository;
}

/**
 * Main API router - composes all route handlers
 */
export function createApiRouter(deps: ApiDependencies): Router {
  const router = Router();

  router.use('/months', createMonthRouter(deps));
  router.use('/transactions', createTransactionRouter(deps));
  router.use('/accounts', createAccountRouter(deps.masterDataService));
  router.use('/cards', createCardRouter(deps.masterDataService));
  router.use('/objectives', createObjectiveRouter(deps.objectiveService));
  router.use('/templates', createTemplateRouter(deps.templateService));
  router.use('/audit', createAuditRouter(deps.auditRepo));

  return router;
}
