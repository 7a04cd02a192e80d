import express from 'express';
import cors from 'cors';
import type { Express, Request, Response, NextFunction } from 'express';
import type { DatabaseAdapter } from './infra/DatabaseAdapter.js';
import type { Env } from './infra/env.js';
import { logger } from './infra/logger.js';
import { MonthRepository } from './infra/repositories/MonthRepository.js';
import { BankAccountRepository } from './infra/repositories/BankAccountRepository.js';
import { CreditCardRepository } from './infra/repositories/CreditCardRepository.js';
import { AccountBalanceRepository } from './infra/repositories/AccountBalanceRepository.js';
import { TransactionRepository } from './infra/repositories/TransactionRepository.js';
import { BudgetObjectiveRepository } from './infra/repositories/BudgetObjectiveRepository.js';
import { TemplateRepository } from './infra/repositories/TemplateRepository.js';
import { AuditRepository } from './infra/repositories/AuditRepository.js';
import { LedgerService } from './services/LedgerService.js';
import { MasterDataService } from './services/MasterDataService.js';
import { MonthCloseService } from './services/MonthCloseService.js';
import { MonthReportService } from './services/MonthReportService.js';
import { ObjectiveService } from './services/ObjectiveService.js';
import { RecurrenceService } from './services/RecurrenceService.js';
import { TemplateService } from './services/TemplateService.js';
import { createApiRouter, type ApiDependencies } from './api/index.js';
import { createErrorHandler, notFoundHandler } from './api/errorHandler.js';
import { createRateLimiter } from './api/rateLimiter.js';

export type LedgerConfig = Pick<Env, 'CLOSE_POLICY' | 'RECURRENCE_AUTO_EXPAND'>;

/**
 * Wires repositories and services over one database
 */
export function createLedger(db: DatabaseAdapter, config: LedgerConfig): ApiDependencies {
  const monthRepo = new MonthRepository(db);
  const accountRepo = new BankAccountRepository(db);
  const cardRepo = new CreditCardRepository(db);
  const balanceRepo = new AccountBalanceRepository(db);
  const transactionRepo = new TransactionRepository(db);
  const objectiveRepo = new BudgetObjectiveRepository(db);
  const templateRepo = new TemplateRepository(db);
  const auditRepo = new AuditRepository(db);

  const objectiveService = new ObjectiveService(db, objectiveRepo, monthRepo, transactionRepo, auditRepo);
  const ledgerService = new LedgerService(
    db,
    monthRepo,
    accountRepo,
    cardRepo,
    balanceRepo,
    transactionRepo,
    auditRepo,
    objectiveService
  );
  const recurrenceService = new RecurrenceService(
    db,
    monthRepo,
    accountRepo,
    templateRepo,
    transactionRepo,
    auditRepo,
    ledgerService
  );

  return {
    ledgerService,
    objectiveService,
    recurrenceService,
    masterDataService: new MasterDataService(
      db,
      monthRepo,
      accountRepo,
      cardRepo,
      balanceRepo,
      transactionRepo,
      auditRepo
    ),
    monthCloseService: new MonthCloseService(
      db,
      monthRepo,
      accountRepo,
      balanceRepo,
      transactionRepo,
      auditRepo,
      recurrenceService,
      { closePolicy: config.CLOSE_POLICY, autoExpand: config.RECURRENCE_AUTO_EXPAND }
    ),
    monthReportService: new MonthReportService(monthRepo, accountRepo, balanceRepo, transactionRepo),
    templateService: new TemplateService(db, templateRepo, accountRepo, auditRepo),
    auditRepo,
  };
}

/**
 * Express application: middleware, health check, API routes and error handling
 */
export function createApp(
  db: DatabaseAdapter,
  deps: ApiDependencies,
  env: Pick<Env, 'NODE_ENV' | 'RATE_LIMIT_WINDOW_MS' | 'RATE_LIMIT_MAX_REQUESTS'>
): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.info('Incoming request', {
      method: req.method,
      path: req.path,
      ip: req.ip,
    });
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    try {
      db.queryOne('SELECT 1 AS ok');
      res.json({ status: 'ok', timestamp: new Date().toISOString() });
    } catch (error) {
      logger.error('Health check failed', { error });
      res.status(503).json({ status: 'unavailable' });
    }
  });

  app.use('/api', createRateLimiter(env), createApiRouter(deps));

  app.use(notFoundHandler);
  app.use(createErrorHandler(env));

  return app;
}
