import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { MonthCloseService } from '../services/MonthCloseService.js';
import type { MonthReportService } from '../services/MonthReportService.js';
import type { RecurrenceService } from '../services/RecurrenceService.js';
import type { ObjectiveService } from '../services/ObjectiveService.js';
import { monthKeySchema, parseBody, parseMonthParam } from './validation.js';

const openMonthSchema = z.object({
  month: monthKeySchema,
  startingBalances: z
    .record(z.string().regex(/^\d+$/), z.number().finite())
    .optional(),
});

/**
 * Month route handler: lifecycle, detail and per-month views
 */
export function createMonthRouter(deps: {
  monthCloseService: MonthCloseService;
  monthReportService: MonthReportService;
  recurrenceService: RecurrenceService;
  objectiveService: ObjectiveService;
}): Router {
  const router = Router();

  /**
   * GET /api/months
   */
  router.get('/', (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ months: deps.monthCloseService.listMonths() });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/months/current - the most recent open month
   */
  router.get('/current', (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ month: deps.monthCloseService.currentMonth() });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/months - open the first month of the ledger
   */
  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(openMonthSchema, req.body, 'Invalid month payload');
      const startingBalances = Object.fromEntries(
        Object.entries(body.startingBalances ?? {}).map(([id, balance]) => [Number(id), balance])
      );
      const result = deps.monthCloseService.openInitialMonth(body.month, startingBalances);
      res.status(201).json(result);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/months/:month - balances, transactions and reports
   */
  router.get('/:month', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(deps.monthReportService.getMonthDetail(parseMonthParam(req.params.month)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/months/:month/close
   */
  router.post('/:month/close', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(deps.monthCloseService.close(parseMonthParam(req.params.month)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/months/:month/recurrences/preview
   */
  router.get('/:month/recurrences/preview', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(deps.recurrenceService.preview(parseMonthParam(req.params.month)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/months/:month/recurrences/expand
   */
  router.post('/:month/recurrences/expand', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(deps.recurrenceService.expandMonth(parseMonthParam(req.params.month)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/months/:month/objectives - objective evaluation
   */
  router.get('/:month/objectives', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(deps.objectiveService.evaluate(parseMonthParam(req.params.month)));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
