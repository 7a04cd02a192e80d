import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { LedgerService } from '../services/LedgerService.js';
import type { ObjectiveService } from '../services/ObjectiveService.js';
import { CATEGORIES } from '../domain/entities/Transaction.js';
import { instrumentSchema, isoDateSchema, monthKeySchema, parseBody } from './validation.js';

const transactionSchema = z.object({
  date: isoDateSchema,
  month: monthKeySchema.optional(),
  amount: z.number().finite().positive(),
  category: z.string().min(1),
  subcategory: z.string().nullish(),
  instrument: instrumentSchema.default({ kind: 'cash' }),
  note: z.string().nullish(),
});

const correctionSchema = transactionSchema.extend({
  amount: z.number().finite().refine((value) => value !== 0, 'Amount must be non-zero'),
  note: z.string().min(1),
});

const impactSchema = z.object({
  month: monthKeySchema,
  category: z.enum(CATEGORIES),
  subcategory: z.string().nullish(),
  amount: z.number().finite().positive(),
});

/**
 * Transaction route handler
 */
export function createTransactionRouter(deps: {
  ledgerService: LedgerService;
  objectiveService: ObjectiveService;
}): Router {
  const router = Router();

  /**
   * POST /api/transactions - record a normal transaction
   */
  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(transactionSchema, req.body, 'Invalid transaction payload');
      const result = deps.ledgerService.record(body);
      res.status(201).json(result);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/transactions/corrections - append a correction, closed months included
   */
  router.post('/corrections', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(correctionSchema, req.body, 'Invalid correction payload');
      const transaction = deps.ledgerService.recordCorrection(body);
      res.status(201).json({ transaction });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/transactions/objective-impact - what an expense would do to the objectives
   */
  router.post('/objective-impact', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(impactSchema, req.body, 'Invalid objective impact payload');
      const impacts = deps.objectiveService.checkImpact(body.month, {
        category: body.category,
        subcategory: body.subcategory?.trim() || null,
        amount: body.amount,
      });
      res.json({ impacts });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
