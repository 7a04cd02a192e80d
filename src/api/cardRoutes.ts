import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { MasterDataService } from '../services/MasterDataService.js';
import { monthKeySchema, parseBody, parseIdParam } from './validation.js';

const createCardSchema = z.object({
  name: z.string().min(1),
  bankAccountId: z.number().int().positive(),
  statementCloseDay: z.number().nullish(),
  dueDay: z.number().nullish(),
  effectiveFrom: monthKeySchema,
  effectiveTo: monthKeySchema.nullish(),
});

const cycleSchema = z.object({
  statementCloseDay: z.number().nullable(),
  dueDay: z.number().nullable(),
});

const deactivateSchema = z.object({
  effectiveTo: monthKeySchema.optional(),
});

/**
 * Credit card route handler. Cycle days are range-checked by the service so that bad
 * cycles report INVALID_CYCLE_CONFIG.
 */
export function createCardRouter(masterData: MasterDataService): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ cards: masterData.listCreditCards() });
    } catch (error) {
      next(error);
    }
  });

  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(createCardSchema, req.body, 'Invalid credit card payload');
      res.status(201).json({ card: masterData.createCreditCard(body) });
    } catch (error) {
      next(error);
    }
  });

  router.put('/:id/cycle', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(cycleSchema, req.body, 'Invalid card cycle payload');
      res.json({
        card: masterData.updateCreditCardCycle(
          parseIdParam(req.params.id),
          body.statementCloseDay,
          body.dueDay
        ),
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/activate', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ card: masterData.activateCreditCard(parseIdParam(req.params.id)) });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/deactivate', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(deactivateSchema, req.body ?? {}, 'Invalid deactivation payload');
      res.json({
        card: masterData.deactivateCreditCard(parseIdParam(req.params.id), body.effectiveTo),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
