import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { MasterDataService } from '../services/MasterDataService.js';
import { monthKeySchema, parseBody, parseIdParam } from './validation.js';

const createAccountSchema = z.object({
  name: z.string().min(1),
  openingBalance: z.number().finite().optional(),
  effectiveFrom: monthKeySchema,
  effectiveTo: monthKeySchema.nullish(),
});

const deactivateSchema = z.object({
  effectiveTo: monthKeySchema.optional(),
});

/**
 * Bank account route handler
 */
export function createAccountRouter(masterData: MasterDataService): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ accounts: masterData.listBankAccounts() });
    } catch (error) {
      next(error);
    }
  });

  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(createAccountSchema, req.body, 'Invalid bank account payload');
      res.status(201).json({ account: masterData.createBankAccount(body) });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/activate', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ account: masterData.activateBankAccount(parseIdParam(req.params.id)) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/accounts/:id/deactivate - retire from `effectiveTo` (default: current month)
   */
  router.post('/:id/deactivate', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(deactivateSchema, req.body ?? {}, 'Invalid deactivation payload');
      res.json({
        account: masterData.deactivateBankAccount(parseIdParam(req.params.id), body.effectiveTo),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
