import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { ObjectiveService } from '../services/ObjectiveService.js';
import { parseBody, parseIdParam } from './validation.js';

const objectiveSchema = z.object({
  category: z.string().min(1),
  subcategory: z.string().nullish(),
  percentage: z.number().finite(),
});

/**
 * Budget objective route handler
 */
export function createObjectiveRouter(objectiveService: ObjectiveService): Router {
  const router = Router();

  /**
   * GET /api/objectives?history=true
   */
  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const objectives =
        req.query.history === 'true' ? objectiveService.listHistory() : objectiveService.listActive();
      res.json({ objectives });
    } catch (error) {
      next(error);
    }
  });

  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(objectiveSchema, req.body, 'Invalid objective payload');
      res.status(201).json({ objective: objectiveService.createObjective(body) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * PUT /api/objectives - replace the active objective of a category/subcategory
   */
  router.put('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(objectiveSchema, req.body, 'Invalid objective payload');
      res.json(objectiveService.replaceObjective(body));
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/deactivate', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ objective: objectiveService.deactivateObjective(parseIdParam(req.params.id)) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
