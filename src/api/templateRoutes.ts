import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { TemplateService } from '../services/TemplateService.js';
import type { TemplateKind } from '../domain/entities/Transaction.js';
import { CATEGORIES } from '../domain/entities/Transaction.js';
import { ValidationError } from '../domain/errors.js';
import { parseBody, parseIdParam } from './validation.js';

const PATHS = new Map<string, TemplateKind>([
  ['fixed-expenses', 'fixed_expense'],
  ['income-sources', 'income_source'],
]);

const templateSchema = z.object({
  name: z.string().min(1),
  amount: z.number().finite(),
  dueDay: z.number(),
  category: z.enum(CATEGORIES).optional(),
  subcategory: z.string().nullish(),
  bankAccountId: z.number().int().positive().nullish(),
});

function parseKind(value: string): TemplateKind {
  const kind = PATHS.get(value);
  if (kind === undefined) {
    throw new ValidationError(`Unknown template kind "${value}"`, { allowed: [...PATHS.keys()] });
  }
  return kind;
}

/**
 * Recurring template route handler (`fixed-expenses`, `income-sources`)
 */
export function createTemplateRouter(templateService: TemplateService): Router {
  const router = Router();

  /**
   * GET /api/templates/:kind?includeInactive=true
   */
  router.get('/:kind', (req: Request, res: Response, next: NextFunction) => {
    try {
      const templates = templateService.list(
        parseKind(req.params.kind),
        req.query.includeInactive === 'true'
      );
      res.json({ templates });
    } catch (error) {
      next(error);
    }
  });

  /**
   * PUT /api/templates/:kind - upsert by name and subcategory
   */
  router.put('/:kind', (req: Request, res: Response, next: NextFunction) => {
    try {
      const kind = parseKind(req.params.kind);
      const body = parseBody(templateSchema, req.body, 'Invalid template payload');
      const template = templateService.replace(kind, {
        name: body.name,
        amount: body.amount,
        dueDay: body.dueDay,
        category: body.category,
        subcategory: body.subcategory ?? null,
        bankAccountId: body.bankAccountId ?? null,
      });
      res.json({ template });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:kind/:id/deactivate', (req: Request, res: Response, next: NextFunction) => {
    try {
      const template = templateService.deactivate(
        parseKind(req.params.kind),
        parseIdParam(req.params.id)
      );
      res.json({ template });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
