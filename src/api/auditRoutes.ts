import { Router } from 'express';
import type { AuditRepository } from '../infra/repositories/AuditRepository.js';
import type { AuditEntry } from '../domain/entities/AuditEntry.js';
import type { Request, Response, NextFunction } from 'express';

function mapEntry(entry: AuditEntry) {
  return {
    id: entry.id,
    eventType: entry.eventType,
    entityType: entry.entityType,
    entityId: entry.entityId,
    metadata: entry.metadata,
    timestamp: entry.timestamp.toISOString(),
  };
}

/**
 * Audit route handler
 */
export function createAuditRouter(auditRepo: AuditRepository): Router {
  const router = Router();

  /**
   * GET /api/audit?limit=n - most recent events first
   */
  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const limit = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) : 100;
      const events = auditRepo.getRecent(Number.isFinite(limit) && limit > 0 ? limit : 100);
      res.json({ events: events.map(mapEntry) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/audit/:entityType/:entityId
   */
  router.get('/:entityType/:entityId', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { entityType, entityId } = req.params;
      res.json({ events: auditRepo.getByEntity(entityType, entityId).map(mapEntry) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
