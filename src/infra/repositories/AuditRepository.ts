import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type {
  AuditEntityType,
  AuditEntry,
  AuditEventType,
} from '../../domain/entities/AuditEntry.js';
import { createAuditEntry } from '../../domain/entities/AuditEntry.js';
import { logger } from '../logger.js';

interface AuditRow {
  id: number;
  event_type: AuditEventType;
  entity_type: AuditEntityType;
  entity_id: string;
  metadata: string | null;
  timestamp: string;
}

/**
 * Repository for AuditEntry persistence
 */
export class AuditRepository {
  constructor(private db: DatabaseAdapter) {}

  /**
   * Log an audit event. Runs inside the caller's transaction when there is one.
   */
  log(params: {
    eventType: AuditEventType;
    entityType: AuditEntityType;
    entityId: string | number;
    metadata?: Record<string, unknown>;
  }): void {
    const entry = createAuditEntry(params);

    this.db.execute(
      `
      INSERT INTO audit_log (event_type, entity_type, entity_id, metadata, timestamp)
      VALUES (?, ?, ?, ?, ?)
      `,
      [
        entry.eventType,
        entry.entityType,
        entry.entityId,
        entry.metadata ? JSON.stringify(entry.metadata) : null,
        new Date().toISOString(),
      ]
    );

    logger.debug('Audit event logged', {
      eventType: entry.eventType,
      entityType: entry.entityType,
      entityId: entry.entityId,
    });
  }

  /**
   * Get recent audit events
   */
  getRecent(limit = 100): AuditEntry[] {
    const rows = this.db.query<AuditRow>(
      'SELECT * FROM audit_log ORDER BY timestamp DESC, id DESC LIMIT ?',
      [limit]
    );
    return rows.map((row) => this.mapRowToAuditEntry(row));
  }

  /**
   * Get audit events for a specific entity
   */
  getByEntity(entityType: string, entityId: string): AuditEntry[] {
    const rows = this.db.query<AuditRow>(
      `
      SELECT * FROM audit_log
      WHERE entity_type = ? AND entity_id = ?
      ORDER BY timestamp DESC, id DESC
      `,
      [entityType, entityId]
    );
    return rows.map((row) => this.mapRowToAuditEntry(row));
  }

  private mapRowToAuditEntry(row: AuditRow): AuditEntry {
    return {
      id: row.id,
      eventType: row.event_type,
      entityType: row.entity_type,
      entityId: row.entity_id,
      metadata: row.metadata ? JSON.parse(row.metadata) : null,
      timestamp: new Date(row.timestamp),
    };
  }
}
