/**
 * AuditEntry entity - immutable audit log record
 * Records what happened, when, and to which ledger entity
 */
export interface AuditEntry {
  id: number; // Auto-increment from SQLite
  eventType: AuditEventType;
  entityType: AuditEntityType;
  entityId: string;
  metadata: Record<string, unknown> | null;
  timestamp: Date;
}

export type AuditEntityType =
  | 'Month'
  | 'Transaction'
  | 'BankAccount'
  | 'CreditCard'
  | 'BudgetObjective'
  | 'RecurringTemplate';

export type AuditEventType =
  | 'month_opened'
  | 'month_closed'
  | 'transaction_recorded'
  | 'correction_recorded'
  | 'recurrences_expanded'
  | 'account_created'
  | 'account_activated'
  | 'account_deactivated'
  | 'card_created'
  | 'card_cycle_updated'
  | 'card_activated'
  | 'card_deactivated'
  | 'objective_created'
  | 'objective_replaced'
  | 'objective_deactivated'
  | 'template_replaced'
  | 'template_deactivated';

/**
 * Factory function to create a new AuditEntry
 */
export function createAuditEntry(params: {
  eventType: AuditEventType;
  entityType: AuditEntityType;
  entityId: string | number;
  metadata?: Record<string, unknown>;
}): Omit<AuditEntry, 'id' | 'timestamp'> {
  return {
    eventType: params.eventType,
    entityType: params.entityType,
    entityId: String(params.entityId),
    metadata: params.metadata || null,
  };
}
