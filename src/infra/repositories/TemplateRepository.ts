import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { RecurringTemplate } from '../../domain/entities/RecurringTemplate.js';
import type { Category, TemplateKind } from '../../domain/entities/Transaction.js';
import { NotFoundError } from '../../domain/errors.js';
import { logger } from '../logger.js';

interface TemplateRow {
  id: number;
  name: string;
  amount: number;
  due_day: number;
  category: Category;
  subcategory: string | null;
  bank_account_id: number | null;
  series_id: number | null;
  active: number;
  created_at: string;
}

const TABLES: Record<TemplateKind, string> = {
  fixed_expense: 'fixed_expenses',
  income_source: 'income_sources',
};

export type NewTemplate = Pick<
  RecurringTemplate,
  'name' | 'amount' | 'dueDay' | 'category' | 'subcategory' | 'bankAccountId'
>;

/**
 * Repository for FixedExpense and IncomeSource templates, one table per kind
 */
export class TemplateRepository {
  constructor(private db: DatabaseAdapter) {}

  list(kind: TemplateKind, includeInactive = false): RecurringTemplate[] {
    const rows = this.db.query<TemplateRow>(
      `SELECT * FROM ${TABLES[kind]} ${includeInactive ? '' : 'WHERE active = 1'} ORDER BY due_day, name, id`
    );
    return rows.map((row) => this.mapRow(kind, row));
  }

  listAllActive(): RecurringTemplate[] {
    return [...this.list('fixed_expense'), ...this.list('income_source')];
  }

  findById(kind: TemplateKind, id: number): RecurringTemplate | null {
    const row = this.db.queryOne<TemplateRow>(`SELECT * FROM ${TABLES[kind]} WHERE id = ?`, [id]);
    return row ? this.mapRow(kind, row) : null;
  }

  /**
   * Deactivates the active template with the same name and subcategory, then inserts
   * the new version into the same series. A name and subcategory seen before, active or
   * not, continues its series. Callers run this inside a transaction.
   */
  replace(kind: TemplateKind, template: NewTemplate): { created: RecurringTemplate; replacedIds: number[] } {
    const table = TABLES[kind];
    const sameName = `name = ? AND COALESCE(subcategory, '') = COALESCE(?, '')`;
    const previous = this.db.query<{ id: number }>(
      `SELECT id FROM ${table} WHERE ${sameName} AND active = 1`,
      [template.name, template.subcategory]
    );
    const latest = this.db.queryOne<{ id: number; series_id: number | null }>(
      `SELECT id, series_id FROM ${table} WHERE ${sameName} ORDER BY id DESC LIMIT 1`,
      [template.name, template.subcategory]
    );
    this.db.execute(`UPDATE ${table} SET active = 0 WHERE ${sameName} AND active = 1`, [
      template.name,
      template.subcategory,
    ]);

    const { lastInsertRowid } = this.db.execute(
      `
      INSERT INTO ${table} (name, amount, due_day, category, subcategory, bank_account_id)
      VALUES (?, ?, ?, ?, ?, ?)
      `,
      [
        template.name,
        template.amount,
        template.dueDay,
        template.category,
        template.subcategory,
        template.bankAccountId,
      ]
    );
    const seriesId = latest ? (latest.series_id ?? latest.id) : lastInsertRowid;
    this.db.execute(`UPDATE ${table} SET series_id = ? WHERE id = ?`, [seriesId, lastInsertRowid]);

    const created = this.findById(kind, lastInsertRowid);
    if (!created) {
      throw new NotFoundError(kind, lastInsertRowid);
    }
    logger.debug('Recurring template saved', {
      kind,
      id: created.id,
      seriesId: created.seriesId,
      name: created.name,
    });
    return { created, replacedIds: previous.map((row) => row.id) };
  }

  deactivate(kind: TemplateKind, id: number): void {
    const { changes } = this.db.execute(`UPDATE ${TABLES[kind]} SET active = 0 WHERE id = ?`, [id]);
    if (changes === 0) {
      throw new NotFoundError(kind, id);
    }
  }

  private mapRow(kind: TemplateKind, row: TemplateRow): RecurringTemplate {
    return {
      kind,
      id: row.id,
      name: row.name,
      amount: row.amount,
      dueDay: row.due_day,
      category: row.category,
      subcategory: row.subcategory,
      bankAccountId: row.bank_account_id,
      seriesId: row.series_id ?? row.id,
      active: row.active === 1,
      createdAt: row.created_at,
    };
  }
}
