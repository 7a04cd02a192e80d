import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { BudgetObjective } from '../../domain/entities/BudgetObjective.js';
import type { Category } from '../../domain/entities/Transaction.js';
import { NotFoundError } from '../../domain/errors.js';
import { logger } from '../logger.js';

interface ObjectiveRow {
  id: number;
  category: Category;
  subcategory: string | null;
  percentage: number;
  active: number;
  created_at: string;
  deactivated_at: string | null;
}

/**
 * Repository for BudgetObjective history. Only one row per (category, subcategory) can
 * be active; the partial unique index enforces it.
 */
export class BudgetObjectiveRepository {
  constructor(private db: DatabaseAdapter) {}

  insert(objective: Pick<BudgetObjective, 'category' | 'subcategory' | 'percentage'>): BudgetObjective {
    const { lastInsertRowid } = this.db.execute(
      `
      INSERT INTO budget_objectives (category, subcategory, percentage, active, created_at)
      VALUES (?, ?, ?, 1, ?)
      `,
      [objective.category, objective.subcategory, objective.percentage, new Date().toISOString()]
    );
    logger.debug('Budget objective saved', { id: lastInsertRowid, category: objective.category });
    return this.getById(lastInsertRowid);
  }

  findById(id: number): BudgetObjective | null {
    const row = this.db.queryOne<ObjectiveRow>('SELECT * FROM budget_objectives WHERE id = ?', [id]);
    return row ? this.mapRow(row) : null;
  }

  getById(id: number): BudgetObjective {
    const objective = this.findById(id);
    if (!objective) {
      throw new NotFoundError('BudgetObjective', id);
    }
    return objective;
  }

  findActive(category: Category, subcategory: string | null): BudgetObjective | null {
    const row = this.db.queryOne<ObjectiveRow>(
      `
      SELECT * FROM budget_objectives
      WHERE category = ? AND COALESCE(subcategory, '') = COALESCE(?, '') AND active = 1
      `,
      [category, subcategory]
    );
    return row ? this.mapRow(row) : null;
  }

  listActive(): BudgetObjective[] {
    const rows = this.db.query<ObjectiveRow>(
      `SELECT * FROM budget_objectives WHERE active = 1 ORDER BY category, COALESCE(subcategory, ''), id`
    );
    return rows.map((row) => this.mapRow(row));
  }

  listAll(): BudgetObjective[] {
    const rows = this.db.query<ObjectiveRow>('SELECT * FROM budget_objectives ORDER BY id');
    return rows.map((row) => this.mapRow(row));
  }

  deactivate(id: number): BudgetObjective {
    this.db.execute(
      'UPDATE budget_objectives SET active = 0, deactivated_at = ? WHERE id = ? AND active = 1',
      [new Date().toISOString(), id]
    );
    return this.getById(id);
  }

  private mapRow(row: ObjectiveRow): BudgetObjective {
    return {
      id: row.id,
      category: row.category,
      subcategory: row.subcategory,
      percentage: row.percentage,
      active: row.active === 1,
      createdAt: row.created_at,
      deactivatedAt: row.deactivated_at,
    };
  }
}
