import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { CardCycle, CreditCard } from '../../domain/entities/CreditCard.js';
import type { MonthKey } from '../../domain/monthKey.js';
import { NotFoundError } from '../../domain/errors.js';
import { logger } from '../logger.js';

interface CreditCardRow {
  id: number;
  name: string;
  bank_account_id: number;
  statement_close_day: number | null;
  due_day: number | null;
  active: number;
  effective_from_month_id: string;
  effective_to_month_id: string | null;
  created_at: string;
}

export type NewCreditCard = Pick<
  CreditCard,
  'name' | 'bankAccountId' | 'cycle' | 'active' | 'effectiveFrom' | 'effectiveTo'
>;

/**
 * Repository for CreditCard master data. Rows are never deleted.
 */
export class CreditCardRepository {
  constructor(private db: DatabaseAdapter) {}

  create(card: NewCreditCard): CreditCard {
    const { lastInsertRowid } = this.db.execute(
      `
      INSERT INTO credit_cards (
        name, bank_account_id, statement_close_day, due_day, active,
        effective_from_month_id, effective_to_month_id
      ) VALUES (?, ?, ?, ?, ?, ?, ?)
      `,
      [
        card.name,
        card.bankAccountId,
        card.cycle?.statementCloseDay ?? null,
        card.cycle?.dueDay ?? null,
        card.active ? 1 : 0,
        card.effectiveFrom,
        card.effectiveTo,
      ]
    );
    logger.debug('Credit card saved', { id: lastInsertRowid, name: card.name });
    return this.getById(lastInsertRowid);
  }

  findById(id: number): CreditCard | null {
    const row = this.db.queryOne<CreditCardRow>('SELECT * FROM credit_cards WHERE id = ?', [id]);
    return row ? this.mapRow(row) : null;
  }

  getById(id: number): CreditCard {
    const card = this.findById(id);
    if (!card) {
      throw new NotFoundError('CreditCard', id);
    }
    return card;
  }

  list(): CreditCard[] {
    const rows = this.db.query<CreditCardRow>('SELECT * FROM credit_cards ORDER BY name, id');
    return rows.map((row) => this.mapRow(row));
  }

  setCycle(id: number, cycle: CardCycle | null): CreditCard {
    this.db.execute('UPDATE credit_cards SET statement_close_day = ?, due_day = ? WHERE id = ?', [
      cycle?.statementCloseDay ?? null,
      cycle?.dueDay ?? null,
      id,
    ]);
    return this.getById(id);
  }

  setEffectiveTo(id: number, effectiveTo: MonthKey | null): CreditCard {
    this.db.execute('UPDATE credit_cards SET effective_to_month_id = ? WHERE id = ?', [effectiveTo, id]);
    return this.getById(id);
  }

  setActive(id: number, active: boolean): CreditCard {
    this.db.execute('UPDATE credit_cards SET active = ? WHERE id = ?', [active ? 1 : 0, id]);
    return this.getById(id);
  }

  private mapRow(row: CreditCardRow): CreditCard {
    return {
      id: row.id,
      name: row.name,
      bankAccountId: row.bank_account_id,
      cycle:
        row.statement_close_day !== null && row.due_day !== null
          ? { statementCloseDay: row.statement_close_day, dueDay: row.due_day }
          : null,
      active: row.active === 1,
      effectiveFrom: row.effective_from_month_id,
      effectiveTo: row.effective_to_month_id,
      createdAt: row.created_at,
    };
  }
}
