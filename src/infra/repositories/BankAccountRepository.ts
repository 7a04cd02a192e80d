import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { BankAccount } from '../../domain/entities/BankAccount.js';
import type { MonthKey } from '../../domain/monthKey.js';
import { NotFoundError } from '../../domain/errors.js';
import { logger } from '../logger.js';

interface BankAccountRow {
  id: number;
  name: string;
  active: number;
  opening_balance: number;
  effective_from_month_id: string;
  effective_to_month_id: string | null;
  created_at: string;
}

export type NewBankAccount = Pick<
  BankAccount,
  'name' | 'active' | 'openingBalance' | 'effectiveFrom' | 'effectiveTo'
>;

/**
 * Repository for BankAccount master data. Rows are never deleted.
 */
export class BankAccountRepository {
  constructor(private db: DatabaseAdapter) {}

  create(account: NewBankAccount): BankAccount {
    const { lastInsertRowid } = this.db.execute(
      `
      INSERT INTO bank_accounts (name, active, opening_balance, effective_from_month_id, effective_to_month_id)
      VALUES (?, ?, ?, ?, ?)
      `,
      [
        account.name,
        account.active ? 1 : 0,
        account.openingBalance,
        account.effectiveFrom,
        account.effectiveTo,
      ]
    );
    logger.debug('Bank account saved', { id: lastInsertRowid, name: account.name });
    return this.getById(lastInsertRowid);
  }

  findById(id: number): BankAccount | null {
    const row = this.db.queryOne<BankAccountRow>('SELECT * FROM bank_accounts WHERE id = ?', [id]);
    return row ? this.mapRow(row) : null;
  }

  getById(id: number): BankAccount {
    const account = this.findById(id);
    if (!account) {
      throw new NotFoundError('BankAccount', id);
    }
    return account;
  }

  list(): BankAccount[] {
    const rows = this.db.query<BankAccountRow>('SELECT * FROM bank_accounts ORDER BY name, id');
    return rows.map((row) => this.mapRow(row));
  }

  /**
   * Accounts active in the month: flag set and the month inside the effective range
   */
  listActiveIn(month: MonthKey): BankAccount[] {
    const rows = this.db.query<BankAccountRow>(
      `
      SELECT * FROM bank_accounts
      WHERE active = 1
        AND effective_from_month_id <= ?
        AND (effective_to_month_id IS NULL OR effective_to_month_id >= ?)
      ORDER BY name, id
      `,
      [month, month]
    );
    return rows.map((row) => this.mapRow(row));
  }

  setEffectiveTo(id: number, effectiveTo: MonthKey | null): BankAccount {
    this.db.execute('UPDATE bank_accounts SET effective_to_month_id = ? WHERE id = ?', [effectiveTo, id]);
    return this.getById(id);
  }

  setActive(id: number, active: boolean): BankAccount {
    this.db.execute('UPDATE bank_accounts SET active = ? WHERE id = ?', [active ? 1 : 0, id]);
    return this.getById(id);
  }

  private mapRow(row: BankAccountRow): BankAccount {
    return {
      id: row.id,
      name: row.name,
      active: row.active === 1,
      openingBalance: row.opening_balance,
      effectiveFrom: row.effective_from_month_id,
      effectiveTo: row.effective_to_month_id,
      createdAt: row.created_at,
    };
  }
}
