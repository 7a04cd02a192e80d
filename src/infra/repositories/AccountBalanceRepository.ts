import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { AccountMonthBalance } from '../../domain/entities/Month.js';
import type { MonthKey } from '../../domain/monthKey.js';
import { roundMoney } from '../../domain/monthKey.js';
import { NotFoundError } from '../../domain/errors.js';

interface BalanceRow {
  month_id: string;
  bank_account_id: number;
  starting_balance: number;
  ending_balance: number | null;
}

/**
 * Repository for per-account, per-month balances
 */
export class AccountBalanceRepository {
  constructor(private db: DatabaseAdapter) {}

  insertMany(rows: AccountMonthBalance[]): void {
    for (const row of rows) {
      this.db.execute(
        `
        INSERT INTO account_month_balances (month_id, bank_account_id, starting_balance, ending_balance)
        VALUES (?, ?, ?, ?)
        `,
        [row.month, row.bankAccountId, row.startingBalance, row.endingBalance]
      );
    }
  }

  findByMonth(month: MonthKey): AccountMonthBalance[] {
    const rows = this.db.query<BalanceRow>(
      'SELECT * FROM account_month_balances WHERE month_id = ? ORDER BY bank_account_id',
      [month]
    );
    return rows.map((row) => this.mapRow(row));
  }

  find(month: MonthKey, bankAccountId: number): AccountMonthBalance | null {
    const row = this.db.queryOne<BalanceRow>(
      'SELECT * FROM account_month_balances WHERE month_id = ? AND bank_account_id = ?',
      [month, bankAccountId]
    );
    return row ? this.mapRow(row) : null;
  }

  /**
   * Rows of one account from the given month onwards, oldest first
   */
  findByAccountFrom(bankAccountId: number, month: MonthKey): AccountMonthBalance[] {
    const rows = this.db.query<BalanceRow>(
      `
      SELECT * FROM account_month_balances
      WHERE bank_account_id = ? AND month_id >= ?
      ORDER BY month_id
      `,
      [bankAccountId, month]
    );
    return rows.map((row) => this.mapRow(row));
  }

  setEnding(month: MonthKey, bankAccountId: number, endingBalance: number): void {
    const { changes } = this.db.execute(
      'UPDATE account_month_balances SET ending_balance = ? WHERE month_id = ? AND bank_account_id = ?',
      [endingBalance, month, bankAccountId]
    );
    if (changes === 0) {
      throw new NotFoundError('AccountMonthBalance', `${month}/${bankAccountId}`);
    }
  }

  adjust(row: AccountMonthBalance, startingDelta: number, endingDelta: number): AccountMonthBalance {
    const adjusted: AccountMonthBalance = {
      ...row,
      startingBalance: roundMoney(row.startingBalance + startingDelta),
      endingBalance: row.endingBalance === null ? null : roundMoney(row.endingBalance + endingDelta),
    };
    this.db.execute(
      `
      UPDATE account_month_balances
      SET starting_balance = ?, ending_balance = ?
      WHERE month_id = ? AND bank_account_id = ?
      `,
      [adjusted.startingBalance, adjusted.endingBalance, row.month, row.bankAccountId]
    );
    return adjusted;
  }

  private mapRow(row: BalanceRow): AccountMonthBalance {
    return {
      month: row.month_id,
      bankAccountId: row.bank_account_id,
      startingBalance: row.starting_balance,
      endingBalance: row.ending_balance,
    };
  }
}
