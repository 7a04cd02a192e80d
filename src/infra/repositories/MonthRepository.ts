import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { Month, MonthStatus } from '../../domain/entities/Month.js';
import type { MonthKey } from '../../domain/monthKey.js';
import { roundMoney } from '../../domain/monthKey.js';
import { NotFoundError } from '../../domain/errors.js';
import { logger } from '../logger.js';

interface MonthRow {
  month_id: string;
  starting_balance: number;
  ending_balance: number | null;
  status: MonthStatus;
  closed_at: string | null;
}

/**
 * Repository for Month persistence
 */
export class MonthRepository {
  constructor(private db: DatabaseAdapter) {}

  insert(month: Month): void {
    this.db.execute(
      `
      INSERT INTO months (month_id, starting_balance, ending_balance, status, closed_at)
      VALUES (?, ?, ?, ?, ?)
      `,
      [month.key, month.startingBalance, month.endingBalance, month.status, month.closedAt]
    );
    logger.debug('Month saved', { month: month.key, status: month.status });
  }

  findByKey(key: MonthKey): Month | null {
    const row = this.db.queryOne<MonthRow>('SELECT * FROM months WHERE month_id = ?', [key]);
    return row ? this.mapRowToMonth(row) : null;
  }

  list(): Month[] {
    const rows = this.db.query<MonthRow>('SELECT * FROM months ORDER BY month_id');
    return rows.map((row) => this.mapRowToMonth(row));
  }

  hasAny(): boolean {
    return this.db.queryOne<{ found: number }>('SELECT 1 AS found FROM months LIMIT 1') !== null;
  }

  /**
   * The current month: the most recent open month
   */
  findCurrent(): Month | null {
    const row = this.db.queryOne<MonthRow>(
      `SELECT * FROM months WHERE status = 'open' ORDER BY month_id DESC LIMIT 1`
    );
    return row ? this.mapRowToMonth(row) : null;
  }

  findOpenBefore(key: MonthKey): MonthKey[] {
    const rows = this.db.query<{ month_id: string }>(
      `SELECT month_id FROM months WHERE status = 'open' AND month_id < ? ORDER BY month_id`,
      [key]
    );
    return rows.map((row) => row.month_id);
  }

  findOpenFrom(key: MonthKey): Month[] {
    const rows = this.db.query<MonthRow>(
      `SELECT * FROM months WHERE status = 'open' AND month_id >= ? ORDER BY month_id`,
      [key]
    );
    return rows.map((row) => this.mapRowToMonth(row));
  }

  latestClosedKey(): MonthKey | null {
    const row = this.db.queryOne<{ month_id: string }>(
      `SELECT month_id FROM months WHERE status = 'closed' ORDER BY month_id DESC LIMIT 1`
    );
    return row?.month_id ?? null;
  }

  markClosed(month: Month): void {
    const { changes } = this.db.execute(
      `
      UPDATE months
      SET ending_balance = ?, status = 'closed', closed_at = ?
      WHERE month_id = ? AND status = 'open'
      `,
      [month.endingBalance, month.closedAt, month.key]
    );
    if (changes === 0) {
      throw new NotFoundError('Open month', month.key);
    }
    logger.debug('Month marked closed', { month: month.key, endingBalance: month.endingBalance });
  }

  /**
   * Shifts the aggregate balances of a month; the ending balance only moves once set
   */
  adjustBalances(key: MonthKey, startingDelta: number, endingDelta: number): void {
    const month = this.findByKey(key);
    if (!month) {
      throw new NotFoundError('Month', key);
    }
    this.db.execute(
      'UPDATE months SET starting_balance = ?, ending_balance = ? WHERE month_id = ?',
      [
        roundMoney(month.startingBalance + startingDelta),
        month.endingBalance === null ? null : roundMoney(month.endingBalance + endingDelta),
        key,
      ]
    );
  }

  private mapRowToMonth(row: MonthRow): Month {
    return {
      key: row.month_id,
      startingBalance: row.starting_balance,
      endingBalance: row.ending_balance,
      status: row.status,
      closedAt: row.closed_at,
    };
  }
}
