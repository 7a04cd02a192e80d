import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type {
  Category,
  Instrument,
  PaymentMethod,
  TemplateKind,
  Transaction,
  TransactionType,
} from '../../domain/entities/Transaction.js';
import { templateKey } from '../../domain/entities/Transaction.js';
import type { MonthKey } from '../../domain/monthKey.js';
import { roundMoney } from '../../domain/monthKey.js';
import { NotFoundError } from '../../domain/errors.js';
import { logger } from '../logger.js';

interface TransactionRow {
  id: number;
  date: string;
  month_id: string;
  amount: number;
  category: Category;
  subcategory: string | null;
  payment_method: PaymentMethod;
  bank_account_id: number | null;
  credit_card_id: number | null;
  statement_month_id: string | null;
  due_month_id: string | null;
  due_date: string | null;
  note: string | null;
  type: TransactionType;
  template_kind: TemplateKind | null;
  template_series_id: number | null;
  created_at: string;
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type NewTransaction = DistributiveOmit<Transaction, 'id' | 'createdAt'>;

/**
 * A card transaction together with the bank account that pays its statement
 */
export interface CardCharge {
  ownerAccountId: number;
  transaction: Transaction;
}

/**
 * Repository for ledger transactions. Rows are append-only.
 */
export class TransactionRepository {
  constructor(private db: DatabaseAdapter) {}

  insert(transaction: NewTransaction): Transaction {
    const { instrument } = transaction;
    const template = transaction.type === 'normal' ? transaction.template : null;

    const { lastInsertRowid } = this.db.execute(
      `
      INSERT INTO transactions (
        date, month_id, amount, category, subcategory, payment_method,
        bank_account_id, credit_card_id, statement_month_id, due_month_id, due_date,
        note, type, template_kind, template_series_id
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `,
      [
        transaction.date,
        transaction.month,
        transaction.amount,
        transaction.category,
        transaction.subcategory,
        transaction.paymentMethod,
        instrument.kind === 'bank_account' ? instrument.bankAccountId : null,
        instrument.kind === 'credit_card' ? instrument.creditCardId : null,
        instrument.kind === 'credit_card' ? instrument.statementMonth : null,
        instrument.kind === 'credit_card' ? instrument.dueMonth : null,
        instrument.kind === 'credit_card' ? instrument.dueDate : null,
        transaction.note,
        transaction.type,
        template?.kind ?? null,
        template?.seriesId ?? null,
      ]
    );

    logger.debug('Transaction saved', { id: lastInsertRowid, month: transaction.month });
    return this.getById(lastInsertRowid);
  }

  findById(id: number): Transaction | null {
    const row = this.db.queryOne<TransactionRow>('SELECT * FROM transactions WHERE id = ?', [id]);
    return row ? this.mapRowToTransaction(row) : null;
  }

  getById(id: number): Transaction {
    const transaction = this.findById(id);
    if (!transaction) {
      throw new NotFoundError('Transaction', id);
    }
    return transaction;
  }

  /**
   * Transactions posted in the month
   */
  findByMonth(month: MonthKey): Transaction[] {
    const rows = this.db.query<TransactionRow>(
      'SELECT * FROM transactions WHERE month_id = ? ORDER BY date, category, subcategory, id',
      [month]
    );
    return rows.map((row) => this.mapRowToTransaction(row));
  }

  /**
   * Card transactions whose statement is paid in the month, optionally for one owner
   */
  findCardChargesDue(month: MonthKey, ownerAccountId?: number): CardCharge[] {
    const rows = this.db.query<TransactionRow & { owner_account_id: number }>(
      `
      SELECT t.*, c.bank_account_id AS owner_account_id
      FROM transactions t
      JOIN credit_cards c ON c.id = t.credit_card_id
      WHERE t.due_month_id = ?
        ${ownerAccountId === undefined ? '' : 'AND c.bank_account_id = ?'}
      ORDER BY t.due_date, t.id
      `,
      ownerAccountId === undefined ? [month] : [month, ownerAccountId]
    );
    return rows.map((row) => ({
      ownerAccountId: row.owner_account_id,
      transaction: this.mapRowToTransaction(row),
    }));
  }

  /**
   * Net signed total of everything posted in the month
   */
  sumPosted(month: MonthKey): number {
    const row = this.db.queryOne<{ net: number }>(
      'SELECT COALESCE(SUM(amount), 0) AS net FROM transactions WHERE month_id = ?',
      [month]
    );
    return roundMoney(row?.net ?? 0);
  }

  /**
   * Cash movement of one account in the month: its own bank transactions posted in the
   * month plus card statements it pays that are due in the month
   */
  sumForAccount(month: MonthKey, bankAccountId: number): number {
    const direct = this.db.queryOne<{ net: number }>(
      `
      SELECT COALESCE(SUM(amount), 0) AS net
      FROM transactions
      WHERE month_id = ? AND bank_account_id = ?
      `,
      [month, bankAccountId]
    );
    const cards = this.db.queryOne<{ net: number }>(
      `
      SELECT COALESCE(SUM(t.amount), 0) AS net
      FROM transactions t
      JOIN credit_cards c ON c.id = t.credit_card_id
      WHERE t.due_month_id = ? AND c.bank_account_id = ?
      `,
      [month, bankAccountId]
    );
    return roundMoney((direct?.net ?? 0) + (cards?.net ?? 0));
  }

  /**
   * Card charges an account still has to pay after the given month
   */
  sumCardDueAfter(month: MonthKey, bankAccountId: number): number {
    const row = this.db.queryOne<{ net: number }>(
      `
      SELECT COALESCE(SUM(t.amount), 0) AS net
      FROM transactions t
      JOIN credit_cards c ON c.id = t.credit_card_id
      WHERE t.due_month_id > ? AND c.bank_account_id = ?
      `,
      [month, bankAccountId]
    );
    return roundMoney(row?.net ?? 0);
  }

  /**
   * Template series keys (`kind:seriesId`) that already generated a transaction in the month
   */
  generatedTemplateKeys(month: MonthKey): Set<string> {
    const rows = this.db.query<{ template_kind: TemplateKind; template_series_id: number }>(
      `
      SELECT template_kind, template_series_id FROM transactions
      WHERE month_id = ? AND template_kind IS NOT NULL AND template_series_id IS NOT NULL
      `,
      [month]
    );
    return new Set(
      rows.map((row) => templateKey({ kind: row.template_kind, seriesId: row.template_series_id }))
    );
  }

  private mapInstrument(row: TransactionRow): Instrument {
    if (row.credit_card_id !== null) {
      return {
        kind: 'credit_card',
        creditCardId: row.credit_card_id,
        statementMonth: row.statement_month_id ?? row.month_id,
        dueMonth: row.due_month_id ?? row.month_id,
        dueDate: row.due_date ?? row.date,
      };
    }
    if (row.bank_account_id !== null) {
      return { kind: 'bank_account', bankAccountId: row.bank_account_id };
    }
    return { kind: 'cash' };
  }

  private mapRowToTransaction(row: TransactionRow): Transaction {
    const fields = {
      id: row.id,
      date: row.date,
      month: row.month_id,
      amount: row.amount,
      category: row.category,
      subcategory: row.subcategory,
      paymentMethod: row.payment_method,
      instrument: this.mapInstrument(row),
      note: row.note,
      createdAt: row.created_at,
    };

    if (row.type === 'correction') {
      return { ...fields, type: 'correction' };
    }
    return {
      ...fields,
      type: 'normal',
      template:
        row.template_kind !== null && row.template_series_id !== null
          ? { kind: row.template_kind, seriesId: row.template_series_id }
          : null,
    };
  }
}
