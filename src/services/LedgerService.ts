import type { DatabaseAdapter } from '../infra/DatabaseAdapter.js';
import type { MonthRepository } from '../infra/repositories/MonthRepository.js';
import type { BankAccountRepository } from '../infra/repositories/BankAccountRepository.js';
import type { CreditCardRepository } from '../infra/repositories/CreditCardRepository.js';
import type { AccountBalanceRepository } from '../infra/repositories/AccountBalanceRepository.js';
import type { TransactionRepository } from '../infra/repositories/TransactionRepository.js';
import type { AuditRepository } from '../infra/repositories/AuditRepository.js';
import type { ObjectiveService } from './ObjectiveService.js';
import { isBankAccountActiveIn } from '../domain/entities/BankAccount.js';
import { isCreditCardActiveIn } from '../domain/entities/CreditCard.js';
import {
  cashEffectMonth,
  isCategory,
  paymentMethodFor,
  signAmount,
  type Category,
  type Instrument,
  type InstrumentRef,
  type Transaction,
  type TransactionDraft,
} from '../domain/entities/Transaction.js';
import type { ObjectiveImpact } from '../domain/objectiveEvaluation.js';
import { resolveCardCycle } from '../domain/creditCardCycle.js';
import { parseIsoDate, type IsoDate, type MonthKey } from '../domain/monthKey.js';
import {
  ClosedMonthError,
  ReferentialIntegrityError,
  UnsettledAccountError,
  ValidationError,
} from '../domain/errors.js';
import { logger } from '../infra/logger.js';

export interface RecordTransactionInput {
  date: IsoDate;
  month?: MonthKey; // Defaults to the month of `date`
  amount: number; // Positive; the sign follows the category
  category: string;
  subcategory?: string | null;
  instrument: InstrumentRef;
  note?: string | null;
}

export interface RecordCorrectionInput {
  date: IsoDate;
  month?: MonthKey;
  amount: number; // Signed
  category: string;
  subcategory?: string | null;
  instrument: InstrumentRef;
  note: string;
}

export interface RecordResult {
  transaction: Transaction;
  objectiveWarnings: ObjectiveImpact[];
}

/**
 * LedgerService - the only way transactions enter the ledger
 *
 * A bank balance moves through direct bank transactions in their posting month and
 * through card transactions in their due month, never in the card purchase's own month.
 */
export class LedgerService {
  constructor(
    private db: DatabaseAdapter,
    private monthRepo: MonthRepository,
    private accountRepo: BankAccountRepository,
    private cardRepo: CreditCardRepository,
    private balanceRepo: AccountBalanceRepository,
    private transactionRepo: TransactionRepository,
    private auditRepo: AuditRepository,
    private objectiveService: ObjectiveService
  ) {}

  /**
   * Validates and persists a transaction. Corrections may target closed months; their
   * cash effect is carried through every later balance.
   */
  insert(draft: TransactionDraft): Transaction {
    return this.db.transaction(() => {
      const month = this.monthRepo.findByKey(draft.month);
      if (!month) {
        throw new ReferentialIntegrityError(`Month ${draft.month} does not exist`, {
          month: draft.month,
        });
      }
      if (month.status === 'closed' && draft.type === 'normal') {
        throw new ClosedMonthError(
          draft.month,
          `Month ${draft.month} is closed. Record a correction instead.`
        );
      }
      if (!isCategory(draft.category)) {
        throw new ReferentialIntegrityError(`Unknown category ${String(draft.category)}`, {
          category: draft.category,
        });
      }
      if (parseIsoDate(draft.date).month !== draft.month) {
        throw new ValidationError(`Date ${draft.date} is not in month ${draft.month}`);
      }
      if (!Number.isFinite(draft.amount) || draft.amount === 0) {
        throw new ValidationError('Transaction amount must be a non-zero number');
      }

      const instrument = this.resolveInstrument(draft.instrument, draft.date, draft.month);
      const base = {
        date: draft.date,
        month: draft.month,
        amount: draft.amount,
        category: draft.category,
        subcategory: draft.subcategory,
        paymentMethod: paymentMethodFor(instrument),
        instrument,
        note: draft.note,
      };

      const transaction = this.transactionRepo.insert(
        draft.type === 'normal'
          ? { ...base, type: 'normal', template: draft.template }
          : { ...base, type: 'correction' }
      );

      if (transaction.type === 'correction') {
        this.propagateCorrection(transaction);
      }
      return transaction;
    });
  }

  /**
   * Manual entry of a normal transaction
   */
  record(input: RecordTransactionInput): RecordResult {
    const category = this.parseCategory(input.category);
    const subcategory = normalizeText(input.subcategory);

    if (!Number.isFinite(input.amount) || input.amount <= 0) {
      throw new ValidationError('Amount must be greater than zero');
    }
    if (category !== 'Income' && subcategory === null) {
      throw new ValidationError('Subcategory is required for expenses and savings');
    }
    if (category === 'Income' && input.instrument.kind === 'credit_card') {
      throw new ValidationError('Income cannot be received on a credit card');
    }

    const month = input.month ?? parseIsoDate(input.date).month;
    const objectiveWarnings =
      category === 'Income'
        ? []
        : this.objectiveService
            .checkImpact(month, { category, subcategory, amount: input.amount })
            .filter((impact) => impact.exceeds);

    const transaction = this.insert({
      type: 'normal',
      template: null,
      date: input.date,
      month,
      amount: signAmount(category, input.amount),
      category,
      subcategory,
      instrument: input.instrument,
      note: normalizeText(input.note),
    });

    this.auditRepo.log({
      eventType: 'transaction_recorded',
      entityType: 'Transaction',
      entityId: transaction.id,
      metadata: { month, amount: transaction.amount, category },
    });
    if (objectiveWarnings.length > 0) {
      logger.warn('Transaction exceeds budget objective', {
        transactionId: transaction.id,
        objectives: objectiveWarnings.map((impact) => impact.objectiveId),
      });
    }
    logger.info('Transaction recorded', { id: transaction.id, month, amount: transaction.amount });

    return { transaction, objectiveWarnings };
  }

  /**
   * Appends a correction. Closed months accept corrections only.
   */
  recordCorrection(input: RecordCorrectionInput): Transaction {
    const note = normalizeText(input.note);
    if (note === null) {
      throw new ValidationError('Corrections require a note explaining the adjustment');
    }

    const month = input.month ?? parseIsoDate(input.date).month;
    const transaction = this.insert({
      type: 'correction',
      date: input.date,
      month,
      amount: input.amount,
      category: this.parseCategory(input.category),
      subcategory: normalizeText(input.subcategory),
      instrument: input.instrument,
      note,
    });

    this.auditRepo.log({
      eventType: 'correction_recorded',
      entityType: 'Transaction',
      entityId: transaction.id,
      metadata: { month, amount: transaction.amount, cashMonth: cashEffectMonth(transaction) },
    });
    logger.info('Correction recorded', { id: transaction.id, month, amount: transaction.amount });

    return transaction;
  }

  /**
   * Net signed total of a month. With an account: its direct bank transactions posted
   * in the month plus the card statements it pays that are due in the month.
   */
  aggregate(month: MonthKey, bankAccountId?: number): number {
    return bankAccountId === undefined
      ? this.transactionRepo.sumPosted(month)
      : this.transactionRepo.sumForAccount(month, bankAccountId);
  }

  listForMonth(month: MonthKey): Transaction[] {
    return this.transactionRepo.findByMonth(month);
  }

  private parseCategory(value: string): Category {
    if (!isCategory(value)) {
      throw new ReferentialIntegrityError(`Unknown category ${value}`, { category: value });
    }
    return value;
  }

  private resolveInstrument(ref: InstrumentRef, date: IsoDate, month: MonthKey): Instrument {
    switch (ref.kind) {
      case 'cash':
        return ref;
      case 'bank_account': {
        const account = this.accountRepo.findById(ref.bankAccountId);
        if (!account || !isBankAccountActiveIn(account, month)) {
          throw new ReferentialIntegrityError(
            `Bank account ${ref.bankAccountId} is not active in ${month}`,
            { bankAccountId: ref.bankAccountId, month }
          );
        }
        return ref;
      }
      case 'credit_card': {
        const card = this.cardRepo.findById(ref.creditCardId);
        const owner = card ? this.accountRepo.findById(card.bankAccountId) : null;
        if (!card || !owner || !isCreditCardActiveIn(card, owner, month)) {
          throw new ReferentialIntegrityError(
            `Credit card ${ref.creditCardId} is not active in ${month}`,
            { creditCardId: ref.creditCardId, month }
          );
        }
        const cycle = resolveCardCycle(date, card.cycle);
        // The statement must be payable from the owning account
        if (!isBankAccountActiveIn(owner, cycle.dueMonth)) {
          throw new ReferentialIntegrityError(
            `Credit card ${card.id} statement is due in ${cycle.dueMonth}, after bank account ${owner.id} retires`,
            { creditCardId: card.id, bankAccountId: owner.id, dueMonth: cycle.dueMonth }
          );
        }
        return { kind: 'credit_card', creditCardId: card.id, ...cycle };
      }
    }
  }

  /**
   * Shifts the paying account's balances from the correction's cash month onwards when
   * that month is already closed. Open months pick the correction up when they close.
   */
  private propagateCorrection(transaction: Transaction): void {
    const { instrument } = transaction;
    const bankAccountId =
      instrument.kind === 'bank_account'
        ? instrument.bankAccountId
        : instrument.kind === 'credit_card'
          ? this.cardRepo.getById(instrument.creditCardId).bankAccountId
          : null;
    if (bankAccountId === null) {
      return;
    }

    const cashMonth = cashEffectMonth(transaction);
    const target = this.monthRepo.findByKey(cashMonth);
    if (!target || target.status !== 'closed') {
      return;
    }

    const rows = this.balanceRepo.findByAccountFrom(bankAccountId, cashMonth);
    if (rows.length === 0 || rows[0].month !== cashMonth) {
      throw new ReferentialIntegrityError(
        `Bank account ${bankAccountId} has no balance in ${cashMonth}`,
        { bankAccountId, month: cashMonth }
      );
    }

    const delta = transaction.amount;
    const adjusted = rows.map((row) => {
      const startingDelta = row.month === cashMonth ? 0 : delta;
      this.monthRepo.adjustBalances(row.month, startingDelta, delta);
      return this.balanceRepo.adjust(row, startingDelta, delta);
    });

    const account = this.accountRepo.getById(bankAccountId);
    const terminal = adjusted[adjusted.length - 1];
    if (
      account.effectiveTo === terminal.month &&
      terminal.endingBalance !== null &&
      terminal.endingBalance !== 0
    ) {
      throw new UnsettledAccountError(
        bankAccountId,
        `Correction leaves retired account ${bankAccountId} with a balance of ${terminal.endingBalance}`,
        { month: terminal.month, endingBalance: terminal.endingBalance }
      );
    }

    logger.info('Correction propagated to closed balances', {
      transactionId: transaction.id,
      bankAccountId,
      fromMonth: cashMonth,
      monthsAdjusted: adjusted.map((row) => row.month),
    });
  }
}

function normalizeText(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}
