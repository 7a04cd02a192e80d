import type { DatabaseAdapter } from '../infra/DatabaseAdapter.js';
import type { MonthRepository } from '../infra/repositories/MonthRepository.js';
import type { BankAccountRepository } from '../infra/repositories/BankAccountRepository.js';
import type { AccountBalanceRepository } from '../infra/repositories/AccountBalanceRepository.js';
import type { TransactionRepository } from '../infra/repositories/TransactionRepository.js';
import type { AuditRepository } from '../infra/repositories/AuditRepository.js';
import type { ClosePolicy } from '../infra/env.js';
import type { RecurrenceService, ExpansionResult } from './RecurrenceService.js';
import { createOpenMonth, type AccountMonthBalance, type Month } from '../domain/entities/Month.js';
import { assertClosable, computeMonthClose, type MonthCloseSnapshot } from '../domain/monthClose.js';
import { isMonthKey, nextMonth, roundMoney, type MonthKey } from '../domain/monthKey.js';
import { CloseNotReadyError, NotFoundError, ValidationError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

export interface MonthCloseOptions {
  closePolicy: ClosePolicy;
  autoExpand: boolean;
}

export interface CloseResult {
  closedMonth: Month;
  closedBalances: AccountMonthBalance[];
  nextMonth: Month;
  nextBalances: AccountMonthBalance[];
  retiredAccountIds: number[];
  expansion: ExpansionResult | null;
  warnings: string[];
}

/**
 * MonthCloseService - opens the first month and rolls the ledger forward one month at
 * a time
 */
export class MonthCloseService {
  constructor(
    private db: DatabaseAdapter,
    private monthRepo: MonthRepository,
    private accountRepo: BankAccountRepository,
    private balanceRepo: AccountBalanceRepository,
    private transactionRepo: TransactionRepository,
    private auditRepo: AuditRepository,
    private recurrenceService: RecurrenceService,
    private options: MonthCloseOptions
  ) {}

  listMonths(): Month[] {
    return this.monthRepo.list();
  }

  /**
   * The most recent open month
   */
  currentMonth(): Month {
    const month = this.monthRepo.findCurrent();
    if (!month) {
      throw new NotFoundError('Month', 'current');
    }
    return month;
  }

  /**
   * Creates the very first month of the ledger. Accounts start at the given balances,
   * or at their opening balance when none is given.
   */
  openInitialMonth(
    key: MonthKey,
    startingBalances: Record<number, number> = {}
  ): { month: Month; balances: AccountMonthBalance[]; expansion: ExpansionResult | null } {
    if (!isMonthKey(key)) {
      throw new ValidationError(`Month must be a YYYY-MM month key, got "${key}"`);
    }

    return this.db.transaction(() => {
      if (this.monthRepo.hasAny()) {
        throw new ValidationError('The ledger already has months; close the current one instead');
      }

      const balances: AccountMonthBalance[] = this.accountRepo.listActiveIn(key).map((account) => ({
        month: key,
        bankAccountId: account.id,
        startingBalance: roundMoney(startingBalances[account.id] ?? account.openingBalance),
        endingBalance: null,
      }));
      const month = createOpenMonth(
        key,
        roundMoney(balances.reduce((sum, row) => sum + row.startingBalance, 0))
      );

      this.monthRepo.insert(month);
      this.balanceRepo.insertMany(balances);
      this.auditRepo.log({
        eventType: 'month_opened',
        entityType: 'Month',
        entityId: key,
        metadata: { startingBalance: month.startingBalance, accounts: balances.length },
      });
      logger.info('Initial month opened', { month: key, startingBalance: month.startingBalance });

      const expansion = this.options.autoExpand ? this.recurrenceService.expandMonth(key) : null;
      return { month, balances, expansion };
    });
  }

  /**
   * Closes the month and opens the next one, all or nothing
   */
  close(key: MonthKey): CloseResult {
    return this.db.transaction(() => {
      const month = this.monthRepo.findByKey(key);
      if (!month) {
        throw new NotFoundError('Month', key);
      }
      const openEarlierMonths = this.monthRepo.findOpenBefore(key);
      assertClosable(month, openEarlierMonths);

      const warnings = this.checkRecurrences(key);
      const snapshot = computeMonthClose({
        month,
        openEarlierMonths,
        ...this.gatherCloseInputs(key),
        closedAt: new Date().toISOString(),
      });
      this.commit(snapshot);

      const expansion = this.options.autoExpand
        ? this.recurrenceService.expandMonth(snapshot.nextMonth.key)
        : null;

      this.auditRepo.log({
        eventType: 'month_closed',
        entityType: 'Month',
        entityId: key,
        metadata: {
          endingBalance: snapshot.closedMonth.endingBalance,
          nextMonth: snapshot.nextMonth.key,
          retiredAccountIds: snapshot.retiredAccountIds,
          warnings,
        },
      });
      logger.info('Month closed', {
        month: key,
        endingBalance: snapshot.closedMonth.endingBalance,
        nextMonth: snapshot.nextMonth.key,
      });

      return { ...snapshot, expansion, warnings };
    });
  }

  private checkRecurrences(key: MonthKey): string[] {
    const missing = this.recurrenceService.findMissing(key);
    if (missing.length === 0) {
      return [];
    }
    const names = missing.map((candidate) => candidate.note);
    if (this.options.closePolicy === 'strict') {
      throw new CloseNotReadyError(key, names);
    }
    logger.warn('Closing month with missing recurring transactions', { month: key, missing: names });
    return [`Missing recurring transactions: ${names.join(', ')}`];
  }

  private gatherCloseInputs(key: MonthKey) {
    const balances = this.balanceRepo.findByMonth(key);
    const nextMonthAccounts = this.accountRepo.listActiveIn(nextMonth(key));
    const continuing = new Set(nextMonthAccounts.map((account) => account.id));

    const activity = new Map<number, number>();
    const pendingCardDues = new Map<number, number>();
    for (const row of balances) {
      activity.set(row.bankAccountId, this.transactionRepo.sumForAccount(key, row.bankAccountId));
      if (!continuing.has(row.bankAccountId)) {
        pendingCardDues.set(row.bankAccountId, this.transactionRepo.sumCardDueAfter(key, row.bankAccountId));
      }
    }

    return { balances, activity, nextMonthAccounts, pendingCardDues };
  }

  private commit(snapshot: MonthCloseSnapshot): void {
    for (const row of snapshot.closedBalances) {
      if (row.endingBalance !== null) {
        this.balanceRepo.setEnding(row.month, row.bankAccountId, row.endingBalance);
      }
    }
    this.monthRepo.markClosed(snapshot.closedMonth);
    this.monthRepo.insert(snapshot.nextMonth);
    this.balanceRepo.insertMany(snapshot.nextBalances);
  }
}
