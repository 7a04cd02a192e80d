import type { MonthRepository } from '../infra/repositories/MonthRepository.js';
import type { BankAccountRepository } from '../infra/repositories/BankAccountRepository.js';
import type { AccountBalanceRepository } from '../infra/repositories/AccountBalanceRepository.js';
import type {
  CardCharge,
  TransactionRepository,
} from '../infra/repositories/TransactionRepository.js';
import type { AccountMonthBalance, Month } from '../domain/entities/Month.js';
import type { Category, PaymentMethod, Transaction } from '../domain/entities/Transaction.js';
import {
  categoryTotals,
  computeAccountCoverage,
  halfMonthSplits,
  summarizeMonth,
  variableByPaymentMethod,
  type AccountCoverage,
  type HalfMonthSplits,
  type MonthSummary,
} from '../domain/reports.js';
import { roundMoney, type MonthKey } from '../domain/monthKey.js';
import { NotFoundError } from '../domain/errors.js';

export interface MonthDetail {
  month: Month;
  balances: AccountMonthBalance[];
  transactions: Transaction[];
  cardChargesDue: CardCharge[];
  summary: MonthSummary;
  coverage: AccountCoverage[];
  categoryTotals: Record<Category, number>;
  variableByPaymentMethod: Partial<Record<PaymentMethod, number>>;
  halfMonthSplits: HalfMonthSplits;
}

/**
 * Read-only views over a month
 */
export class MonthReportService {
  constructor(
    private monthRepo: MonthRepository,
    private accountRepo: BankAccountRepository,
    private balanceRepo: AccountBalanceRepository,
    private transactionRepo: TransactionRepository
  ) {}

  getMonthDetail(key: MonthKey): MonthDetail {
    const month = this.monthRepo.findByKey(key);
    if (!month) {
      throw new NotFoundError('Month', key);
    }

    const balances = this.balanceRepo.findByMonth(key);
    const transactions = this.transactionRepo.findByMonth(key);
    const cardChargesDue = this.transactionRepo.findCardChargesDue(key);

    const accountActivity = new Map(
      balances.map((row) => [row.bankAccountId, this.transactionRepo.sumForAccount(key, row.bankAccountId)])
    );
    const cardDueByAccount = new Map<number, number>();
    for (const charge of cardChargesDue) {
      cardDueByAccount.set(
        charge.ownerAccountId,
        roundMoney((cardDueByAccount.get(charge.ownerAccountId) ?? 0) + charge.transaction.amount)
      );
    }

    return {
      month,
      balances,
      transactions,
      cardChargesDue,
      summary: summarizeMonth(month, transactions, balances, accountActivity),
      coverage: computeAccountCoverage(
        this.accountRepo.listActiveIn(key),
        balances,
        transactions,
        cardDueByAccount
      ),
      categoryTotals: categoryTotals(transactions),
      variableByPaymentMethod: variableByPaymentMethod(transactions),
      halfMonthSplits: halfMonthSplits(
        transactions,
        cardChargesDue.map((charge) => charge.transaction)
      ),
    };
  }
}
