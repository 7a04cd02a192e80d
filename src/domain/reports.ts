import type { BankAccount } from './entities/BankAccount.js';
import type { AccountMonthBalance, Month } from './entities/Month.js';
import type { Category, PaymentMethod, Transaction } from './entities/Transaction.js';
import { parseIsoDate, roundMoney } from './monthKey.js';

export interface MonthSummary {
  month: string;
  status: Month['status'];
  startingBalance: number;
  net: number;
  accountActivity: number;
  projectedEnding: number;
  endingBalance: number | null;
}

export interface AccountCoverage {
  bankAccountId: number;
  bankAccountName: string;
  startingBalance: number;
  projectedBalance: number; // Start plus direct bank activity of the month
  cardDue: number; // Card statements paid from the account this month
  shortfall: number;
}

export type HalfMonthSplits = Record<Category, { first: number; second: number }>;

/**
 * Month position. `net` covers every posted transaction; the projected ending follows
 * the close and only counts each account's cash activity (card purchases land in their
 * due month, cash never reaches an account).
 */
export function summarizeMonth(
  month: Month,
  posted: Pick<Transaction, 'amount'>[],
  balances: Pick<AccountMonthBalance, 'bankAccountId' | 'startingBalance'>[],
  accountActivity: ReadonlyMap<number, number>
): MonthSummary {
  const net = roundMoney(posted.reduce((sum, tx) => sum + tx.amount, 0));
  const activity = roundMoney(
    balances.reduce((sum, row) => sum + (accountActivity.get(row.bankAccountId) ?? 0), 0)
  );
  const starting = balances.reduce((sum, row) => sum + row.startingBalance, 0);
  return {
    month: month.key,
    status: month.status,
    startingBalance: month.startingBalance,
    net,
    accountActivity: activity,
    projectedEnding: roundMoney(starting + activity),
    endingBalance: month.endingBalance,
  };
}

/**
 * Whether each account can cover the card statements it pays this month
 */
export function computeAccountCoverage(
  accounts: BankAccount[],
  balances: AccountMonthBalance[],
  posted: Transaction[],
  cardDueByAccount: ReadonlyMap<number, number>
): AccountCoverage[] {
  const starting = new Map(balances.map((row) => [row.bankAccountId, row.startingBalance]));

  return accounts.map((account) => {
    const direct = posted
      .filter((tx) => tx.instrument.kind === 'bank_account' && tx.instrument.bankAccountId === account.id)
      .reduce((sum, tx) => sum + tx.amount, 0);
    const startingBalance = starting.get(account.id) ?? 0;
    const projectedBalance = roundMoney(startingBalance + direct);
    const cardDue = roundMoney(Math.max(0, -(cardDueByAccount.get(account.id) ?? 0)));

    return {
      bankAccountId: account.id,
      bankAccountName: account.name,
      startingBalance,
      projectedBalance,
      cardDue,
      shortfall: roundMoney(Math.max(0, cardDue - projectedBalance)),
    };
  });
}

export function categoryTotals(posted: Pick<Transaction, 'amount' | 'category'>[]): Record<Category, number> {
  const totals: Record<Category, number> = { Fixed: 0, Variable: 0, Income: 0, Savings: 0 };
  for (const tx of posted) {
    totals[tx.category] = roundMoney(totals[tx.category] + tx.amount);
  }
  return totals;
}

/**
 * Variable spending split by how it was paid, as positive amounts
 */
export function variableByPaymentMethod(
  posted: Pick<Transaction, 'amount' | 'category' | 'paymentMethod'>[]
): Partial<Record<PaymentMethod, number>> {
  const net = new Map<PaymentMethod, number>();
  for (const tx of posted) {
    if (tx.category === 'Variable') {
      net.set(tx.paymentMethod, (net.get(tx.paymentMethod) ?? 0) + tx.amount);
    }
  }
  return Object.fromEntries([...net].map(([method, total]) => [method, roundMoney(Math.abs(total))]));
}

/**
 * Cash flow of the month split at the 15th. Card purchases count on their due date in
 * the month they are due; everything else on its own date. Income is summed as is,
 * outflows as positive amounts.
 */
export function halfMonthSplits(posted: Transaction[], cardDue: Transaction[]): HalfMonthSplits {
  const splits: HalfMonthSplits = {
    Fixed: { first: 0, second: 0 },
    Variable: { first: 0, second: 0 },
    Income: { first: 0, second: 0 },
    Savings: { first: 0, second: 0 },
  };

  const entries = [
    ...posted
      .filter((tx) => tx.instrument.kind !== 'credit_card')
      .map((tx) => ({ tx, effectiveDate: tx.date })),
    ...cardDue.map((tx) => ({
      tx,
      effectiveDate: tx.instrument.kind === 'credit_card' ? tx.instrument.dueDate : tx.date,
    })),
  ];

  for (const { tx, effectiveDate } of entries) {
    const half = parseIsoDate(effectiveDate).day <= 15 ? 'first' : 'second';
    const value = tx.category === 'Income' ? tx.amount : Math.abs(tx.amount);
    splits[tx.category][half] = roundMoney(splits[tx.category][half] + value);
  }

  return splits;
}
