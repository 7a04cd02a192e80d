import { ClosedMonthError, OutOfOrderCloseError, UnsettledAccountError } from './errors.js';
import type { BankAccount } from './entities/BankAccount.js';
import { createOpenMonth, type AccountMonthBalance, type Month } from './entities/Month.js';
import { nextMonth, roundMoney, type MonthKey } from './monthKey.js';

export interface MonthCloseInput {
  month: Month;
  openEarlierMonths: MonthKey[];
  balances: AccountMonthBalance[]; // Rows of the month being closed
  activity: ReadonlyMap<number, number>; // Net cash movement per account in the month
  nextMonthAccounts: BankAccount[]; // Accounts active in the following month
  pendingCardDues: ReadonlyMap<number, number>; // Card charges due after the month, by owner
  closedAt: string;
}

/**
 * Complete result of closing a month. Committed as one unit by the caller.
 */
export interface MonthCloseSnapshot {
  closedMonth: Month;
  closedBalances: AccountMonthBalance[];
  nextMonth: Month;
  nextBalances: AccountMonthBalance[];
  retiredAccountIds: number[];
}

/**
 * Months close one at a time, oldest first
 */
export function assertClosable(month: Month, openEarlierMonths: MonthKey[]): void {
  if (month.status === 'closed') {
    throw new ClosedMonthError(month.key, `Month ${month.key} is already closed`);
  }
  if (openEarlierMonths.length > 0) {
    throw new OutOfOrderCloseError(month.key, [...openEarlierMonths].sort());
  }
}

/**
 * The open → closed transition. Computes every account's ending balance, the month's
 * aggregate position, and the seed rows of the next month, or throws without producing
 * anything.
 */
export function computeMonthClose(input: MonthCloseInput): MonthCloseSnapshot {
  const { month, balances, activity, nextMonthAccounts, pendingCardDues } = input;
  assertClosable(month, input.openEarlierMonths);

  const closedBalances = balances.map((row) => ({
    ...row,
    endingBalance: roundMoney(row.startingBalance + (activity.get(row.bankAccountId) ?? 0)),
  }));
  const endingBalance = roundMoney(
    closedBalances.reduce((sum, row) => sum + row.endingBalance, 0)
  );

  const following = nextMonth(month.key);
  const continuing = new Set(nextMonthAccounts.map((account) => account.id));
  const retiredAccountIds: number[] = [];

  for (const row of closedBalances) {
    if (continuing.has(row.bankAccountId)) {
      continue;
    }
    if (row.endingBalance !== 0) {
      throw new UnsettledAccountError(
        row.bankAccountId,
        `Account ${row.bankAccountId} retires in ${month.key} with a balance of ${row.endingBalance}`,
        { month: month.key, endingBalance: row.endingBalance }
      );
    }
    const pending = roundMoney(pendingCardDues.get(row.bankAccountId) ?? 0);
    if (pending !== 0) {
      throw new UnsettledAccountError(
        row.bankAccountId,
        `Account ${row.bankAccountId} retires in ${month.key} with card statements still due`,
        { month: month.key, pendingCardDue: pending }
      );
    }
    retiredAccountIds.push(row.bankAccountId);
  }

  const carried = new Map(closedBalances.map((row) => [row.bankAccountId, row.endingBalance]));
  const nextBalances: AccountMonthBalance[] = nextMonthAccounts.map((account) => ({
    month: following,
    bankAccountId: account.id,
    startingBalance: carried.get(account.id) ?? account.openingBalance,
    endingBalance: null,
  }));

  return {
    closedMonth: {
      ...month,
      endingBalance,
      status: 'closed',
      closedAt: input.closedAt,
    },
    closedBalances,
    nextMonth: createOpenMonth(
      following,
      roundMoney(nextBalances.reduce((sum, row) => sum + row.startingBalance, 0))
    ),
    nextBalances,
    retiredAccountIds,
  };
}
