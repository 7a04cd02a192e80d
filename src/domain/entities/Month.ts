import type { MonthKey } from '../monthKey.js';

export type MonthStatus = 'open' | 'closed';

/**
 * Month entity - one calendar month of the ledger
 * `endingBalance` is set if and only if the month is closed
 */
export interface Month {
  key: MonthKey;
  startingBalance: number; // Sum of the month's account starting balances
  endingBalance: number | null;
  status: MonthStatus;
  closedAt: string | null; // ISO 8601 timestamp
}

/**
 * Per-account position within a month
 */
export interface AccountMonthBalance {
  month: MonthKey;
  bankAccountId: number;
  startingBalance: number;
  endingBalance: number | null;
}

export function createOpenMonth(key: MonthKey, startingBalance: number): Month {
  return {
    key,
    startingBalance,
    endingBalance: null,
    status: 'open',
    closedAt: null,
  };
}
