import { ValidationError } from '../errors.js';
import { isMonthKey, isWithinRange, type MonthKey } from '../monthKey.js';

/**
 * BankAccount entity - a cash account whose balance the ledger tracks month by month
 * Never deleted: retired by setting `effectiveTo`
 */
export interface BankAccount {
  id: number;
  name: string;
  active: boolean;
  openingBalance: number; // Starting balance of the first month the account takes part in
  effectiveFrom: MonthKey;
  effectiveTo: MonthKey | null; // Inclusive; null = still active
  createdAt: string;
}

/**
 * Whether the account can hold balances and accept transactions in the month
 */
export function isBankAccountActiveIn(account: BankAccount, month: MonthKey): boolean {
  return account.active && isWithinRange(month, account.effectiveFrom, account.effectiveTo);
}

/**
 * Validates an effective month range shared by accounts and cards
 */
export function validateEffectiveRange(from: MonthKey, to: MonthKey | null): void {
  if (!isMonthKey(from)) {
    throw new ValidationError(`effectiveFrom must be a YYYY-MM month key, got "${from}"`);
  }
  if (to !== null && !isMonthKey(to)) {
    throw new ValidationError(`effectiveTo must be a YYYY-MM month key, got "${to}"`);
  }
  if (to !== null && to < from) {
    throw new ValidationError('effectiveTo must not be before effectiveFrom', { from, to });
  }
}
