import { isWithinRange, type MonthKey } from '../monthKey.js';
import { isBankAccountActiveIn, type BankAccount } from './BankAccount.js';

/**
 * Statement cycle of a card. Days are 1-31 and clamped into short months.
 */
export interface CardCycle {
  statementCloseDay: number;
  dueDay: number;
}

/**
 * CreditCard entity - purchases are billed on a statement and paid from the owning
 * bank account in the statement's due month
 */
export interface CreditCard {
  id: number;
  name: string;
  bankAccountId: number; // Account debited when the statement is paid
  cycle: CardCycle | null;
  active: boolean;
  effectiveFrom: MonthKey;
  effectiveTo: MonthKey | null;
  createdAt: string;
}

/**
 * A card is usable in a month only when it and its owning account are both active
 */
export function isCreditCardActiveIn(
  card: CreditCard,
  owner: BankAccount,
  month: MonthKey
): boolean {
  return (
    card.active &&
    isWithinRange(month, card.effectiveFrom, card.effectiveTo) &&
    isBankAccountActiveIn(owner, month)
  );
}
