import type { IsoDate, MonthKey } from '../monthKey.js';

export const CATEGORIES = ['Fixed', 'Variable', 'Income', 'Savings'] as const;
export type Category = (typeof CATEGORIES)[number];

export function isCategory(value: string): value is Category {
  return (CATEGORIES as readonly string[]).includes(value);
}

export type PaymentMethod = 'debit' | 'credit_card' | 'cash';

export type TransactionType = 'normal' | 'correction';

export type TemplateKind = 'fixed_expense' | 'income_source';

/**
 * Recurring template series a generated transaction came from. The series outlives
 * replacements of the template.
 */
export interface TemplateRef {
  kind: TemplateKind;
  seriesId: number;
}

/**
 * Direct payment instrument. A card purchase reaches the owning bank account only in
 * `dueMonth`.
 */
export type Instrument =
  | { kind: 'bank_account'; bankAccountId: number }
  | {
      kind: 'credit_card';
      creditCardId: number;
      statementMonth: MonthKey;
      dueMonth: MonthKey;
      dueDate: IsoDate;
    }
  | { kind: 'cash' };

/**
 * Instrument as supplied by a caller, before the card cycle is resolved
 */
export type InstrumentRef =
  | { kind: 'bank_account'; bankAccountId: number }
  | { kind: 'credit_card'; creditCardId: number }
  | { kind: 'cash' };

interface TransactionFields {
  id: number;
  date: IsoDate;
  month: MonthKey; // Posting month
  amount: number; // Signed: positive = inflow
  category: Category;
  subcategory: string | null;
  paymentMethod: PaymentMethod;
  instrument: Instrument;
  note: string | null;
  createdAt: string;
}

export interface NormalTransaction extends TransactionFields {
  type: 'normal';
  template: TemplateRef | null;
}

/**
 * Adjusts an already closed month without reopening it
 */
export interface CorrectionTransaction extends TransactionFields {
  type: 'correction';
}

export type Transaction = NormalTransaction | CorrectionTransaction;

interface DraftFields {
  date: IsoDate;
  month: MonthKey;
  amount: number;
  category: Category;
  subcategory: string | null;
  instrument: InstrumentRef;
  note: string | null;
}

export type TransactionDraft =
  | (DraftFields & { type: 'normal'; template: TemplateRef | null })
  | (DraftFields & { type: 'correction' });

export function paymentMethodFor(instrument: Pick<Instrument, 'kind'>): PaymentMethod {
  switch (instrument.kind) {
    case 'bank_account':
      return 'debit';
    case 'credit_card':
      return 'credit_card';
    case 'cash':
      return 'cash';
  }
}

/**
 * Month in which the transaction moves money in a bank account
 */
export function cashEffectMonth(transaction: Pick<Transaction, 'month' | 'instrument'>): MonthKey {
  return transaction.instrument.kind === 'credit_card'
    ? transaction.instrument.dueMonth
    : transaction.month;
}

/**
 * Income is an inflow; every other category is an outflow
 */
export function signAmount(category: Category, amount: number): number {
  const magnitude = Math.abs(amount);
  return category === 'Income' ? magnitude : -magnitude;
}

export function templateKey(template: TemplateRef): string {
  return `${template.kind}:${template.seriesId}`;
}
