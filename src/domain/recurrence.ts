import { templateLabel, type RecurringTemplate } from './entities/RecurringTemplate.js';
import {
  signAmount,
  templateKey,
  type Category,
  type TemplateRef,
  type TransactionDraft,
} from './entities/Transaction.js';
import { clampDay, formatDate, roundMoney, type IsoDate, type MonthKey } from './monthKey.js';

/**
 * A transaction a recurring template expects in a given month
 */
export interface RecurrenceCandidate {
  template: TemplateRef;
  name: string;
  date: IsoDate;
  month: MonthKey;
  amount: number; // Signed
  category: Category;
  subcategory: string | null;
  bankAccountId: number | null;
  note: string;
}

/**
 * Turns active templates into the month's transaction candidates, one per template.
 * Templates tied to an account that is not active in the month produce nothing.
 */
export function expandRecurrences(
  month: MonthKey,
  templates: RecurringTemplate[],
  isAccountActive: (bankAccountId: number) => boolean
): RecurrenceCandidate[] {
  return templates
    .filter((template) => template.active)
    .filter((template) => template.bankAccountId === null || isAccountActive(template.bankAccountId))
    .map((template) => ({
      template: { kind: template.kind, seriesId: template.seriesId },
      name: template.name,
      date: formatDate(month, clampDay(month, template.dueDay)),
      month,
      amount: signAmount(template.category, template.amount),
      category: template.category,
      subcategory: template.subcategory,
      bankAccountId: template.bankAccountId,
      note: templateLabel(template),
    }))
    .sort((a, b) => (a.date === b.date ? a.name.localeCompare(b.name) : a.date < b.date ? -1 : 1));
}

/**
 * Splits candidates into those not generated yet and those whose template already
 * produced a transaction this month
 */
export function partitionCandidates(
  candidates: RecurrenceCandidate[],
  generated: ReadonlySet<string>
): { fresh: RecurrenceCandidate[]; duplicates: RecurrenceCandidate[] } {
  const fresh: RecurrenceCandidate[] = [];
  const duplicates: RecurrenceCandidate[] = [];
  for (const candidate of candidates) {
    (generated.has(templateKey(candidate.template)) ? duplicates : fresh).push(candidate);
  }
  return { fresh, duplicates };
}

export function candidateToDraft(candidate: RecurrenceCandidate): TransactionDraft {
  return {
    type: 'normal',
    template: candidate.template,
    date: candidate.date,
    month: candidate.month,
    amount: candidate.amount,
    category: candidate.category,
    subcategory: candidate.subcategory,
    instrument:
      candidate.bankAccountId === null
        ? { kind: 'cash' }
        : { kind: 'bank_account', bankAccountId: candidate.bankAccountId },
    note: candidate.note,
  };
}

export function candidateTotal(candidates: RecurrenceCandidate[]): number {
  return roundMoney(candidates.reduce((sum, candidate) => sum + candidate.amount, 0));
}
