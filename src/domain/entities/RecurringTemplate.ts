import { ValidationError } from '../errors.js';
import type { Category, TemplateKind } from './Transaction.js';

/**
 * FixedExpense / IncomeSource template - generates one transaction per month.
 * Not a transaction itself.
 */
export interface RecurringTemplate {
  kind: TemplateKind;
  id: number;
  name: string;
  amount: number; // Always positive; the sign comes from the kind
  dueDay: number; // 1-31, clamped into short months
  category: Category;
  subcategory: string | null;
  bankAccountId: number | null;
  seriesId: number; // Id of the first version; kept by replacements
  active: boolean;
  createdAt: string;
}

export type TemplateInput = Pick<
  RecurringTemplate,
  'name' | 'amount' | 'dueDay' | 'subcategory' | 'bankAccountId'
> & { category?: Category };

const EXPENSE_CATEGORIES: readonly Category[] = ['Fixed', 'Variable', 'Savings'];

/**
 * Resolves the category of a template, defaulting by kind
 */
export function templateCategory(kind: TemplateKind, category?: Category): Category {
  if (kind === 'income_source') {
    if (category !== undefined && category !== 'Income') {
      throw new ValidationError('Income sources must use the Income category');
    }
    return 'Income';
  }
  const resolved = category ?? 'Fixed';
  if (!EXPENSE_CATEGORIES.includes(resolved)) {
    throw new ValidationError(`Fixed expenses cannot use the ${resolved} category`);
  }
  return resolved;
}

export function validateTemplateInput(input: TemplateInput): void {
  if (!input.name || input.name.trim() === '') {
    throw new ValidationError('Template name must be a non-empty string');
  }
  if (!Number.isFinite(input.amount) || input.amount <= 0) {
    throw new ValidationError('Template amount must be a positive number');
  }
  if (!Number.isInteger(input.dueDay) || input.dueDay < 1 || input.dueDay > 31) {
    throw new ValidationError('Template dueDay must be an integer between 1 and 31');
  }
}

export function templateLabel(template: Pick<RecurringTemplate, 'kind' | 'name'>): string {
  return template.kind === 'fixed_expense'
    ? `Fixed expense: ${template.name}`
    : `Income: ${template.name}`;
}
