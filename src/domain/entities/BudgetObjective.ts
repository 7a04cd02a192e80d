import { ValidationError } from '../errors.js';
import type { Category } from './Transaction.js';

/**
 * BudgetObjective - target share of the month's income for a category, or for one
 * subcategory of it. Replaced by deactivating and recreating, never edited.
 */
export interface BudgetObjective {
  id: number;
  category: Category;
  subcategory: string | null; // null = whole-category objective
  percentage: number; // Percent of income, e.g. 20 = 20 %
  active: boolean;
  createdAt: string;
  deactivatedAt: string | null;
}

export function validatePercentage(percentage: number): void {
  if (!Number.isFinite(percentage) || percentage < 0) {
    throw new ValidationError('Objective percentage must be a number >= 0', { percentage });
  }
}
