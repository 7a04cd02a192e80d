import { describe, it, expect } from 'vitest';
import {
  evaluateObjectives,
  incomeTotal,
  projectObjectiveImpact,
} from '../../../src/domain/objectiveEvaluation.js';
import type { BudgetObjective } from '../../../src/domain/entities/BudgetObjective.js';
import type { Category } from '../../../src/domain/entities/Transaction.js';

function objective(id: number, category: Category, percentage: number, subcategory: string | null = null): BudgetObjective {
  return {
    id,
    category,
    subcategory,
    percentage,
    active: true,
    createdAt: '2026-01-01T00:00:00.000Z',
    deactivatedAt: null,
  };
}

const posted = [
  { amount: 3000, category: 'Income' as const, subcategory: null },
  { amount: -300, category: 'Variable' as const, subcategory: 'Groceries' },
  { amount: -150, category: 'Variable' as const, subcategory: 'Dining' },
  { amount: -800, category: 'Fixed' as const, subcategory: 'Rent' },
];

describe('evaluateObjectives', () => {
  it('should report realized share against target', () => {
    const [variable] = evaluateObjectives([objective(1, 'Variable', 20)], posted);

    expect(variable).toEqual({
      objectiveId: 1,
      category: 'Variable',
      subcategory: null,
      targetPercentage: 20,
      realizedAmount: 450,
      plannedAmount: 600,
      realizedPercentage: 15,
      delta: -5,
    });
  });

  it('should narrow to the subcategory when one is set', () => {
    const [groceries] = evaluateObjectives([objective(2, 'Variable', 5, 'Groceries')], posted);
    expect(groceries.realizedAmount).toBe(300);
    expect(groceries.realizedPercentage).toBe(10);
    expect(groceries.delta).toBe(5);
  });

  it('should leave percentages undefined when there is no income', () => {
    const [row] = evaluateObjectives([objective(1, 'Variable', 20)], posted.slice(1));
    expect(row.realizedAmount).toBe(450);
    expect(row.plannedAmount).toBe(0);
    expect(row.realizedPercentage).toBeNull();
    expect(row.delta).toBeNull();
  });

  it('should skip inactive objectives', () => {
    const inactive = { ...objective(1, 'Variable', 20), active: false };
    expect(evaluateObjectives([inactive], posted)).toEqual([]);
  });
});

describe('incomeTotal', () => {
  it('should only count income inflows', () => {
    expect(incomeTotal([...posted, { amount: -100, category: 'Income', subcategory: null }])).toBe(3000);
  });
});

describe('projectObjectiveImpact', () => {
  it('should flag an expense that pushes the category past plan', () => {
    const impacts = projectObjectiveImpact([objective(1, 'Variable', 20)], posted, {
      category: 'Variable',
      subcategory: 'Dining',
      amount: 200,
    });

    expect(impacts).toEqual([
      {
        objectiveId: 1,
        category: 'Variable',
        subcategory: null,
        plannedAmount: 600,
        actualAmount: 450,
        simulatedAmount: 650,
        exceeds: true,
      },
    ]);
  });

  it('should ignore objectives of other subcategories', () => {
    const impacts = projectObjectiveImpact([objective(2, 'Variable', 5, 'Groceries')], posted, {
      category: 'Variable',
      subcategory: 'Dining',
      amount: 10,
    });
    expect(impacts).toEqual([]);
  });

  it('should project nothing without income', () => {
    expect(
      projectObjectiveImpact([objective(1, 'Variable', 20)], [], {
        category: 'Variable',
        subcategory: null,
        amount: 10,
      })
    ).toEqual([]);
  });
});
