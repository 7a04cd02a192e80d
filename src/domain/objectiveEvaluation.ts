import type { BudgetObjective } from './entities/BudgetObjective.js';
import type { Category, Transaction } from './entities/Transaction.js';
import { roundMoney } from './monthKey.js';

/**
 * One report row per active objective. `realizedPercentage` and `delta` are null when
 * the month has no income yet.
 */
export interface ObjectiveEvaluation {
  objectiveId: number;
  category: Category;
  subcategory: string | null;
  targetPercentage: number;
  realizedAmount: number;
  plannedAmount: number;
  realizedPercentage: number | null;
  delta: number | null; // realized - target, in percentage points; negative = under target
}

export interface ObjectiveImpact {
  objectiveId: number;
  category: Category;
  subcategory: string | null;
  plannedAmount: number;
  actualAmount: number;
  simulatedAmount: number;
  exceeds: boolean;
}

type Posted = Pick<Transaction, 'amount' | 'category' | 'subcategory'>;

function matches(objective: Pick<BudgetObjective, 'category' | 'subcategory'>, tx: Posted): boolean {
  return (
    tx.category === objective.category &&
    (objective.subcategory === null || tx.subcategory === objective.subcategory)
  );
}

/**
 * Sum of Income-category inflows
 */
export function incomeTotal(transactions: Posted[]): number {
  return roundMoney(
    transactions
      .filter((tx) => tx.category === 'Income' && tx.amount > 0)
      .reduce((sum, tx) => sum + tx.amount, 0)
  );
}

export function realizedAmount(
  objective: Pick<BudgetObjective, 'category' | 'subcategory'>,
  transactions: Posted[]
): number {
  const net = transactions.filter((tx) => matches(objective, tx)).reduce((sum, tx) => sum + tx.amount, 0);
  return roundMoney(Math.abs(net));
}

export function evaluateObjectives(
  objectives: BudgetObjective[],
  transactions: Posted[]
): ObjectiveEvaluation[] {
  const income = incomeTotal(transactions);

  return objectives
    .filter((objective) => objective.active)
    .map((objective) => {
      const realized = realizedAmount(objective, transactions);
      const realizedPercentage = income === 0 ? null : roundMoney((realized / income) * 100);
      return {
        objectiveId: objective.id,
        category: objective.category,
        subcategory: objective.subcategory,
        targetPercentage: objective.percentage,
        realizedAmount: realized,
        plannedAmount: roundMoney((income * objective.percentage) / 100),
        realizedPercentage,
        delta: realizedPercentage === null ? null : roundMoney(realizedPercentage - objective.percentage),
      };
    });
}

/**
 * Projects what an additional expense would do to every active objective it falls
 * under. Nothing is projected while the month has no income.
 */
export function projectObjectiveImpact(
  objectives: BudgetObjective[],
  transactions: Posted[],
  addition: { category: Category; subcategory: string | null; amount: number }
): ObjectiveImpact[] {
  const income = incomeTotal(transactions);
  if (income === 0) {
    return [];
  }

  return objectives
    .filter((objective) => objective.active && matches(objective, { ...addition }))
    .map((objective) => {
      const plannedAmount = roundMoney((income * objective.percentage) / 100);
      const actualAmount = realizedAmount(objective, transactions);
      const simulatedAmount = roundMoney(actualAmount + Math.abs(addition.amount));
      return {
        objectiveId: objective.id,
        category: objective.category,
        subcategory: objective.subcategory,
        plannedAmount,
        actualAmount,
        simulatedAmount,
        exceeds: simulatedAmount > plannedAmount,
      };
    });
}
