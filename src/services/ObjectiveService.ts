import type { DatabaseAdapter } from '../infra/DatabaseAdapter.js';
import type { BudgetObjectiveRepository } from '../infra/repositories/BudgetObjectiveRepository.js';
import type { MonthRepository } from '../infra/repositories/MonthRepository.js';
import type { TransactionRepository } from '../infra/repositories/TransactionRepository.js';
import type { AuditRepository } from '../infra/repositories/AuditRepository.js';
import { validatePercentage, type BudgetObjective } from '../domain/entities/BudgetObjective.js';
import { isCategory, type Category } from '../domain/entities/Transaction.js';
import {
  evaluateObjectives,
  incomeTotal,
  projectObjectiveImpact,
  type ObjectiveEvaluation,
  type ObjectiveImpact,
} from '../domain/objectiveEvaluation.js';
import type { MonthKey } from '../domain/monthKey.js';
import { DuplicateObjectiveError, NotFoundError, ReferentialIntegrityError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

export interface ObjectiveInput {
  category: string;
  subcategory?: string | null;
  percentage: number;
}

export interface ObjectiveReport {
  month: MonthKey;
  incomeTotal: number;
  objectives: ObjectiveEvaluation[];
}

/**
 * ObjectiveService - budget objectives and their evaluation against posted spending
 */
export class ObjectiveService {
  constructor(
    private db: DatabaseAdapter,
    private objectiveRepo: BudgetObjectiveRepository,
    private monthRepo: MonthRepository,
    private transactionRepo: TransactionRepository,
    private auditRepo: AuditRepository
  ) {}

  listActive(): BudgetObjective[] {
    return this.objectiveRepo.listActive();
  }

  listHistory(): BudgetObjective[] {
    return this.objectiveRepo.listAll();
  }

  /**
   * Adds an objective; fails if one is already active for the same pair
   */
  createObjective(input: ObjectiveInput): BudgetObjective {
    const { category, subcategory, percentage } = this.parseInput(input);

    return this.db.transaction(() => {
      if (this.objectiveRepo.findActive(category, subcategory)) {
        throw new DuplicateObjectiveError(category, subcategory);
      }
      const objective = this.objectiveRepo.insert({ category, subcategory, percentage });
      this.auditRepo.log({
        eventType: 'objective_created',
        entityType: 'BudgetObjective',
        entityId: objective.id,
        metadata: { category, subcategory, percentage },
      });
      logger.info('Budget objective created', { id: objective.id, category, subcategory, percentage });
      return objective;
    });
  }

  /**
   * Deactivates the active objective of the pair, if any, and creates the new one
   */
  replaceObjective(input: ObjectiveInput): { objective: BudgetObjective; replaced: BudgetObjective | null } {
    const { category, subcategory, percentage } = this.parseInput(input);

    return this.db.transaction(() => {
      const existing = this.objectiveRepo.findActive(category, subcategory);
      const replaced = existing ? this.objectiveRepo.deactivate(existing.id) : null;
      const objective = this.objectiveRepo.insert({ category, subcategory, percentage });

      this.auditRepo.log({
        eventType: 'objective_replaced',
        entityType: 'BudgetObjective',
        entityId: objective.id,
        metadata: { category, subcategory, percentage, replacedId: replaced?.id ?? null },
      });
      logger.info('Budget objective replaced', {
        id: objective.id,
        replacedId: replaced?.id ?? null,
        percentage,
      });
      return { objective, replaced };
    });
  }

  deactivateObjective(id: number): BudgetObjective {
    return this.db.transaction(() => {
      const objective = this.objectiveRepo.findById(id);
      if (!objective) {
        throw new NotFoundError('BudgetObjective', id);
      }
      const deactivated = this.objectiveRepo.deactivate(id);
      this.auditRepo.log({
        eventType: 'objective_deactivated',
        entityType: 'BudgetObjective',
        entityId: id,
      });
      return deactivated;
    });
  }

  /**
   * Compares realized spending against every active objective. Read-only.
   */
  evaluate(month: MonthKey): ObjectiveReport {
    if (!this.monthRepo.findByKey(month)) {
      throw new NotFoundError('Month', month);
    }
    const transactions = this.transactionRepo.findByMonth(month);
    return {
      month,
      incomeTotal: incomeTotal(transactions),
      objectives: evaluateObjectives(this.objectiveRepo.listActive(), transactions),
    };
  }

  /**
   * What an extra expense would do to the objectives it falls under
   */
  checkImpact(
    month: MonthKey,
    addition: { category: Category; subcategory: string | null; amount: number }
  ): ObjectiveImpact[] {
    const transactions = this.monthRepo.findByKey(month) ? this.transactionRepo.findByMonth(month) : [];
    return projectObjectiveImpact(this.objectiveRepo.listActive(), transactions, addition);
  }

  private parseInput(input: ObjectiveInput): {
    category: Category;
    subcategory: string | null;
    percentage: number;
  } {
    if (!isCategory(input.category)) {
      throw new ReferentialIntegrityError(`Unknown category ${input.category}`, {
        category: input.category,
      });
    }
    validatePercentage(input.percentage);
    const subcategory = input.subcategory?.trim() || null;
    return { category: input.category, subcategory, percentage: input.percentage };
  }
}
