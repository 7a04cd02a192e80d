import type { DatabaseAdapter } from '../infra/DatabaseAdapter.js';
import type { TemplateRepository } from '../infra/repositories/TemplateRepository.js';
import type { BankAccountRepository } from '../infra/repositories/BankAccountRepository.js';
import type { AuditRepository } from '../infra/repositories/AuditRepository.js';
import {
  templateCategory,
  validateTemplateInput,
  type RecurringTemplate,
  type TemplateInput,
} from '../domain/entities/RecurringTemplate.js';
import type { TemplateKind } from '../domain/entities/Transaction.js';
import { NotFoundError, ReferentialIntegrityError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

/**
 * TemplateService - fixed expenses and income sources
 *
 * Saving a template with the name and subcategory of an active one replaces it; the old
 * row stays as inactive history and the new one joins its series.
 */
export class TemplateService {
  constructor(
    private db: DatabaseAdapter,
    private templateRepo: TemplateRepository,
    private accountRepo: BankAccountRepository,
    private auditRepo: AuditRepository
  ) {}

  list(kind: TemplateKind, includeInactive = false): RecurringTemplate[] {
    return this.templateRepo.list(kind, includeInactive);
  }

  replace(kind: TemplateKind, input: TemplateInput): RecurringTemplate {
    validateTemplateInput(input);
    const category = templateCategory(kind, input.category);
    const name = input.name.trim();
    const subcategory = input.subcategory?.trim() || null;

    return this.db.transaction(() => {
      if (input.bankAccountId !== null && !this.accountRepo.findById(input.bankAccountId)) {
        throw new ReferentialIntegrityError(`Bank account ${input.bankAccountId} does not exist`, {
          bankAccountId: input.bankAccountId,
        });
      }

      const { created, replacedIds } = this.templateRepo.replace(kind, {
        name,
        amount: input.amount,
        dueDay: input.dueDay,
        category,
        subcategory,
        bankAccountId: input.bankAccountId,
      });

      this.auditRepo.log({
        eventType: 'template_replaced',
        entityType: 'RecurringTemplate',
        entityId: `${kind}:${created.id}`,
        metadata: {
          name,
          seriesId: created.seriesId,
          amount: created.amount,
          dueDay: created.dueDay,
          replacedIds,
        },
      });
      logger.info('Recurring template saved', { kind, id: created.id, name, replacedIds });
      return created;
    });
  }

  deactivate(kind: TemplateKind, id: number): RecurringTemplate {
    return this.db.transaction(() => {
      if (!this.templateRepo.findById(kind, id)) {
        throw new NotFoundError(kind, id);
      }
      this.templateRepo.deactivate(kind, id);
      this.auditRepo.log({
        eventType: 'template_deactivated',
        entityType: 'RecurringTemplate',
        entityId: `${kind}:${id}`,
      });
      logger.info('Recurring template deactivated', { kind, id });

      const template = this.templateRepo.findById(kind, id);
      if (!template) {
        throw new NotFoundError(kind, id);
      }
      return template;
    });
  }
}
