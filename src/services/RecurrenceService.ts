import type { DatabaseAdapter } from '../infra/DatabaseAdapter.js';
import type { MonthRepository } from '../infra/repositories/MonthRepository.js';
import type { BankAccountRepository } from '../infra/repositories/BankAccountRepository.js';
import type { TemplateRepository } from '../infra/repositories/TemplateRepository.js';
import type { TransactionRepository } from '../infra/repositories/TransactionRepository.js';
import type { AuditRepository } from '../infra/repositories/AuditRepository.js';
import type { LedgerService } from './LedgerService.js';
import { isBankAccountActiveIn } from '../domain/entities/BankAccount.js';
import type { Transaction } from '../domain/entities/Transaction.js';
import {
  candidateToDraft,
  candidateTotal,
  expandRecurrences,
  partitionCandidates,
  type RecurrenceCandidate,
} from '../domain/recurrence.js';
import type { MonthKey } from '../domain/monthKey.js';
import { ClosedMonthError, NotFoundError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

export interface RecurrencePreview {
  month: MonthKey;
  candidates: RecurrenceCandidate[];
  total: number;
}

export interface ExpansionResult {
  month: MonthKey;
  created: Transaction[];
  duplicates: RecurrenceCandidate[];
}

/**
 * RecurrenceService - generates the month's fixed expenses and income from templates
 */
export class RecurrenceService {
  constructor(
    private db: DatabaseAdapter,
    private monthRepo: MonthRepository,
    private accountRepo: BankAccountRepository,
    private templateRepo: TemplateRepository,
    private transactionRepo: TransactionRepository,
    private auditRepo: AuditRepository,
    private ledger: LedgerService
  ) {}

  candidatesFor(month: MonthKey): RecurrenceCandidate[] {
    const accounts = new Map(this.accountRepo.list().map((account) => [account.id, account]));
    return expandRecurrences(month, this.templateRepo.listAllActive(), (bankAccountId) => {
      const account = accounts.get(bankAccountId);
      return account !== undefined && isBankAccountActiveIn(account, month);
    });
  }

  /**
   * Candidates and their signed total, without writing anything
   */
  preview(month: MonthKey): RecurrencePreview {
    const candidates = this.candidatesFor(month);
    return { month, candidates, total: candidateTotal(candidates) };
  }

  /**
   * Candidates whose template has not produced a transaction in the month yet
   */
  findMissing(month: MonthKey): RecurrenceCandidate[] {
    return partitionCandidates(
      this.candidatesFor(month),
      this.transactionRepo.generatedTemplateKeys(month)
    ).fresh;
  }

  /**
   * Inserts every missing candidate as one unit. Running it again only reports
   * duplicates.
   */
  expandMonth(month: MonthKey): ExpansionResult {
    return this.db.transaction(() => {
      const target = this.monthRepo.findByKey(month);
      if (!target) {
        throw new NotFoundError('Month', month);
      }
      if (target.status === 'closed') {
        throw new ClosedMonthError(month);
      }

      const { fresh, duplicates } = partitionCandidates(
        this.candidatesFor(month),
        this.transactionRepo.generatedTemplateKeys(month)
      );
      const created = fresh.map((candidate) => this.ledger.insert(candidateToDraft(candidate)));

      if (created.length > 0) {
        this.auditRepo.log({
          eventType: 'recurrences_expanded',
          entityType: 'Month',
          entityId: month,
          metadata: { created: created.length, duplicates: duplicates.length },
        });
      }
      logger.info('Recurrences expanded', {
        month,
        created: created.length,
        duplicates: duplicates.length,
      });
      return { month, created, duplicates };
    });
  }
}
