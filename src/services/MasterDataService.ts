import type { DatabaseAdapter } from '../infra/DatabaseAdapter.js';
import type { MonthRepository } from '../infra/repositories/MonthRepository.js';
import type { BankAccountRepository } from '../infra/repositories/BankAccountRepository.js';
import type { CreditCardRepository } from '../infra/repositories/CreditCardRepository.js';
import type { AccountBalanceRepository } from '../infra/repositories/AccountBalanceRepository.js';
import type { TransactionRepository } from '../infra/repositories/TransactionRepository.js';
import type { AuditRepository } from '../infra/repositories/AuditRepository.js';
import {
  isBankAccountActiveIn,
  validateEffectiveRange,
  type BankAccount,
} from '../domain/entities/BankAccount.js';
import type { CreditCard } from '../domain/entities/CreditCard.js';
import { parseCardCycle } from '../domain/creditCardCycle.js';
import { roundMoney, type MonthKey } from '../domain/monthKey.js';
import {
  ClosedMonthError,
  ReferentialIntegrityError,
  UnsettledAccountError,
  ValidationError,
} from '../domain/errors.js';
import { logger } from '../infra/logger.js';

export interface CreateBankAccountInput {
  name: string;
  openingBalance?: number;
  effectiveFrom: MonthKey;
  effectiveTo?: MonthKey | null;
}

export interface CreateCreditCardInput {
  name: string;
  bankAccountId: number;
  statementCloseDay?: number | null;
  dueDay?: number | null;
  effectiveFrom: MonthKey;
  effectiveTo?: MonthKey | null;
}

/**
 * MasterDataService - bank accounts and credit cards
 *
 * Nothing is deleted. Accounts and cards retire through the active flag and
 * `effectiveTo`; closed months are never touched.
 */
export class MasterDataService {
  constructor(
    private db: DatabaseAdapter,
    private monthRepo: MonthRepository,
    private accountRepo: BankAccountRepository,
    private cardRepo: CreditCardRepository,
    private balanceRepo: AccountBalanceRepository,
    private transactionRepo: TransactionRepository,
    private auditRepo: AuditRepository
  ) {}

  listBankAccounts(): BankAccount[] {
    return this.accountRepo.list();
  }

  listActiveBankAccounts(month: MonthKey): BankAccount[] {
    return this.accountRepo.listActiveIn(month);
  }

  listCreditCards(): CreditCard[] {
    return this.cardRepo.list();
  }

  /**
   * Creates an account and gives it a balance row in every open month it is active in
   */
  createBankAccount(input: CreateBankAccountInput): BankAccount {
    const name = input.name.trim();
    if (name === '') {
      throw new ValidationError('Account name must be a non-empty string');
    }
    const openingBalance = input.openingBalance ?? 0;
    if (!Number.isFinite(openingBalance)) {
      throw new ValidationError('Opening balance must be a number');
    }
    const effectiveTo = input.effectiveTo ?? null;
    validateEffectiveRange(input.effectiveFrom, effectiveTo);

    return this.db.transaction(() => {
      this.assertAfterClosedMonths(input.effectiveFrom);

      const account = this.accountRepo.create({
        name,
        active: true,
        openingBalance: roundMoney(openingBalance),
        effectiveFrom: input.effectiveFrom,
        effectiveTo,
      });
      const seeded = this.seedOpenMonths(account);

      this.auditRepo.log({
        eventType: 'account_created',
        entityType: 'BankAccount',
        entityId: account.id,
        metadata: { name, effectiveFrom: account.effectiveFrom, seededMonths: seeded },
      });
      logger.info('Bank account created', { id: account.id, name, seededMonths: seeded });
      return account;
    });
  }

  /**
   * Brings a retired account back from the current month onwards. Its range must not
   * leave a closed month without a balance row.
   */
  activateBankAccount(id: number): BankAccount {
    return this.db.transaction(() => {
      const account = this.accountRepo.getById(id);
      if (account.active && account.effectiveTo === null) {
        return account;
      }
      const closed = this.monthRepo.latestClosedKey();
      if (closed !== null && account.effectiveTo !== null && account.effectiveTo < closed) {
        throw new ClosedMonthError(
          closed,
          `Account ${id} cannot be reactivated: it was retired before closed month ${closed}`
        );
      }

      this.accountRepo.setActive(id, true);
      const activated = this.accountRepo.setEffectiveTo(id, null);
      const seeded = this.seedOpenMonths(activated);
      this.auditRepo.log({
        eventType: 'account_activated',
        entityType: 'BankAccount',
        entityId: id,
        metadata: { seededMonths: seeded },
      });
      logger.info('Bank account activated', { id, seededMonths: seeded });
      return activated;
    });
  }

  /**
   * Retires an account from `effectiveTo` (default: the current month) onwards. The
   * account must be settled: zero balance in that month and no card statements due later.
   */
  deactivateBankAccount(id: number, effectiveTo?: MonthKey): BankAccount {
    return this.db.transaction(() => {
      const account = this.accountRepo.getById(id);
      const lastMonth = effectiveTo ?? this.monthRepo.findCurrent()?.key;
      if (lastMonth === undefined) {
        throw new ValidationError('effectiveTo is required while no month is open');
      }
      validateEffectiveRange(account.effectiveFrom, lastMonth);
      if (account.effectiveTo !== null && lastMonth > account.effectiveTo) {
        throw new ValidationError('An account cannot be retired later than its current effectiveTo', {
          effectiveTo: account.effectiveTo,
        });
      }
      this.assertAfterClosedMonths(lastMonth);
      this.assertSettled(account, lastMonth);

      const retired = this.accountRepo.setEffectiveTo(id, lastMonth);
      this.auditRepo.log({
        eventType: 'account_deactivated',
        entityType: 'BankAccount',
        entityId: id,
        metadata: { effectiveTo: lastMonth },
      });
      logger.info('Bank account deactivated', { id, effectiveTo: lastMonth });
      return retired;
    });
  }

  createCreditCard(input: CreateCreditCardInput): CreditCard {
    const name = input.name.trim();
    if (name === '') {
      throw new ValidationError('Card name must be a non-empty string');
    }
    const cycle = parseCardCycle(input.statementCloseDay, input.dueDay);
    const effectiveTo = input.effectiveTo ?? null;
    validateEffectiveRange(input.effectiveFrom, effectiveTo);

    return this.db.transaction(() => {
      const owner = this.accountRepo.findById(input.bankAccountId);
      if (!owner || !isBankAccountActiveIn(owner, input.effectiveFrom)) {
        throw new ReferentialIntegrityError(
          `Bank account ${input.bankAccountId} is not active in ${input.effectiveFrom}`,
          { bankAccountId: input.bankAccountId, month: input.effectiveFrom }
        );
      }

      const card = this.cardRepo.create({
        name,
        bankAccountId: owner.id,
        cycle,
        active: true,
        effectiveFrom: input.effectiveFrom,
        effectiveTo,
      });
      this.auditRepo.log({
        eventType: 'card_created',
        entityType: 'CreditCard',
        entityId: card.id,
        metadata: { name, bankAccountId: owner.id, cycle },
      });
      logger.info('Credit card created', { id: card.id, name, bankAccountId: owner.id });
      return card;
    });
  }

  /**
   * Changes the statement cycle. Transactions already recorded keep their due months.
   */
  updateCreditCardCycle(
    id: number,
    statementCloseDay: number | null,
    dueDay: number | null
  ): CreditCard {
    const cycle = parseCardCycle(statementCloseDay, dueDay);
    return this.db.transaction(() => {
      this.cardRepo.getById(id);
      const card = this.cardRepo.setCycle(id, cycle);
      this.auditRepo.log({
        eventType: 'card_cycle_updated',
        entityType: 'CreditCard',
        entityId: id,
        metadata: { cycle },
      });
      logger.info('Credit card cycle updated', { id, cycle });
      return card;
    });
  }

  activateCreditCard(id: number): CreditCard {
    return this.db.transaction(() => {
      const card = this.cardRepo.getById(id);
      if (card.active && card.effectiveTo === null) {
        return card;
      }
      this.cardRepo.setActive(id, true);
      const activated = this.cardRepo.setEffectiveTo(id, null);
      this.auditRepo.log({ eventType: 'card_activated', entityType: 'CreditCard', entityId: id });
      logger.info('Credit card activated', { id });
      return activated;
    });
  }

  /**
   * Stops a card from `effectiveTo` (default: the current month) onwards. Statements
   * already billed stay due on the owning account.
   */
  deactivateCreditCard(id: number, effectiveTo?: MonthKey): CreditCard {
    return this.db.transaction(() => {
      const card = this.cardRepo.getById(id);
      const lastMonth = effectiveTo ?? this.monthRepo.findCurrent()?.key;
      if (lastMonth === undefined) {
        throw new ValidationError('effectiveTo is required while no month is open');
      }
      validateEffectiveRange(card.effectiveFrom, lastMonth);
      this.assertAfterClosedMonths(lastMonth);

      const retired = this.cardRepo.setEffectiveTo(id, lastMonth);
      this.auditRepo.log({
        eventType: 'card_deactivated',
        entityType: 'CreditCard',
        entityId: id,
        metadata: { effectiveTo: lastMonth },
      });
      logger.info('Credit card deactivated', { id, effectiveTo: lastMonth });
      return retired;
    });
  }

  private assertAfterClosedMonths(month: MonthKey): void {
    const closed = this.monthRepo.latestClosedKey();
    if (closed !== null && month <= closed) {
      throw new ClosedMonthError(closed, `Month ${closed} is closed; changes must start after it`);
    }
  }

  private assertSettled(account: BankAccount, lastMonth: MonthKey): void {
    const row = this.balanceRepo.find(lastMonth, account.id);
    if (row) {
      const ending = roundMoney(row.startingBalance + this.transactionRepo.sumForAccount(lastMonth, account.id));
      if (ending !== 0) {
        throw new UnsettledAccountError(
          account.id,
          `Account ${account.id} would retire in ${lastMonth} with a balance of ${ending}`,
          { month: lastMonth, endingBalance: ending }
        );
      }
    }

    const pending = this.transactionRepo.sumCardDueAfter(lastMonth, account.id);
    if (pending !== 0) {
      throw new UnsettledAccountError(
        account.id,
        `Account ${account.id} still pays card statements due after ${lastMonth}`,
        { month: lastMonth, pendingCardDue: pending }
      );
    }
  }

  /**
   * Adds a starting row for the account in every open month of its range
   */
  private seedOpenMonths(account: BankAccount): MonthKey[] {
    const months = this.monthRepo
      .findOpenFrom(account.effectiveFrom)
      .filter((month) => isBankAccountActiveIn(account, month.key))
      .filter((month) => this.balanceRepo.find(month.key, account.id) === null);

    // A reactivated account resumes from its last closed balance
    const history = this.balanceRepo.findByAccountFrom(account.id, account.effectiveFrom);
    const lastEnding = history.filter((row) => row.endingBalance !== null).pop()?.endingBalance;
    const startingBalance = lastEnding ?? account.openingBalance;

    for (const month of months) {
      this.balanceRepo.insertMany([
        { month: month.key, bankAccountId: account.id, startingBalance, endingBalance: null },
      ]);
      this.monthRepo.adjustBalances(month.key, startingBalance, 0);
    }
    return months.map((month) => month.key);
  }
}
