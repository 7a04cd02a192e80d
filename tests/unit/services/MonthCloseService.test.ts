import { describe, it, expect, beforeEach } from 'vitest';
import { createLedgerHarness, type LedgerHarness } from './ledgerHarness.js';
import {
  ClosedMonthError,
  CloseNotReadyError,
  NotFoundError,
  OutOfOrderCloseError,
  UnsettledAccountError,
  ValidationError,
} from '../../../src/domain/errors.js';

const checking = { kind: 'bank_account' as const, bankAccountId: 1 };

describe('MonthCloseService', () => {
  let ledger: LedgerHarness;

  beforeEach(() => {
    ledger = createLedgerHarness();
    ledger.masterDataService.createBankAccount({
      name: 'Checking',
      openingBalance: 1000,
      effectiveFrom: '2026-01',
    });
    ledger.monthCloseService.openInitialMonth('2026-01');
  });

  it('should close January and carry 2500 into February', () => {
    ledger.ledgerService.record({ date: '2026-01-05', amount: 2000, category: 'Income', instrument: checking });
    ledger.ledgerService.record({
      date: '2026-01-10',
      amount: 500,
      category: 'Fixed',
      subcategory: 'Rent',
      instrument: checking,
    });

    const result = ledger.monthCloseService.close('2026-01');

    expect(result.closedMonth.endingBalance).toBe(2500);
    expect(result.closedMonth.status).toBe('closed');
    expect(result.closedBalances).toEqual([
      { month: '2026-01', bankAccountId: 1, startingBalance: 1000, endingBalance: 2500 },
    ]);
    expect(result.nextBalances).toEqual([
      { month: '2026-02', bankAccountId: 1, startingBalance: 2500, endingBalance: null },
    ]);
    expect(result.warnings).toEqual([]);

    const months = ledger.monthCloseService.listMonths();
    expect(months.map((m) => [m.key, m.status, m.startingBalance, m.endingBalance])).toEqual([
      ['2026-01', 'closed', 1000, 2500],
      ['2026-02', 'open', 2500, null],
    ]);
    expect(ledger.monthCloseService.currentMonth().key).toBe('2026-02');
  });

  it('should refuse to open a second initial month', () => {
    expect(() => ledger.monthCloseService.openInitialMonth('2026-03')).toThrow(ValidationError);
  });

  it('should refuse to close a month twice', () => {
    ledger.monthCloseService.close('2026-01');
    expect(() => ledger.monthCloseService.close('2026-01')).toThrow(ClosedMonthError);
  });

  it('should refuse an unknown month', () => {
    expect(() => ledger.monthCloseService.close('2027-01')).toThrow(NotFoundError);
  });

  it('should refuse to close a month while an earlier one is open', () => {
    ledger.db.execute(
      `INSERT INTO months (month_id, starting_balance, status) VALUES ('2026-02', 1000, 'open')`
    );
    expect(() => ledger.monthCloseService.close('2026-02')).toThrow(OutOfOrderCloseError);
    expect(ledger.monthCloseService.listMonths().every((m) => m.status === 'open')).toBe(true);
  });

  it('should move card purchases into the balance of their due month', () => {
    ledger.masterDataService.createCreditCard({
      name: 'Visa',
      bankAccountId: 1,
      statementCloseDay: 25,
      dueDay: 10,
      effectiveFrom: '2026-01',
    });
    ledger.ledgerService.record({
      date: '2026-01-27',
      amount: 80,
      category: 'Variable',
      subcategory: 'Dining',
      instrument: { kind: 'credit_card', creditCardId: 1 },
    });

    expect(ledger.monthCloseService.close('2026-01').closedMonth.endingBalance).toBe(1000);
    expect(ledger.monthCloseService.close('2026-02').closedMonth.endingBalance).toBe(1000);
    expect(ledger.monthCloseService.close('2026-03').closedMonth.endingBalance).toBe(920);
  });

  it('should retire a settled account and leave it out of the next month', () => {
    ledger.masterDataService.createBankAccount({ name: 'Savings', openingBalance: 200, effectiveFrom: '2026-01' });
    ledger.ledgerService.record({
      date: '2026-01-12',
      amount: 200,
      category: 'Savings',
      subcategory: 'Transfer out',
      instrument: { kind: 'bank_account', bankAccountId: 2 },
    });
    ledger.masterDataService.deactivateBankAccount(2);

    const result = ledger.monthCloseService.close('2026-01');

    expect(result.retiredAccountIds).toEqual([2]);
    expect(result.nextBalances.map((row) => row.bankAccountId)).toEqual([1]);
    expect(result.nextMonth.startingBalance).toBe(1000);
  });

  it('should fail the whole close when a retiring account still holds money', () => {
    ledger.masterDataService.createBankAccount({
      name: 'Old savings',
      openingBalance: 50,
      effectiveFrom: '2026-01',
      effectiveTo: '2026-01',
    });

    expect(() => ledger.monthCloseService.close('2026-01')).toThrow(UnsettledAccountError);
    expect(ledger.monthCloseService.currentMonth().key).toBe('2026-01');
    expect(ledger.monthCloseService.listMonths()).toHaveLength(1);
  });

  describe('recurrence readiness', () => {
    beforeEach(() => {
      ledger.templateService.replace('fixed_expense', {
        name: 'Rent',
        amount: 500,
        dueDay: 5,
        subcategory: 'Housing',
        bankAccountId: 1,
      });
    });

    it('should block a strict close while recurring transactions are missing', () => {
      const run = () => ledger.monthCloseService.close('2026-01');
      expect(run).toThrow(CloseNotReadyError);
      try {
        run();
      } catch (error) {
        expect(error).toMatchObject({ details: { month: '2026-01', missing: ['Fixed expense: Rent'] } });
      }
    });

    it('should close with a warning under the permissive policy', () => {
      const permissive = createLedgerHarness({ CLOSE_POLICY: 'permissive' });
      permissive.masterDataService.createBankAccount({ name: 'Checking', effectiveFrom: '2026-01' });
      permissive.templateService.replace('fixed_expense', {
        name: 'Rent',
        amount: 500,
        dueDay: 5,
        subcategory: 'Housing',
        bankAccountId: 1,
      });
      permissive.monthCloseService.openInitialMonth('2026-01');

      const result = permissive.monthCloseService.close('2026-01');
      expect(result.warnings).toEqual(['Missing recurring transactions: Fixed expense: Rent']);
      expect(result.closedMonth.endingBalance).toBe(0);
    });

    it('should close once the month has been expanded', () => {
      ledger.recurrenceService.expandMonth('2026-01');
      expect(ledger.monthCloseService.close('2026-01').closedMonth.endingBalance).toBe(500);
    });
  });

  it('should expand recurrences of new months when auto-expansion is on', () => {
    const auto = createLedgerHarness({ RECURRENCE_AUTO_EXPAND: true });
    auto.masterDataService.createBankAccount({ name: 'Checking', openingBalance: 1000, effectiveFrom: '2026-01' });
    auto.templateService.replace('fixed_expense', {
      name: 'Rent',
      amount: 500,
      dueDay: 31,
      subcategory: 'Housing',
      bankAccountId: 1,
    });

    const opened = auto.monthCloseService.openInitialMonth('2026-01');
    expect(opened.expansion?.created.map((tx) => [tx.date, tx.amount])).toEqual([['2026-01-31', -500]]);

    const closed = auto.monthCloseService.close('2026-01');
    expect(closed.closedMonth.endingBalance).toBe(500);
    expect(closed.expansion?.created.map((tx) => tx.date)).toEqual(['2026-02-28']);
  });
});
