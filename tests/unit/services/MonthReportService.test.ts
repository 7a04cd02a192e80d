import { describe, it, expect, beforeEach } from 'vitest';
import { createLedgerHarness, type LedgerHarness } from './ledgerHarness.js';
import { NotFoundError } from '../../../src/domain/errors.js';

describe('MonthReportService', () => {
  let ledger: LedgerHarness;

  beforeEach(() => {
    ledger = createLedgerHarness();
    ledger.masterDataService.createBankAccount({ name: 'Checking', openingBalance: 1000, effectiveFrom: '2026-01' });
    ledger.masterDataService.createCreditCard({
      name: 'Visa',
      bankAccountId: 1,
      statementCloseDay: 25,
      dueDay: 10,
      effectiveFrom: '2026-01',
    });
    ledger.monthCloseService.openInitialMonth('2026-01');
    ledger.ledgerService.record({
      date: '2026-01-20',
      amount: 100,
      category: 'Variable',
      subcategory: 'Dining',
      instrument: { kind: 'credit_card', creditCardId: 1 },
    });
  });

  it('should project the ending the close will produce', () => {
    const { summary } = ledger.monthReportService.getMonthDetail('2026-01');
    expect(summary).toEqual({
      month: '2026-01',
      status: 'open',
      startingBalance: 1000,
      net: -100,
      accountActivity: 0,
      projectedEnding: 1000,
      endingBalance: null,
    });

    const { closedMonth } = ledger.monthCloseService.close('2026-01');
    expect(closedMonth.endingBalance).toBe(summary.projectedEnding);
  });

  it('should charge the statement to the due month', () => {
    ledger.monthCloseService.close('2026-01');
    const detail = ledger.monthReportService.getMonthDetail('2026-02');

    expect(detail.transactions).toEqual([]);
    expect(detail.cardChargesDue.map((charge) => charge.transaction.amount)).toEqual([-100]);
    expect(detail.summary).toMatchObject({ net: 0, accountActivity: -100, projectedEnding: 900 });
    expect(detail.coverage).toEqual([
      {
        bankAccountId: 1,
        bankAccountName: 'Checking',
        startingBalance: 1000,
        projectedBalance: 1000,
        cardDue: 100,
        shortfall: 0,
      },
    ]);
  });

  it('should fail for a month that does not exist', () => {
    expect(() => ledger.monthReportService.getMonthDetail('2026-05')).toThrow(NotFoundError);
  });
});
