import { describe, it, expect, beforeEach } from 'vitest';
import { createLedgerHarness, type LedgerHarness } from './ledgerHarness.js';
import {
  DuplicateObjectiveError,
  NotFoundError,
  ReferentialIntegrityError,
  ValidationError,
} from '../../../src/domain/errors.js';

const checking = { kind: 'bank_account' as const, bankAccountId: 1 };

describe('ObjectiveService', () => {
  let ledger: LedgerHarness;

  beforeEach(() => {
    ledger = createLedgerHarness();
    ledger.masterDataService.createBankAccount({ name: 'Checking', effectiveFrom: '2026-01' });
    ledger.monthCloseService.openInitialMonth('2026-01');
  });

  it('should evaluate a 20% Variable objective at 15% realized', () => {
    ledger.objectiveService.createObjective({ category: 'Variable', percentage: 20 });
    ledger.ledgerService.record({ date: '2026-01-01', amount: 3000, category: 'Income', instrument: checking });
    ledger.ledgerService.record({
      date: '2026-01-10',
      amount: 450,
      category: 'Variable',
      subcategory: 'Groceries',
      instrument: checking,
    });

    const report = ledger.objectiveService.evaluate('2026-01');

    expect(report.incomeTotal).toBe(3000);
    expect(report.objectives).toEqual([
      {
        objectiveId: 1,
        category: 'Variable',
        subcategory: null,
        targetPercentage: 20,
        realizedAmount: 450,
        plannedAmount: 600,
        realizedPercentage: 15,
        delta: -5,
      },
    ]);
  });

  it('should report undefined percentages for a month without income', () => {
    ledger.objectiveService.createObjective({ category: 'Savings', percentage: 10 });
    const [row] = ledger.objectiveService.evaluate('2026-01').objectives;
    expect(row.realizedPercentage).toBeNull();
    expect(row.delta).toBeNull();
  });

  it('should refuse an unknown month', () => {
    expect(() => ledger.objectiveService.evaluate('2030-01')).toThrow(NotFoundError);
  });

  it('should refuse a second active objective for the same pair', () => {
    ledger.objectiveService.createObjective({ category: 'Variable', subcategory: 'Dining', percentage: 5 });
    expect(() =>
      ledger.objectiveService.createObjective({ category: 'Variable', subcategory: ' Dining ', percentage: 8 })
    ).toThrow(DuplicateObjectiveError);

    // Another subcategory of the same category is a different pair
    expect(
      ledger.objectiveService.createObjective({ category: 'Variable', subcategory: 'Travel', percentage: 8 }).id
    ).toBe(2);
  });

  it('should replace an objective and keep the old one as history', () => {
    ledger.objectiveService.createObjective({ category: 'Variable', percentage: 20 });

    const { objective, replaced } = ledger.objectiveService.replaceObjective({
      category: 'Variable',
      percentage: 25,
    });

    expect(replaced).toMatchObject({ id: 1, active: false, percentage: 20 });
    expect(replaced?.deactivatedAt).not.toBeNull();
    expect(objective).toMatchObject({ id: 2, active: true, percentage: 25 });
    expect(ledger.objectiveService.listActive().map((o) => o.id)).toEqual([2]);
    expect(ledger.objectiveService.listHistory().map((o) => o.id)).toEqual([1, 2]);
  });

  it('should create through replace when nothing is active yet', () => {
    const { replaced } = ledger.objectiveService.replaceObjective({ category: 'Fixed', percentage: 50 });
    expect(replaced).toBeNull();
  });

  it('should deactivate an objective', () => {
    ledger.objectiveService.createObjective({ category: 'Fixed', percentage: 50 });
    expect(ledger.objectiveService.deactivateObjective(1).active).toBe(false);
    expect(ledger.objectiveService.listActive()).toEqual([]);
    expect(() => ledger.objectiveService.deactivateObjective(7)).toThrow(NotFoundError);
  });

  it('should validate category and percentage', () => {
    expect(() => ledger.objectiveService.createObjective({ category: 'Hobbies', percentage: 5 })).toThrow(
      ReferentialIntegrityError
    );
    expect(() => ledger.objectiveService.createObjective({ category: 'Fixed', percentage: -1 })).toThrow(
      ValidationError
    );
  });
});
