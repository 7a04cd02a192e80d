import { describe, it, expect, beforeEach } from 'vitest';
import { createLedgerHarness, type LedgerHarness } from './ledgerHarness.js';
import { NotFoundError, ReferentialIntegrityError, ValidationError } from '../../../src/domain/errors.js';

describe('TemplateService', () => {
  let ledger: LedgerHarness;

  beforeEach(() => {
    ledger = createLedgerHarness();
    ledger.masterDataService.createBankAccount({ name: 'Checking', effectiveFrom: '2026-01' });
  });

  it('should replace a template with the same name and subcategory', () => {
    const first = ledger.templateService.replace('fixed_expense', {
      name: 'Rent',
      amount: 500,
      dueDay: 1,
      subcategory: 'Housing',
      bankAccountId: 1,
    });
    const second = ledger.templateService.replace('fixed_expense', {
      name: 'Rent',
      amount: 550,
      dueDay: 1,
      subcategory: 'Housing',
      bankAccountId: 1,
    });

    expect(first.category).toBe('Fixed');
    expect(second.id).not.toBe(first.id);
    expect(second.seriesId).toBe(first.id);
    expect(ledger.templateService.list('fixed_expense').map((t) => t.amount)).toEqual([550]);
    expect(ledger.templateService.list('fixed_expense', true).map((t) => [t.amount, t.active])).toEqual([
      [500, false],
      [550, true],
    ]);
  });

  it('should keep templates with another subcategory side by side', () => {
    ledger.templateService.replace('fixed_expense', { name: 'Insurance', amount: 40, dueDay: 3, subcategory: 'Car', bankAccountId: null });
    ledger.templateService.replace('fixed_expense', { name: 'Insurance', amount: 25, dueDay: 3, subcategory: 'Home', bankAccountId: null });

    expect(ledger.templateService.list('fixed_expense')).toHaveLength(2);
  });

  it('should allow savings templates and force income sources into Income', () => {
    expect(
      ledger.templateService.replace('fixed_expense', {
        name: 'Pension',
        amount: 200,
        dueDay: 2,
        category: 'Savings',
        subcategory: 'Retirement',
        bankAccountId: 1,
      }).category
    ).toBe('Savings');

    expect(() =>
      ledger.templateService.replace('income_source', {
        name: 'Salary',
        amount: 2000,
        dueDay: 28,
        category: 'Variable',
        subcategory: null,
        bankAccountId: 1,
      })
    ).toThrow(ValidationError);
  });

  it('should validate amount, due day and account', () => {
    const base = { name: 'Gym', amount: 30, dueDay: 5, subcategory: 'Health', bankAccountId: 1 };
    expect(() => ledger.templateService.replace('fixed_expense', { ...base, amount: 0 })).toThrow(ValidationError);
    expect(() => ledger.templateService.replace('fixed_expense', { ...base, dueDay: 32 })).toThrow(ValidationError);
    expect(() => ledger.templateService.replace('fixed_expense', { ...base, bankAccountId: 9 })).toThrow(
      ReferentialIntegrityError
    );
  });

  it('should deactivate a template', () => {
    const gym = ledger.templateService.replace('fixed_expense', {
      name: 'Gym',
      amount: 30,
      dueDay: 5,
      subcategory: 'Health',
      bankAccountId: null,
    });

    expect(ledger.templateService.deactivate('fixed_expense', gym.id).active).toBe(false);
    expect(ledger.templateService.list('fixed_expense')).toEqual([]);
    expect(() => ledger.templateService.deactivate('income_source', 99)).toThrow(NotFoundError);
  });
});
