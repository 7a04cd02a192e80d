import { describe, it, expect } from 'vitest';
import {
  candidateToDraft,
  candidateTotal,
  expandRecurrences,
  partitionCandidates,
} from '../../../src/domain/recurrence.js';
import type { RecurringTemplate } from '../../../src/domain/entities/RecurringTemplate.js';

function template(overrides: Partial<RecurringTemplate>): RecurringTemplate {
  return {
    kind: 'fixed_expense',
    id: 1,
    name: 'Rent',
    amount: 500,
    dueDay: 5,
    category: 'Fixed',
    subcategory: 'Housing',
    bankAccountId: 1,
    seriesId: overrides.id ?? 1,
    active: true,
    createdAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('expandRecurrences', () => {
  const templates = [
    template({}),
    template({ kind: 'income_source', id: 1, name: 'Salary', amount: 2000, dueDay: 31, category: 'Income', subcategory: null }),
    template({ id: 2, name: 'Gym', amount: 40, dueDay: 5, subcategory: 'Health', bankAccountId: null }),
    template({ id: 3, name: 'Old lease', active: false }),
    template({ id: 4, name: 'Closed account bill', bankAccountId: 9 }),
  ];

  it('should produce one signed candidate per eligible template, ordered by date then name', () => {
    const candidates = expandRecurrences('2026-04', templates, (id) => id === 1);

    expect(candidates.map((c) => [c.name, c.date, c.amount])).toEqual([
      ['Gym', '2026-04-05', -40],
      ['Rent', '2026-04-05', -500],
      ['Salary', '2026-04-30', 2000],
    ]);
  });

  it('should label and tag candidates with their template', () => {
    const [, rent, salary] = expandRecurrences('2026-04', templates, () => true).filter(
      (c) => c.name !== 'Closed account bill'
    );
    expect(rent.note).toBe('Fixed expense: Rent');
    expect(rent.template).toEqual({ kind: 'fixed_expense', seriesId: 1 });
    expect(salary.note).toBe('Income: Salary');
    expect(salary.template).toEqual({ kind: 'income_source', seriesId: 1 });
  });

  it('should tag a replaced template with its original series', () => {
    const [rent] = expandRecurrences('2026-04', [template({ id: 7, seriesId: 1, amount: 550 })], () => true);

    expect(rent.template).toEqual({ kind: 'fixed_expense', seriesId: 1 });
    expect(partitionCandidates([rent], new Set(['fixed_expense:1'])).duplicates).toEqual([rent]);
  });

  it('should split candidates already generated this month', () => {
    const candidates = expandRecurrences('2026-04', templates, (id) => id === 1);
    const { fresh, duplicates } = partitionCandidates(candidates, new Set(['fixed_expense:1']));

    expect(fresh.map((c) => c.name)).toEqual(['Gym', 'Salary']);
    expect(duplicates.map((c) => c.name)).toEqual(['Rent']);
  });

  it('should total candidates and turn them into normal drafts', () => {
    const candidates = expandRecurrences('2026-04', templates, (id) => id === 1);
    expect(candidateTotal(candidates)).toBe(1460);

    const gym = candidateToDraft(candidates[0]);
    expect(gym).toMatchObject({
      type: 'normal',
      template: { kind: 'fixed_expense', seriesId: 2 },
      month: '2026-04',
      instrument: { kind: 'cash' },
    });
    expect(candidateToDraft(candidates[1]).instrument).toEqual({ kind: 'bank_account', bankAccountId: 1 });
  });
});
