import { describe, it, expect } from 'vitest';
import { parseCardCycle, resolveCardCycle } from '../../../src/domain/creditCardCycle.js';
import { InvalidCycleConfigError } from '../../../src/domain/errors.js';

describe('resolveCardCycle', () => {
  const cycle = { statementCloseDay: 25, dueDay: 10 };

  it('should bill a purchase before the close day on the same month statement', () => {
    expect(resolveCardCycle('2026-03-20', cycle)).toEqual({
      statementMonth: '2026-03',
      dueMonth: '2026-04',
      dueDate: '2026-04-10',
    });
  });

  it('should bill a purchase on the close day on the same month statement', () => {
    expect(resolveCardCycle('2026-03-25', cycle).statementMonth).toBe('2026-03');
  });

  it('should move a purchase after the close day to the next statement', () => {
    expect(resolveCardCycle('2026-03-27', cycle)).toEqual({
      statementMonth: '2026-04',
      dueMonth: '2026-05',
      dueDate: '2026-05-10',
    });
  });

  it('should keep the due date in the statement month when it falls after the close', () => {
    expect(resolveCardCycle('2026-03-03', { statementCloseDay: 5, dueDay: 28 })).toEqual({
      statementMonth: '2026-03',
      dueMonth: '2026-03',
      dueDate: '2026-03-28',
    });
  });

  it('should clamp close and due days into short months', () => {
    // Close day 31 becomes 28 in February, so the 28th still closes in February
    expect(resolveCardCycle('2026-02-28', { statementCloseDay: 31, dueDay: 30 })).toEqual({
      statementMonth: '2026-02',
      dueMonth: '2026-03',
      dueDate: '2026-03-30',
    });
  });

  it('should roll over the year end', () => {
    expect(resolveCardCycle('2026-12-28', cycle)).toEqual({
      statementMonth: '2027-01',
      dueMonth: '2027-02',
      dueDate: '2027-02-10',
    });
  });

  it('should fail when the card has no cycle', () => {
    expect(() => resolveCardCycle('2026-03-20', null)).toThrow(InvalidCycleConfigError);
  });

  it('should fail on days outside 1-31', () => {
    expect(() => resolveCardCycle('2026-03-20', { statementCloseDay: 0, dueDay: 10 })).toThrow(
      InvalidCycleConfigError
    );
  });
});

describe('parseCardCycle', () => {
  it('should return null when neither day is set', () => {
    expect(parseCardCycle(null, undefined)).toBeNull();
  });

  it('should require both days together', () => {
    expect(() => parseCardCycle(25, null)).toThrow(InvalidCycleConfigError);
    expect(() => parseCardCycle(undefined, 10)).toThrow(InvalidCycleConfigError);
  });

  it('should reject non-integer or out-of-range days', () => {
    expect(() => parseCardCycle(32, 10)).toThrow(InvalidCycleConfigError);
    expect(() => parseCardCycle(25, 1.5)).toThrow(InvalidCycleConfigError);
  });

  it('should build the cycle from valid days', () => {
    expect(parseCardCycle(25, 10)).toEqual({ statementCloseDay: 25, dueDay: 10 });
  });
});
