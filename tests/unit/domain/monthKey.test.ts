import { describe, it, expect } from 'vitest';
import {
  addMonths,
  clampDay,
  daysInMonth,
  isMonthKey,
  isWithinRange,
  nextMonth,
  parseIsoDate,
  previousMonth,
  roundMoney,
} from '../../../src/domain/monthKey.js';
import { ValidationError } from '../../../src/domain/errors.js';

describe('monthKey', () => {
  it('should recognise YYYY-MM keys only', () => {
    expect(isMonthKey('2026-01')).toBe(true);
    expect(isMonthKey('2026-13')).toBe(false);
    expect(isMonthKey('2026-1')).toBe(false);
    expect(isMonthKey('2026-01-05')).toBe(false);
  });

  it('should step across year boundaries', () => {
    expect(nextMonth('2025-12')).toBe('2026-01');
    expect(previousMonth('2026-01')).toBe('2025-12');
    expect(addMonths('2026-03', -14)).toBe('2025-01');
  });

  it('should count days including leap years', () => {
    expect(daysInMonth('2026-02')).toBe(28);
    expect(daysInMonth('2028-02')).toBe(29);
    expect(daysInMonth('2026-04')).toBe(30);
  });

  it('should clamp a due day into short months', () => {
    expect(clampDay('2026-04', 31)).toBe(30);
    expect(clampDay('2026-02', 30)).toBe(28);
    expect(clampDay('2026-01', 15)).toBe(15);
  });

  it('should parse dates and reject days the month does not have', () => {
    expect(parseIsoDate('2026-03-31')).toEqual({ month: '2026-03', day: 31 });
    expect(() => parseIsoDate('2026-02-30')).toThrow(ValidationError);
    expect(() => parseIsoDate('26-02-01')).toThrow(ValidationError);
  });

  it('should treat effective ranges as inclusive', () => {
    expect(isWithinRange('2026-01', '2026-01', '2026-03')).toBe(true);
    expect(isWithinRange('2026-03', '2026-01', '2026-03')).toBe(true);
    expect(isWithinRange('2026-04', '2026-01', '2026-03')).toBe(false);
    expect(isWithinRange('2030-01', '2026-01', null)).toBe(true);
    expect(isWithinRange('2025-12', '2026-01', null)).toBe(false);
  });

  it('should round to cents without negative zero', () => {
    expect(roundMoney(0.1 + 0.2)).toBe(0.3);
    expect(Object.is(roundMoney(-0.001), 0)).toBe(true);
  });
});
