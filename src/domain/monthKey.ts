import { ValidationError } from './errors.js';

/**
 * Calendar-month identifier, `YYYY-MM`. Keys sort lexicographically in calendar order.
 */
export type MonthKey = string;

/**
 * Calendar date, `YYYY-MM-DD`.
 */
export type IsoDate = string;

const MONTH_KEY_PATTERN = /^(\d{4})-(0[1-9]|1[0-2])$/;
const ISO_DATE_PATTERN = /^(\d{4})-(0[1-9]|1[0-2])-(\d{2})$/;

export function isMonthKey(value: string): value is MonthKey {
  return MONTH_KEY_PATTERN.test(value);
}

export function parseMonthKey(key: MonthKey): { year: number; month: number } {
  const match = MONTH_KEY_PATTERN.exec(key);
  if (!match) {
    throw new ValidationError(`Invalid month key "${key}", expected YYYY-MM`);
  }
  return { year: Number(match[1]), month: Number(match[2]) };
}

export function formatMonthKey(year: number, month: number): MonthKey {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}`;
}

export function addMonths(key: MonthKey, count: number): MonthKey {
  const { year, month } = parseMonthKey(key);
  const index = year * 12 + (month - 1) + count;
  return formatMonthKey(Math.floor(index / 12), (index % 12) + 1);
}

export function nextMonth(key: MonthKey): MonthKey {
  return addMonths(key, 1);
}

export function previousMonth(key: MonthKey): MonthKey {
  return addMonths(key, -1);
}

export function daysInMonth(key: MonthKey): number {
  const { year, month } = parseMonthKey(key);
  // Day 0 of the following month is the last day of this one
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Clamps a day-of-month to the last valid day (31 in April becomes 30)
 */
export function clampDay(key: MonthKey, day: number): number {
  return Math.min(day, daysInMonth(key));
}

export function formatDate(key: MonthKey, day: number): IsoDate {
  return `${key}-${String(day).padStart(2, '0')}`;
}

export function parseIsoDate(date: IsoDate): { month: MonthKey; day: number } {
  const match = ISO_DATE_PATTERN.exec(date);
  if (!match) {
    throw new ValidationError(`Invalid date "${date}", expected YYYY-MM-DD`);
  }
  const month = `${match[1]}-${match[2]}`;
  const day = Number(match[3]);
  if (day < 1 || day > daysInMonth(month)) {
    throw new ValidationError(`Invalid date "${date}", day out of range`);
  }
  return { month, day };
}

/**
 * Inclusive month range check; a null upper bound is open-ended
 */
export function isWithinRange(key: MonthKey, from: MonthKey, to: MonthKey | null): boolean {
  return from <= key && (to === null || key <= to);
}

export function roundMoney(value: number): number {
  // `+ 0` normalises -0
  return Math.round(value * 100) / 100 + 0;
}
