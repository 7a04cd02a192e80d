import { InvalidCycleConfigError } from './errors.js';
import type { CardCycle } from './entities/CreditCard.js';
import {
  clampDay,
  formatDate,
  nextMonth,
  parseIsoDate,
  type IsoDate,
  type MonthKey,
} from './monthKey.js';

export interface CardCycleResolution {
  statementMonth: MonthKey; // Billing cycle the purchase belongs to
  dueMonth: MonthKey; // Month the statement is paid from the owning account
  dueDate: IsoDate;
}

function assertDay(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 1 || value > 31) {
    throw new InvalidCycleConfigError(`${field} must be an integer between 1 and 31`, {
      [field]: value,
    });
  }
}

/**
 * Normalises the two cycle days of a card: both absent means no cycle, both present
 * means a cycle, anything else is malformed.
 */
export function parseCardCycle(
  statementCloseDay: number | null | undefined,
  dueDay: number | null | undefined
): CardCycle | null {
  const hasClose = statementCloseDay !== null && statementCloseDay !== undefined;
  const hasDue = dueDay !== null && dueDay !== undefined;

  if (!hasClose && !hasDue) {
    return null;
  }
  if (!hasClose || !hasDue) {
    throw new InvalidCycleConfigError('statementCloseDay and dueDay must be set together', {
      statementCloseDay: statementCloseDay ?? null,
      dueDay: dueDay ?? null,
    });
  }

  assertDay('statementCloseDay', statementCloseDay);
  assertDay('dueDay', dueDay);
  return { statementCloseDay, dueDay };
}

/**
 * Maps a card purchase date to its statement month and the date that statement is due.
 *
 * A purchase on or before the (clamped) close day belongs to the statement closing in
 * the same month, otherwise to the next month's statement. The due date is the first
 * occurrence of the due day strictly after the statement close date.
 */
export function resolveCardCycle(date: IsoDate, cycle: CardCycle | null): CardCycleResolution {
  if (!cycle) {
    throw new InvalidCycleConfigError('Credit card has no statement cycle configured', { date });
  }
  const { statementCloseDay, dueDay } = cycle;
  assertDay('statementCloseDay', statementCloseDay);
  assertDay('dueDay', dueDay);

  const purchase = parseIsoDate(date);
  const statementMonth =
    purchase.day <= clampDay(purchase.month, statementCloseDay)
      ? purchase.month
      : nextMonth(purchase.month);
  const closeDay = clampDay(statementMonth, statementCloseDay);

  let dueMonth = statementMonth;
  let dueDayInMonth = clampDay(dueMonth, dueDay);
  if (dueDayInMonth <= closeDay) {
    dueMonth = nextMonth(statementMonth);
    dueDayInMonth = clampDay(dueMonth, dueDay);
  }

  return {
    statementMonth,
    dueMonth,
    dueDate: formatDate(dueMonth, dueDayInMonth),
  };
}
