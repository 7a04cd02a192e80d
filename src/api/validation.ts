import { z, type ZodTypeAny } from 'zod';
import { ValidationError } from '../domain/errors.js';
import { isMonthKey, parseIsoDate } from '../domain/monthKey.js';

export const monthKeySchema = z.string().refine(isMonthKey, 'Expected a YYYY-MM month key');

export const isoDateSchema = z.string().refine((value) => {
  try {
    parseIsoDate(value);
    return true;
  } catch {
    return false;
  }
}, 'Expected a YYYY-MM-DD date');

export const instrumentSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('bank_account'), bankAccountId: z.number().int().positive() }),
  z.object({ kind: z.literal('credit_card'), creditCardId: z.number().int().positive() }),
  z.object({ kind: z.literal('cash') }),
]);

/**
 * Parses a request payload, turning schema failures into a ValidationError
 */
export function parseBody<S extends ZodTypeAny>(schema: S, body: unknown, message: string): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError(message, parsed.error.flatten());
  }
  return parsed.data;
}

export function parseMonthParam(value: string): string {
  if (!isMonthKey(value)) {
    throw new ValidationError(`Invalid month "${value}", expected YYYY-MM`);
  }
  return value;
}

export function parseIdParam(value: string): number {
  const id = Number(value);
  if (!Number.isInteger(id) || id <= 0) {
    throw new ValidationError(`Invalid id "${value}"`);
  }
  return id;
}
