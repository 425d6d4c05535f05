import { z } from 'zod';

/** `YYYY-MM-DD` calendar date. */
export const calendarDateSchema = z.string().date();

/** Decimal amount as a JSON number or a plain decimal string; kept exact for decimal.js. */
export const moneySchema = z.union([
  z.number().finite(),
  z.string().regex(/^-?\d+(\.\d+)?$/, 'expected a decimal amount'),
]);

export const nonNegativeMoneySchema = moneySchema.refine((v) => Number(v) >= 0, {
  message: 'amount cannot be negative',
});

/** Upper bound of a PostgreSQL INTEGER column. */
const INTEGER_MAX = 2_147_483_647;

export const odometerSchema = z.number().int().min(0).max(INTEGER_MAX);

export const kmAllowanceSchema = z.number().int().min(0).max(INTEGER_MAX);

export const deliveryTimeSchema = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:MM');

/** Query-string boolean: `true`/`1` and `false`/`0`. */
export const queryFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((v) => v === 'true' || v === '1');

export const idParamSchema = z.string().min(1).max(64);
