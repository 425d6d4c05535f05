import { ValidationError } from '../errors.js';
import { addDays, diffDays, type CalendarDate } from '../values/calendar-date.js';
import {
  money,
  nonNegative,
  roundMoney,
  sumMoney,
  ZERO,
  type Money,
  type MoneyInput,
} from '../values/money.js';

/**
 * Pricing Engine.
 *
 * Pure functions over decimal money. Every derived figure is rounded to two
 * places (half-even) as soon as it is produced, so repeated additions of
 * stored totals cannot drift.
 */

export interface ExtraChargesInput {
  wash?: MoneyInput;
  fines?: MoneyInput;
  damages?: MoneyInput;
  other?: MoneyInput;
}

export type Settlement = 'balance_due' | 'settled' | 'refund_due';

export interface FinalTotalInput {
  dailyCharge: MoneyInput;
  kmCharge: MoneyInput;
  extras: ExtraChargesInput;
  advancePaid: MoneyInput;
  partialPaid: MoneyInput;
  /** Only for discounts not already folded into `dailyCharge`. */
  discount?: MoneyInput;
}

export interface FinalTotal {
  readonly dailyCharge: Money;
  readonly kmCharge: Money;
  readonly extrasTotal: Money;
  readonly subtotal: Money;
  readonly grandTotal: Money;
  readonly totalPaid: Money;
  /** grandTotal − paid. Negative means the customer is owed money. */
  readonly signedBalance: Money;
  /** Stored invariant field, floored at zero. */
  readonly remainingBalance: Money;
  readonly refundDue: Money;
  readonly settlement: Settlement;
}

/** Minimum one billable day, even for same-day windows. */
export function billableDays(startDate: CalendarDate, endDate: CalendarDate): number {
  return Math.max(1, diffDays(startDate, endDate));
}

export function defaultEndDate(startDate: CalendarDate): CalendarDate {
  return addDays(startDate, 1);
}

function requireNonNegative(name: string, value: MoneyInput): Money {
  const amount = money(value);
  if (amount.isNaN() || amount.isNegative()) {
    throw new ValidationError(`${name} must be a non-negative amount`, { [name]: String(value) });
  }
  return amount;
}

export function computeDailyCharge(
  dailyRate: MoneyInput,
  days: number,
  halfDayOnPickup: boolean,
  discount: MoneyInput = 0,
): Money {
  if (!Number.isInteger(days) || days < 1) {
    throw new ValidationError('days must be a positive integer', { days });
  }
  const rate = requireNonNegative('dailyRate', dailyRate);
  const off = requireNonNegative('discount', discount);

  const charge = halfDayOnPickup
    ? rate.times(days - 1).plus(rate.times(0.5))
    : rate.times(days);

  return roundMoney(nonNegative(charge.minus(off)));
}

/** Flat allowance for the whole rental, not per day. */
export function computeKmCharge(
  kmOut: number,
  kmIn: number,
  kmAllowance: number,
  perKmRate: MoneyInput,
): Money {
  if (kmIn < kmOut) {
    throw new ValidationError('odometer-in cannot be lower than odometer-out', { kmOut, kmIn });
  }
  if (kmAllowance < 0) {
    throw new ValidationError('km allowance cannot be negative', { kmAllowance });
  }
  const rate = requireNonNegative('perKmRate', perKmRate);
  const billableKm = Math.max(0, kmIn - kmOut - kmAllowance);
  return roundMoney(rate.times(billableKm));
}

export function computeFinalTotal(input: FinalTotalInput): FinalTotal {
  const dailyCharge = roundMoney(input.dailyCharge);
  const kmCharge = roundMoney(input.kmCharge);
  const extrasTotal = roundMoney(
    sumMoney([
      input.extras.wash ?? 0,
      input.extras.fines ?? 0,
      input.extras.damages ?? 0,
      input.extras.other ?? 0,
    ]),
  );
  const subtotal = roundMoney(dailyCharge.plus(kmCharge).plus(extrasTotal));
  const grandTotal = roundMoney(nonNegative(subtotal.minus(input.discount ?? 0)));
  const totalPaid = roundMoney(money(input.advancePaid).plus(input.partialPaid));
  const signedBalance = roundMoney(grandTotal.minus(totalPaid));

  let settlement: Settlement = 'settled';
  if (signedBalance.isPositive() && !signedBalance.isZero()) settlement = 'balance_due';
  if (signedBalance.isNegative() && !signedBalance.isZero()) settlement = 'refund_due';

  return {
    dailyCharge,
    kmCharge,
    extrasTotal,
    subtotal,
    grandTotal,
    totalPaid,
    signedBalance,
    remainingBalance: nonNegative(signedBalance),
    refundDue: settlement === 'refund_due' ? signedBalance.negated() : ZERO,
    settlement,
  };
}
