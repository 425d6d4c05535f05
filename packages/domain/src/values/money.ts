import Decimal from 'decimal.js';

/** Currency amounts. Never a binary float. */
export type Money = Decimal;

export type MoneyInput = Decimal.Value;

const MoneyDecimal = Decimal.clone({ precision: 40, rounding: Decimal.ROUND_HALF_EVEN });

export const ZERO: Money = new MoneyDecimal(0);

export function money(value: MoneyInput): Money {
  return new MoneyDecimal(value);
}

/** Two decimal places, banker's rounding. */
export function roundMoney(value: MoneyInput): Money {
  return new MoneyDecimal(value).toDecimalPlaces(2, Decimal.ROUND_HALF_EVEN);
}

export function sumMoney(values: readonly MoneyInput[]): Money {
  return values.reduce<Money>((acc, v) => acc.plus(v), ZERO);
}

export function nonNegative(value: Money): Money {
  return value.isNegative() ? ZERO : value;
}

export function minMoney(a: Money, b: Money): Money {
  return a.lessThan(b) ? a : b;
}

/** Wire form, always two decimals ("300.00"). */
export function formatMoney(value: MoneyInput): string {
  return roundMoney(value).toFixed(2);
}
