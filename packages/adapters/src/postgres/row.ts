import { money, StorageError, type CalendarDate, type Money } from '@rentdesk/domain';

/**
 * Typed readers over raw `pg` rows. A column of the wrong shape means the
 * schema and the code disagree, reported as a StorageError.
 */
export type Row = Record<string, unknown>;

function mismatch(key: string, expected: string, value: unknown): StorageError {
  return new StorageError(`column ${key}: expected ${expected}, got ${typeof value}`);
}

export function str(row: Row, key: string): string {
  const value = row[key];
  if (typeof value !== 'string') throw mismatch(key, 'text', value);
  return value;
}

export function optStr(row: Row, key: string): string | null {
  const value = row[key];
  return value === null || value === undefined ? null : str(row, key);
}

/** int4 arrives as number, int8/COUNT(*) as string. */
export function int(row: Row, key: string): number {
  const value = row[key];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && /^-?\d+$/.test(value)) return Number.parseInt(value, 10);
  throw mismatch(key, 'integer', value);
}

export function optInt(row: Row, key: string): number | null {
  const value = row[key];
  return value === null || value === undefined ? null : int(row, key);
}

export function dec(row: Row, key: string): Money {
  const value = row[key];
  if (typeof value === 'string' || typeof value === 'number') return money(value);
  throw mismatch(key, 'numeric', value);
}

export function optDec(row: Row, key: string): Money | null {
  const value = row[key];
  return value === null || value === undefined ? null : dec(row, key);
}

export function bool(row: Row, key: string): boolean {
  const value = row[key];
  if (typeof value !== 'boolean') throw mismatch(key, 'boolean', value);
  return value;
}

export function date(row: Row, key: string): CalendarDate {
  return str(row, key);
}

export function optDate(row: Row, key: string): CalendarDate | null {
  return optStr(row, key);
}

export function ts(row: Row, key: string): Date {
  const value = row[key];
  if (value instanceof Date) return value;
  throw mismatch(key, 'timestamp', value);
}

export function optTs(row: Row, key: string): Date | null {
  const value = row[key];
  return value === null || value === undefined ? null : ts(row, key);
}

export function oneOf<T extends string>(row: Row, key: string, allowed: readonly T[]): T {
  const value = str(row, key);
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) throw new StorageError(`column ${key}: unexpected value "${value}"`);
  return match;
}

export function json(row: Row, key: string): Record<string, unknown> {
  const value = row[key];
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

/** Money column parameter, always two decimals. */
export function moneyParam(value: Money | null): string | null {
  return value === null ? null : value.toFixed(2);
}
