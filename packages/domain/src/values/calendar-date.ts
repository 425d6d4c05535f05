import { ValidationError } from '../errors.js';

/** A day without time or timezone, ISO formatted: `YYYY-MM-DD`. */
export type CalendarDate = string;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

function toUtcMs(date: CalendarDate): number {
  const match = DATE_PATTERN.exec(date);
  if (!match) throw new ValidationError(`invalid calendar date "${date}"`);
  const [, y, m, d] = match;
  const ms = Date.UTC(Number(y), Number(m) - 1, Number(d));
  if (fromUtcMs(ms) !== date) throw new ValidationError(`invalid calendar date "${date}"`);
  return ms;
}

function fromUtcMs(ms: number): CalendarDate {
  return new Date(ms).toISOString().slice(0, 10);
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return fromUtcMs(toUtcMs(date) + days * MS_PER_DAY);
}

/** Signed number of days from `from` to `to`. */
export function diffDays(from: CalendarDate, to: CalendarDate): number {
  return Math.round((toUtcMs(to) - toUtcMs(from)) / MS_PER_DAY);
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return toUtcMs(a) - toUtcMs(b);
}

/** Local calendar date of an instant. */
export function calendarDateOf(instant: Date): CalendarDate {
  const y = instant.getFullYear();
  const m = String(instant.getMonth() + 1).padStart(2, '0');
  const d = String(instant.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

export function firstDayOfMonth(year: number, month: number): CalendarDate {
  return fromUtcMs(Date.UTC(year, month - 1, 1));
}

export function lastDayOfMonth(year: number, month: number): CalendarDate {
  return fromUtcMs(Date.UTC(year, month, 0));
}

/** Inclusive list of days in [from, to]. */
export function eachDay(from: CalendarDate, to: CalendarDate): CalendarDate[] {
  const days: CalendarDate[] = [];
  for (let d = from; compareDates(d, to) <= 0; d = addDays(d, 1)) days.push(d);
  return days;
}
