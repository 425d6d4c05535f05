import { compareDates, type CalendarDate } from '../values/calendar-date.js';

export interface DateInterval {
  readonly startDate: CalendarDate;
  readonly endDate: CalendarDate;
}

/**
 * Overlap between a booked interval and a requested one (both inclusive).
 *
 * Default: touching on a boundary day counts as overlap. With same-day
 * turnover the comparison is strict, so a vehicle returned on day D can be
 * handed out again on day D.
 */
export function intervalsOverlap(
  existing: DateInterval,
  requested: DateInterval,
  allowSameDayTurnover = false,
): boolean {
  const startVsEnd = compareDates(existing.startDate, requested.endDate);
  const endVsStart = compareDates(existing.endDate, requested.startDate);
  return allowSameDayTurnover
    ? startVsEnd < 0 && endVsStart > 0
    : startVsEnd <= 0 && endVsStart >= 0;
}

export function isValidInterval(interval: DateInterval): boolean {
  return compareDates(interval.startDate, interval.endDate) <= 0;
}

export const SAME_DAY_TURNOVER_CAUTION =
  'same-day turnover enabled: a vehicle returning on the requested start date is listed as free; confirm the return before handing it out';
