import type { CalendarDate } from '../../values/calendar-date.js';

export interface ClockPort {
  now(): Date;
  /** Business day in the location's timezone. */
  today(): CalendarDate;
}
