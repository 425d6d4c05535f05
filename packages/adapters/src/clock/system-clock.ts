import { calendarDateOf, type CalendarDate, type ClockPort } from '@rentdesk/domain';

/** Wall clock; the business day is taken in `timeZone` (default: process timezone). */
export class SystemClock implements ClockPort {
  private readonly formatter: Intl.DateTimeFormat | null;

  constructor(timeZone?: string) {
    // en-CA formats dates as YYYY-MM-DD
    this.formatter = timeZone
      ? new Intl.DateTimeFormat('en-CA', { timeZone, year: 'numeric', month: '2-digit', day: '2-digit' })
      : null;
  }

  now(): Date {
    return new Date();
  }

  today(): CalendarDate {
    const now = this.now();
    return this.formatter ? this.formatter.format(now) : calendarDateOf(now);
  }
}

/** Clock pinned to a business day, for tests and replays. */
export class FixedClock implements ClockPort {
  constructor(
    private current: CalendarDate,
    private readonly instant: Date = new Date(`${current}T12:00:00Z`),
  ) {}

  now(): Date {
    return this.instant;
  }

  today(): CalendarDate {
    return this.current;
  }

  set(day: CalendarDate): void {
    this.current = day;
  }
}
