import type { CalendarDate } from '../../values/calendar-date.js';

/** Per-request facts every use case needs: who acts, and which business day it is. */
export interface OperationContext {
  readonly actorId: string;
  readonly today: CalendarDate;
}
