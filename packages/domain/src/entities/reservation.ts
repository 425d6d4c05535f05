import type { CalendarDate } from '../values/calendar-date.js';
import type { Money } from '../values/money.js';

export type ReservationStatus = 'reserved' | 'rented' | 'cancelled' | 'finalized';

export type OperationalStatus = 'active' | 'inactive' | 'finalized' | 'fine_pending';

export const RESERVATION_STATUSES: readonly ReservationStatus[] = [
  'reserved',
  'rented',
  'cancelled',
  'finalized',
];

export const OPERATIONAL_STATUSES: readonly OperationalStatus[] = [
  'active',
  'inactive',
  'finalized',
  'fine_pending',
];

/** Reservation statuses that hold the vehicle for their interval. */
export const BLOCKING_RESERVATION_STATUSES: readonly ReservationStatus[] = ['reserved', 'rented'];

export const DEFAULT_KM_ALLOWANCE = 300;

export interface ExtraCharges {
  readonly washCost: Money;
  readonly finesAmount: Money;
  readonly damagesAmount: Money;
  readonly otherCosts: Money;
}

export interface Reservation extends ExtraCharges {
  readonly id: string;
  readonly vehicleId: string;
  readonly customerId: string;
  readonly startDate: CalendarDate;
  readonly endDate: CalendarDate;
  /** `HH:MM` */
  readonly deliveryTime: string | null;
  readonly operationalStatus: OperationalStatus;
  readonly reservationStatus: ReservationStatus;
  readonly odometerOut: number | null;
  readonly odometerIn: number | null;
  readonly kmAllowance: number;
  readonly advancePayment: Money;
  readonly partialPayment: Money;
  readonly discount: Money;
  readonly halfDay: boolean;
  /** Operator-set daily charge that replaces the computed one. */
  readonly dailyChargeOverride: Money | null;
  readonly totalDailyCharge: Money;
  readonly kmCharge: Money;
  readonly grandTotal: Money;
  readonly remainingBalance: Money;
  readonly notes: string | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/** Reservation joined with the names an operator reads in listings. */
export interface ReservationView extends Reservation {
  readonly customerName: string;
  readonly vehicleLabel: string;
  readonly plate: string;
}
