import type { Fine, FineStatus } from '../../entities/fine.js';
import type {
  OperationalStatus,
  Reservation,
  ReservationStatus,
  ReservationView,
} from '../../entities/reservation.js';
import type { ExtraChargesInput, FinalTotal } from '../../rules/pricing.js';
import type { CalendarDate } from '../../values/calendar-date.js';
import type { Money, MoneyInput } from '../../values/money.js';
import type { ReservationListFilters } from '../outbound/reservation-repository.port.js';
import type { OperationContext } from './operation-context.js';

export interface CreateReservationCommand {
  vehicleId: string;
  customerId: string;
  startDate: CalendarDate;
  endDate: CalendarDate;
  halfDay?: boolean;
  discount?: MoneyInput;
  kmAllowance?: number;
  /** Defaults to half of the computed total. */
  advancePayment?: MoneyInput;
  deliveryTime?: string | null;
  notes?: string | null;
  allowSameDayTurnover?: boolean;
}

export interface DeliverReservationCommand {
  reservationId: string;
  odometerOut: number;
  departureDate: CalendarDate;
  deliveryTime?: string | null;
  amountCollected: MoneyInput;
}

export interface ReturnReservationCommand {
  reservationId: string;
  odometerIn: number;
  extraCharges?: ExtraChargesInput;
  paymentReceived: MoneyInput;
  /** Defaults to the business day of the request. */
  returnDate?: CalendarDate;
}

export interface EditReservationCommand {
  reservationId: string;
  customerId?: string;
  vehicleId?: string;
  startDate?: CalendarDate;
  endDate?: CalendarDate;
  deliveryTime?: string | null;
  reservationStatus?: ReservationStatus;
  operationalStatus?: OperationalStatus;
  odometerOut?: number | null;
  odometerIn?: number | null;
  kmAllowance?: number;
  advancePayment?: MoneyInput;
  partialPayment?: MoneyInput;
  washCost?: MoneyInput;
  finesAmount?: MoneyInput;
  damagesAmount?: MoneyInput;
  otherCosts?: MoneyInput;
  kmCharge?: MoneyInput;
  discount?: MoneyInput;
  halfDay?: boolean;
  /** Explicit daily-charge override; null clears it. */
  dailyChargeOverride?: MoneyInput | null;
  notes?: string | null;
}

export interface DeliveryResult {
  readonly reservation: Reservation;
  readonly totals: FinalTotal;
  /** Part of the amount collected credited to the reservation, capped at the balance due. */
  readonly paymentApplied: Money;
  /** Amount collected beyond the balance due, handed back to the customer. */
  readonly changeDue: Money;
  readonly contract: Uint8Array;
}

export interface ReturnResult {
  readonly reservation: Reservation;
  readonly totals: FinalTotal;
  readonly returnDate: CalendarDate;
  readonly paymentApplied: Money;
  readonly changeDue: Money;
  readonly warnings: readonly string[];
  readonly receipt: Uint8Array;
}

export interface EditResult {
  readonly reservation: Reservation;
  /** Daily charge from canonical inputs, shown even when an override applies. */
  readonly computedDailyCharge: Money;
}

export interface RegisterFineCommand {
  reservationId: string;
  infractionType: string;
  amount: MoneyInput;
  infractionAt: Date;
  location?: string | null;
  notes?: string | null;
}

export interface ResolveFineCommand {
  fineId: string;
  status: FineStatus;
  paidAt?: Date | null;
  notes?: string | null;
}

export interface ReservationCommandPort {
  create(ctx: OperationContext, cmd: CreateReservationCommand): Promise<Reservation>;
  deliver(ctx: OperationContext, cmd: DeliverReservationCommand): Promise<DeliveryResult>;
  returnVehicle(ctx: OperationContext, cmd: ReturnReservationCommand): Promise<ReturnResult>;
  edit(ctx: OperationContext, cmd: EditReservationCommand): Promise<EditResult>;
  cancel(ctx: OperationContext, reservationId: string): Promise<Reservation>;
  get(reservationId: string): Promise<ReservationView>;
  list(filters?: ReservationListFilters): Promise<ReservationView[]>;
  findOnDate(date: CalendarDate): Promise<ReservationView[]>;
  reprintReceipt(ctx: OperationContext, reservationId: string): Promise<Uint8Array>;
}

export interface FineCommandPort {
  registerFine(ctx: OperationContext, cmd: RegisterFineCommand): Promise<Fine>;
  resolveFine(ctx: OperationContext, cmd: ResolveFineCommand): Promise<Fine>;
  listFines(filters?: { reservationId?: string; status?: FineStatus; from?: Date; to?: Date }): Promise<Fine[]>;
}
