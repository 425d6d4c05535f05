import type {
  OperationalStatus,
  Reservation,
  ReservationStatus,
  ReservationView,
} from '../../entities/reservation.js';
import type { CalendarDate } from '../../values/calendar-date.js';

export interface ReservationListFilters {
  reservationStatuses?: ReservationStatus[];
  operationalStatuses?: OperationalStatus[];
  vehicleId?: string;
  customerId?: string;
  /** Keep reservations whose end date is on or after this day. */
  endFrom?: CalendarDate;
  /** Keep reservations whose end date is on or before this day. */
  endTo?: CalendarDate;
  /** Keep reservations whose start date equals this day. */
  startOn?: CalendarDate;
  /** Keep reservations whose [start, end] interval intersects [from, to]. */
  overlapping?: { from: CalendarDate; to: CalendarDate };
}

export interface OverlapQuery {
  vehicleId: string;
  startDate: CalendarDate;
  endDate: CalendarDate;
  allowSameDayTurnover?: boolean;
  excludeReservationId?: string;
}

export interface ReservationRepositoryPort {
  findById(reservationId: string): Promise<Reservation | null>;
  /** `SELECT … FOR UPDATE` inside the current transaction. */
  findByIdForUpdate(reservationId: string): Promise<Reservation | null>;
  findViewById(reservationId: string): Promise<ReservationView | null>;
  listViews(filters?: ReservationListFilters): Promise<ReservationView[]>;
  /** Reserved/rented reservations of the vehicle overlapping the window. */
  findOverlapping(query: OverlapQuery): Promise<Reservation[]>;
  countBlockingForCustomer(customerId: string): Promise<number>;
  insert(reservation: Reservation): Promise<Reservation>;
  update(reservation: Reservation): Promise<Reservation | null>;
}
