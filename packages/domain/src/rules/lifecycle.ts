import { InvalidTransition } from '../errors.js';
import type { FineStatus } from '../entities/fine.js';
import type { OperationalStatus, ReservationStatus } from '../entities/reservation.js';
import type { VehicleStatus } from '../entities/vehicle.js';

export const ALLOWED_RESERVATION_TRANSITIONS: Record<ReservationStatus, ReservationStatus[]> = {
  reserved: ['rented', 'cancelled'],
  rented: ['finalized'],
  cancelled: [],
  finalized: [],
};

export const ALLOWED_FINE_TRANSITIONS: Record<FineStatus, FineStatus[]> = {
  pending: ['paid', 'exempt'],
  paid: ['pending'],
  exempt: ['pending'],
};

/** Vehicle statuses an operator may set by hand; the rest follow reservations. */
export const MANUAL_VEHICLE_STATUSES: readonly VehicleStatus[] = ['available', 'unavailable'];

/** Fines may only be registered against rentals that actually happened. */
export const FINEABLE_RESERVATION_STATUSES: readonly ReservationStatus[] = ['rented', 'finalized'];

export function assertReservationTransition(from: ReservationStatus, to: ReservationStatus): void {
  if (!ALLOWED_RESERVATION_TRANSITIONS[from].includes(to)) {
    throw new InvalidTransition('reservation', from, to);
  }
}

export function assertFineTransition(from: FineStatus, to: FineStatus): void {
  if (from !== to && !ALLOWED_FINE_TRANSITIONS[from].includes(to)) {
    throw new InvalidTransition('fine', from, to);
  }
}

/** Vehicle status implied by the status of the reservation holding it. */
export function vehicleStatusFor(reservationStatus: ReservationStatus): VehicleStatus {
  switch (reservationStatus) {
    case 'reserved':
      return 'reserved';
    case 'rented':
      return 'rented';
    default:
      return 'available';
  }
}

/**
 * Vehicle status after its reservations changed: rented wins over reserved,
 * no live reservation means available. Unavailable and excluded vehicles
 * keep their status.
 */
export function deriveVehicleStatus(
  current: VehicleStatus,
  liveReservationStatuses: readonly ReservationStatus[],
): VehicleStatus {
  if (!isReleasable(current)) return current;
  return liveReservationStatuses
    .map(vehicleStatusFor)
    .reduce<VehicleStatus>(
      (acc, status) => (status === 'rented' || (status === 'reserved' && acc === 'available') ? status : acc),
      'available',
    );
}

/** Operational status paired with a reservation status on transition. */
export function operationalStatusFor(reservationStatus: ReservationStatus): OperationalStatus {
  switch (reservationStatus) {
    case 'reserved':
    case 'rented':
      return 'active';
    case 'cancelled':
      return 'inactive';
    case 'finalized':
      return 'finalized';
  }
}

/** Operational status once fine statuses change. */
export function operationalStatusAfterFines(pendingFines: number): OperationalStatus {
  return pendingFines > 0 ? 'fine_pending' : 'finalized';
}

/** Vehicles in these statuses are never overwritten when a reservation lets go of them. */
export function isReleasable(status: VehicleStatus): boolean {
  return status === 'reserved' || status === 'rented' || status === 'available';
}
