import type { Reservation } from '../entities/reservation.js';
import type { Vehicle } from '../entities/vehicle.js';
import type {
  OccupancyCell,
  OccupancyRow,
  OccupancySnapshot,
} from '../ports/outbound/occupancy-exporter.port.js';
import {
  compareDates,
  eachDay,
  firstDayOfMonth,
  lastDayOfMonth,
  type CalendarDate,
} from '../values/calendar-date.js';

const CELL_PRIORITY: Record<OccupancyCell, number> = {
  rented: 3,
  reserved: 2,
  finalized: 1,
  available: 0,
};

function cellFor(reservation: Pick<Reservation, 'reservationStatus'>): OccupancyCell {
  switch (reservation.reservationStatus) {
    case 'rented':
      return 'rented';
    case 'reserved':
      return 'reserved';
    case 'finalized':
      return 'finalized';
    default:
      return 'available';
  }
}

function covers(reservation: Pick<Reservation, 'startDate' | 'endDate'>, day: CalendarDate): boolean {
  return compareDates(reservation.startDate, day) <= 0 && compareDates(reservation.endDate, day) >= 0;
}

/** Day-by-day status of every vehicle over one calendar month. */
export function buildOccupancy(
  year: number,
  month: number,
  vehicles: readonly Vehicle[],
  reservations: readonly Reservation[],
): OccupancySnapshot {
  const days = eachDay(firstDayOfMonth(year, month), lastDayOfMonth(year, month));

  const rows: OccupancyRow[] = vehicles.map((vehicle) => {
    const own = reservations.filter((r) => r.vehicleId === vehicle.id);
    return {
      vehicleId: vehicle.id,
      label: `${vehicle.make} ${vehicle.model}`,
      plate: vehicle.plate,
      days: days.map((day) =>
        own
          .filter((r) => covers(r, day))
          .map(cellFor)
          .reduce<OccupancyCell>(
            (best, cell) => (CELL_PRIORITY[cell] > CELL_PRIORITY[best] ? cell : best),
            'available',
          ),
      ),
    };
  });

  return { year, month, days, rows };
}
