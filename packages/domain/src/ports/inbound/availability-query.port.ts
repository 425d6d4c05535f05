import type { Vehicle } from '../../entities/vehicle.js';
import type { CalendarDate } from '../../values/calendar-date.js';

export interface AvailabilityResult {
  readonly vehicles: Vehicle[];
  /** Set when same-day turnover relaxed the overlap rule. */
  readonly caution: string | null;
}

export interface AvailabilityQueryPort {
  findAvailable(
    startDate: CalendarDate,
    endDate: CalendarDate,
    allowSameDayTurnover: boolean,
  ): Promise<AvailabilityResult>;
  isVehicleAvailable(
    vehicleId: string,
    startDate: CalendarDate,
    endDate: CalendarDate,
    excludeReservationId?: string,
  ): Promise<boolean>;
}
