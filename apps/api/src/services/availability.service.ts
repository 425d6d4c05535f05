import {
  isValidInterval,
  NotFoundError,
  SAME_DAY_TURNOVER_CAUTION,
  type AvailabilityQueryPort,
  type AvailabilityResult,
  type CalendarDate,
  type UnitOfWorkPort,
} from '@rentdesk/domain';

export class AvailabilityService implements AvailabilityQueryPort {
  constructor(private readonly uow: UnitOfWorkPort) {}

  /** An inverted window is a caller error; it yields no vehicles. */
  async findAvailable(
    startDate: CalendarDate,
    endDate: CalendarDate,
    allowSameDayTurnover: boolean,
  ): Promise<AvailabilityResult> {
    if (!isValidInterval({ startDate, endDate })) return { vehicles: [], caution: null };

    const vehicles = await this.uow.repositories.vehicles.findAvailable({
      startDate,
      endDate,
      allowSameDayTurnover,
    });
    return { vehicles, caution: allowSameDayTurnover ? SAME_DAY_TURNOVER_CAUTION : null };
  }

  async isVehicleAvailable(
    vehicleId: string,
    startDate: CalendarDate,
    endDate: CalendarDate,
    excludeReservationId?: string,
  ): Promise<boolean> {
    if (!isValidInterval({ startDate, endDate })) return false;

    const { vehicles, reservations } = this.uow.repositories;
    const vehicle = await vehicles.findById(vehicleId);
    if (!vehicle) throw new NotFoundError('vehicle', vehicleId);
    if (vehicle.status === 'unavailable' || vehicle.status === 'excluded') return false;

    const clashes = await reservations.findOverlapping({
      vehicleId,
      startDate,
      endDate,
      excludeReservationId,
    });
    return clashes.length === 0;
  }
}
