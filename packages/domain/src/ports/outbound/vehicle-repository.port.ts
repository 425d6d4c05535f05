import type { Vehicle, VehicleStatus } from '../../entities/vehicle.js';
import type { CalendarDate } from '../../values/calendar-date.js';

export interface VehicleRepositoryListFilters {
  status?: VehicleStatus;
  includeExcluded?: boolean;
  search?: string;
}

export interface AvailableVehicleQuery {
  startDate: CalendarDate;
  endDate: CalendarDate;
  allowSameDayTurnover: boolean;
}

export interface VehicleRepositoryPort {
  findById(vehicleId: string): Promise<Vehicle | null>;
  /** Same as findById, holding a row lock until the transaction ends. */
  findByIdForUpdate(vehicleId: string): Promise<Vehicle | null>;
  findByPlate(plate: string): Promise<Vehicle | null>;
  list(filters?: VehicleRepositoryListFilters): Promise<Vehicle[]>;
  /** Bookable vehicles with no reserved/rented reservation overlapping the window. */
  findAvailable(query: AvailableVehicleQuery): Promise<Vehicle[]>;
  insert(vehicle: Vehicle): Promise<Vehicle>;
  /** Full-row update; null when the row no longer exists. */
  update(vehicle: Vehicle): Promise<Vehicle | null>;
}
