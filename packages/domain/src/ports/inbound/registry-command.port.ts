import type { Customer, CustomerStatus } from '../../entities/customer.js';
import type { Vehicle, VehicleStatus } from '../../entities/vehicle.js';
import type { CalendarDate } from '../../values/calendar-date.js';
import type { MoneyInput } from '../../values/money.js';
import type { CustomerRepositoryListFilters } from '../outbound/customer-repository.port.js';
import type { VehicleRepositoryListFilters } from '../outbound/vehicle-repository.port.js';
import type { OperationContext } from './operation-context.js';

export interface RegisterVehicleCommand {
  make: string;
  model: string;
  plate: string;
  color: string;
  odometerKm: number;
  dailyRate: MoneyInput;
  perKmRate: MoneyInput;
  chassisNumber: string;
  registrationNumber: string;
  manufactureYear: number;
  nextOilChangeKm?: number | null;
}

export type UpdateVehicleCommand = Partial<RegisterVehicleCommand> & {
  vehicleId: string;
  /** Only `available` and `unavailable` are set by hand. */
  status?: VehicleStatus;
};

export interface RegisterCustomerCommand {
  fullName: string;
  nationalId: string;
  secondaryId?: string | null;
  licenseNumber: string;
  licenseExpiry?: CalendarDate | null;
  licenseRegion: string;
  phone: string;
  address?: string | null;
  notes?: string | null;
}

export type UpdateCustomerCommand = Partial<Omit<RegisterCustomerCommand, 'nationalId'>> & {
  customerId: string;
  status?: Exclude<CustomerStatus, 'removed'>;
};

export interface FleetRegistryPort {
  register(ctx: OperationContext, cmd: RegisterVehicleCommand): Promise<Vehicle>;
  update(ctx: OperationContext, cmd: UpdateVehicleCommand): Promise<Vehicle>;
  exclude(ctx: OperationContext, vehicleId: string): Promise<Vehicle>;
  get(vehicleId: string): Promise<Vehicle>;
  list(filters?: VehicleRepositoryListFilters): Promise<Vehicle[]>;
}

export interface CustomerRegistryPort {
  register(ctx: OperationContext, cmd: RegisterCustomerCommand): Promise<Customer>;
  update(ctx: OperationContext, cmd: UpdateCustomerCommand): Promise<Customer>;
  remove(ctx: OperationContext, customerId: string): Promise<Customer>;
  get(customerId: string): Promise<Customer>;
  list(filters?: CustomerRepositoryListFilters): Promise<Customer[]>;
}
