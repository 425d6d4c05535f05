import type { Money } from '../values/money.js';

export type VehicleStatus = 'available' | 'rented' | 'reserved' | 'unavailable' | 'excluded';

export const VEHICLE_STATUSES: readonly VehicleStatus[] = [
  'available',
  'rented',
  'reserved',
  'unavailable',
  'excluded',
];

export interface Vehicle {
  readonly id: string;
  readonly make: string;
  readonly model: string;
  readonly plate: string;
  readonly color: string;
  readonly odometerKm: number;
  readonly dailyRate: Money;
  readonly perKmRate: Money;
  readonly chassisNumber: string;
  readonly registrationNumber: string;
  readonly manufactureYear: number;
  readonly nextOilChangeKm: number | null;
  readonly status: VehicleStatus;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/** Kilometres left before the next scheduled oil change, floored at zero. */
export function kmUntilOilChange(vehicle: Pick<Vehicle, 'odometerKm' | 'nextOilChangeKm'>): number | null {
  if (vehicle.nextOilChangeKm === null) return null;
  return Math.max(0, vehicle.nextOilChangeKm - vehicle.odometerKm);
}
