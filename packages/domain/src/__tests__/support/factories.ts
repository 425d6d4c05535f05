import { money, ZERO } from '../../index.js';
import type { Reservation, Vehicle } from '../../index.js';

const NOW = new Date('2024-01-01T09:00:00Z');

export function makeVehicle(overrides: Partial<Vehicle> = {}): Vehicle {
  return {
    id: 'veh-001',
    make: 'Fiat',
    model: 'Mobi',
    plate: 'RNT1A23',
    color: 'white',
    odometerKm: 1000,
    dailyRate: money('100.00'),
    perKmRate: money('0.80'),
    chassisNumber: 'CHS-0001',
    registrationNumber: 'REG-0001',
    manufactureYear: 2022,
    nextOilChangeKm: 5000,
    status: 'available',
    createdAt: NOW,
    updatedAt: NOW,
    ...overrides,
  };
}

export function makeReservation(overrides: Partial<Reservation> = {}): Reservation {
  return {
    id: 'res-001',
    vehicleId: 'veh-001',
    customerId: 'cus-001',
    startDate: '2024-01-01',
    endDate: '2024-01-04',
    deliveryTime: null,
    operationalStatus: 'active',
    reservationStatus: 'reserved',
    odometerOut: 1000,
    odometerIn: null,
    kmAllowance: 300,
    advancePayment: ZERO,
    partialPayment: ZERO,
    washCost: ZERO,
    finesAmount: ZERO,
    damagesAmount: ZERO,
    otherCosts: ZERO,
    discount: ZERO,
    halfDay: false,
    dailyChargeOverride: null,
    totalDailyCharge: money('300.00'),
    kmCharge: ZERO,
    grandTotal: money('300.00'),
    remainingBalance: money('300.00'),
    notes: null,
    createdAt: NOW,
    updatedAt: NOW,
    ...overrides,
  };
}
