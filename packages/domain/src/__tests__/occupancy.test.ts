import { describe, it, expect } from '@jest/globals';

import { buildOccupancy } from '../index.js';
import { makeReservation, makeVehicle } from './support/factories.js';

describe('buildOccupancy', () => {
  it('marks each day of the month per vehicle', () => {
    const vehicle = makeVehicle({ id: 'veh-1', make: 'Fiat', model: 'Uno', plate: 'ABC1D23' });
    const snapshot = buildOccupancy(2024, 2, [vehicle], [
      makeReservation({ vehicleId: 'veh-1', startDate: '2024-02-01', endDate: '2024-02-03', reservationStatus: 'finalized' }),
      makeReservation({ vehicleId: 'veh-1', startDate: '2024-02-03', endDate: '2024-02-05', reservationStatus: 'rented' }),
      makeReservation({ vehicleId: 'veh-1', startDate: '2024-02-27', endDate: '2024-03-02', reservationStatus: 'reserved' }),
      makeReservation({ vehicleId: 'veh-1', startDate: '2024-02-10', endDate: '2024-02-12', reservationStatus: 'cancelled' }),
    ]);

    expect(snapshot.days).toHaveLength(29);
    const row = snapshot.rows[0];
    expect(row?.label).toBe('Fiat Uno');
    expect(row?.days.slice(0, 6)).toEqual([
      'finalized',
      'finalized',
      'rented',
      'rented',
      'rented',
      'available',
    ]);
    expect(row?.days[10]).toBe('available');
    expect(row?.days.slice(26)).toEqual(['reserved', 'reserved', 'reserved']);
  });
});
