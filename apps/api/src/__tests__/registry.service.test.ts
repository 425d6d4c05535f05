import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  DuplicateRecord,
  IntegrityViolation,
  InvalidTransition,
  ValidationError,
  type RegisterCustomerCommand,
  type RegisterVehicleCommand,
} from '@rentdesk/domain';
import {
  createHarness,
  makeCustomer,
  makeReservation,
  makeVehicle,
  type Harness,
} from './support/fixtures.js';

let h: Harness;

beforeEach(() => {
  h = createHarness('2024-03-10');
});

const newVehicle: RegisterVehicleCommand = {
  make: 'VW',
  model: 'Gol',
  plate: ' abc 1d23 ',
  color: 'red',
  odometerKm: 12000,
  dailyRate: 120,
  perKmRate: '0.9',
  chassisNumber: 'CH-9',
  registrationNumber: 'RG-9',
  manufactureYear: 2021,
  nextOilChangeKm: 15000,
};

const newCustomer: RegisterCustomerCommand = {
  fullName: 'Joana Example',
  nationalId: '999.888.777-66',
  secondaryId: 'SEC-1',
  licenseNumber: 'LIC-77',
  licenseExpiry: '2029-01-31',
  licenseRegion: 'South',
  phone: '555-0199',
};

// ═══════════════════════════════════════════════════════════════════════════════
// Fleet registry
// ═══════════════════════════════════════════════════════════════════════════════

describe('FleetRegistryService', () => {
  it('registers a vehicle with a normalized plate', async () => {
    const vehicle = await h.services.fleet.register(h.ctx(), newVehicle);

    expect(vehicle.plate).toBe('ABC1D23');
    expect(vehicle.status).toBe('available');
    expect(vehicle.dailyRate.toFixed(2)).toBe('120.00');
    expect(vehicle.perKmRate.toFixed(2)).toBe('0.90');
    expect(h.auditLog.actions()).toEqual(['vehicle.registered']);
  });

  it('rejects a duplicate plate', async () => {
    await h.services.fleet.register(h.ctx(), newVehicle);
    await expect(
      h.services.fleet.register(h.ctx(), { ...newVehicle, plate: 'ABC1D23' }),
    ).rejects.toBeInstanceOf(DuplicateRecord);
  });

  it('requires a positive daily rate', async () => {
    await expect(
      h.services.fleet.register(h.ctx(), { ...newVehicle, dailyRate: 0 }),
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it('never lets the odometer go backwards', async () => {
    h.uow.seedVehicle(makeVehicle());
    await expect(
      h.services.fleet.update(h.ctx(), { vehicleId: 'veh-1', odometerKm: 999 }),
    ).rejects.toBeInstanceOf(ValidationError);

    const updated = await h.services.fleet.update(h.ctx(), { vehicleId: 'veh-1', odometerKm: 1500 });
    expect(updated.odometerKm).toBe(1500);
  });

  it('allows only the manual statuses to be set by hand', async () => {
    h.uow.seedVehicle(makeVehicle());

    const parked = await h.services.fleet.update(h.ctx(), { vehicleId: 'veh-1', status: 'unavailable' });
    expect(parked.status).toBe('unavailable');

    await expect(
      h.services.fleet.update(h.ctx(), { vehicleId: 'veh-1', status: 'rented' }),
    ).rejects.toBeInstanceOf(InvalidTransition);
  });

  it('refuses to change a plate to one already in use', async () => {
    h.uow.seedVehicle(makeVehicle());
    h.uow.seedVehicle(makeVehicle({ id: 'veh-2', plate: 'OTH9X88' }));
    await expect(
      h.services.fleet.update(h.ctx(), { vehicleId: 'veh-2', plate: 'rnt1a23' }),
    ).rejects.toBeInstanceOf(DuplicateRecord);
  });

  it('refuses to exclude a rented vehicle and leaves it untouched', async () => {
    h.uow.seedVehicle(makeVehicle({ status: 'rented' }));

    await expect(h.services.fleet.exclude(h.ctx(), 'veh-1')).rejects.toBeInstanceOf(IntegrityViolation);
    expect(h.uow.vehicle('veh-1')?.status).toBe('rented');
  });

  it('refuses to exclude a vehicle holding a future booking', async () => {
    h.uow.seedVehicle(makeVehicle());
    h.uow.seedReservation(makeReservation({ startDate: '2024-04-01', endDate: '2024-04-03' }));

    await expect(h.services.fleet.exclude(h.ctx(), 'veh-1')).rejects.toBeInstanceOf(IntegrityViolation);
    expect(h.uow.vehicle('veh-1')?.status).toBe('available');
  });

  it('excludes an idle vehicle for good', async () => {
    h.uow.seedVehicle(makeVehicle());

    const excluded = await h.services.fleet.exclude(h.ctx(), 'veh-1');
    expect(excluded.status).toBe('excluded');
    expect(await h.services.fleet.list()).toEqual([]);
    expect((await h.services.fleet.list({ includeExcluded: true })).map((v) => v.id)).toEqual(['veh-1']);

    await expect(
      h.services.fleet.update(h.ctx(), { vehicleId: 'veh-1', status: 'available' }),
    ).rejects.toBeInstanceOf(InvalidTransition);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Customer registry
// ═══════════════════════════════════════════════════════════════════════════════

describe('CustomerRegistryService', () => {
  it('registers a customer with blank optional fields stored as null', async () => {
    const customer = await h.services.customers.register(h.ctx(), { ...newCustomer, address: '  ' });
    expect(customer.status).toBe('active');
    expect(customer.address).toBeNull();
    expect(customer.secondaryId).toBe('SEC-1');
  });

  it('rejects duplicate national and secondary IDs among live customers', async () => {
    await h.services.customers.register(h.ctx(), newCustomer);

    await expect(
      h.services.customers.register(h.ctx(), { ...newCustomer, secondaryId: null }),
    ).rejects.toMatchObject({ code: 'duplicate_record', details: { field: 'nationalId' } });
    await expect(
      h.services.customers.register(h.ctx(), { ...newCustomer, nationalId: '000.000.000-01' }),
    ).rejects.toMatchObject({ code: 'duplicate_record', details: { field: 'secondaryId' } });
  });

  it('frees the IDs of a removed customer', async () => {
    h.uow.seedCustomer(makeCustomer({ nationalId: newCustomer.nationalId, status: 'removed' }));
    const customer = await h.services.customers.register(h.ctx(), newCustomer);
    expect(customer.nationalId).toBe(newCustomer.nationalId);
  });

  it('refuses to remove a customer with an open reservation', async () => {
    h.uow.seedCustomer(makeCustomer());
    h.uow.seedReservation(makeReservation({ reservationStatus: 'rented' }));

    await expect(h.services.customers.remove(h.ctx(), 'cus-1')).rejects.toBeInstanceOf(IntegrityViolation);
    expect((await h.services.customers.get('cus-1')).status).toBe('active');
  });

  it('removes a customer whose rentals are closed and hides them from listings', async () => {
    h.uow.seedCustomer(makeCustomer());
    h.uow.seedReservation(makeReservation({ reservationStatus: 'finalized' }));

    const removed = await h.services.customers.remove(h.ctx(), 'cus-1');
    expect(removed.status).toBe('removed');
    expect(await h.services.customers.list()).toEqual([]);
    await expect(
      h.services.customers.update(h.ctx(), { customerId: 'cus-1', phone: '555-0000' }),
    ).rejects.toBeInstanceOf(InvalidTransition);
  });

  it('updates contact details', async () => {
    h.uow.seedCustomer(makeCustomer());
    const updated = await h.services.customers.update(h.ctx(), {
      customerId: 'cus-1',
      phone: '555-0123',
      status: 'inactive',
    });
    expect(updated.phone).toBe('555-0123');
    expect(updated.status).toBe('inactive');
    expect(updated.nationalId).toBe('111.222.333-44');
  });
});
