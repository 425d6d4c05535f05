import { describe, it, expect, beforeEach } from '@jest/globals';
import * as XLSX from 'xlsx';
import { money, StorageError, ValidationError } from '@rentdesk/domain';
import {
  createHarness,
  makeCustomer,
  makeFine,
  makeReservation,
  makeVehicle,
  type Harness,
} from './support/fixtures.js';

let h: Harness;

beforeEach(() => {
  h = createHarness('2024-03-10');
  h.uow.seedCustomer(makeCustomer());
});

// ═══════════════════════════════════════════════════════════════════════════════
// Dashboard
// ═══════════════════════════════════════════════════════════════════════════════

describe('ReportingService.dashboard', () => {
  beforeEach(() => {
    h.uow.seedVehicle(makeVehicle({ id: 'veh-1', status: 'rented' }));
    h.uow.seedVehicle(makeVehicle({ id: 'veh-2', plate: 'RNT2B34', status: 'reserved' }));
    h.uow.seedVehicle(makeVehicle({ id: 'veh-3', plate: 'RNT3C45', status: 'excluded' }));
    h.uow.seedReservation(
      makeReservation({
        id: 'r-fin',
        reservationStatus: 'finalized',
        operationalStatus: 'finalized',
        startDate: '2024-03-01',
        endDate: '2024-03-05',
        grandTotal: money('340.00'),
      }),
    );
    h.uow.seedReservation(
      makeReservation({
        id: 'r-old',
        reservationStatus: 'finalized',
        operationalStatus: 'finalized',
        startDate: '2024-02-20',
        endDate: '2024-02-28',
        grandTotal: money('999.00'),
      }),
    );
    h.uow.seedReservation(
      makeReservation({ id: 'r-pick', vehicleId: 'veh-2', startDate: '2024-03-10', endDate: '2024-03-12' }),
    );
    h.uow.seedReservation(
      makeReservation({ id: 'r-ret', reservationStatus: 'rented', startDate: '2024-03-07', endDate: '2024-03-10' }),
    );
  });

  it('summarizes the fleet, month revenue and the day agenda', async () => {
    const summary = await h.services.reporting.dashboard('2024-03-10');

    expect(summary.degraded).toBe(false);
    expect(summary.totalVehicles).toBe(2);
    expect(summary.rentedVehicles).toBe(1);
    expect(summary.reservedVehicles).toBe(1);
    expect(summary.monthRevenue.toFixed(2)).toBe('340.00');
    expect(summary.returnsDueToday).toBe(1);
    expect(summary.pickupsToday.map((r) => r.id)).toEqual(['r-pick']);
    expect(summary.returnsToday.map((r) => r.id)).toEqual(['r-ret']);
  });

  it('degrades to an empty summary when storage is down', async () => {
    h.uow.setOutage(new StorageError('database unreachable'));

    const summary = await h.services.reporting.dashboard('2024-03-10');

    expect(summary.degraded).toBe(true);
    expect(summary.totalVehicles).toBe(0);
    expect(summary.monthRevenue.toFixed(2)).toBe('0.00');
    expect(summary.pickupsToday).toEqual([]);
  });

  it('does not hide other failures', async () => {
    h.uow.setOutage(new Error('query planner exploded'));
    await expect(h.services.reporting.dashboard('2024-03-10')).rejects.toThrow('query planner exploded');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Monthly occupancy
// ═══════════════════════════════════════════════════════════════════════════════

describe('ReportingService.monthlyOccupancy', () => {
  beforeEach(() => {
    h.uow.seedVehicle(makeVehicle());
    h.uow.seedVehicle(makeVehicle({ id: 'veh-x', plate: 'OLD0000', status: 'excluded' }));
    h.uow.seedReservation(
      makeReservation({ id: 'r-1', reservationStatus: 'finalized', startDate: '2024-03-01', endDate: '2024-03-03' }),
    );
    h.uow.seedReservation(
      makeReservation({ id: 'r-2', reservationStatus: 'rented', startDate: '2024-03-10', endDate: '2024-03-13' }),
    );
    h.uow.seedReservation(
      makeReservation({ id: 'r-3', reservationStatus: 'cancelled', startDate: '2024-03-20', endDate: '2024-03-22' }),
    );
  });

  it('marks each day of the month for every bookable vehicle', async () => {
    const snapshot = await h.services.reporting.monthlyOccupancy(2024, 3);

    expect(snapshot.days).toHaveLength(31);
    expect(snapshot.rows).toHaveLength(1);
    const row = snapshot.rows[0];
    expect(row?.label).toBe('Fiat Mobi');
    expect(row?.days[0]).toBe('finalized');
    expect(row?.days[2]).toBe('finalized');
    expect(row?.days[3]).toBe('available');
    expect(row?.days[9]).toBe('rented');
    expect(row?.days[12]).toBe('rented');
    expect(row?.days[13]).toBe('available');
    expect(row?.days[20]).toBe('available');
  });

  it('exports the month as a spreadsheet', async () => {
    const file = await h.services.reporting.exportOccupancy(2024, 3);

    expect(file.filename).toBe('occupancy-2024-03.xlsx');
    expect(file.contentType).toBe('application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
    const workbook = XLSX.read(file.body, { type: 'buffer' });
    expect(workbook.SheetNames).toEqual(['2024-03']);
  });

  it('rejects an impossible month', async () => {
    await expect(h.services.reporting.monthlyOccupancy(2024, 13)).rejects.toBeInstanceOf(ValidationError);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// History
// ═══════════════════════════════════════════════════════════════════════════════

describe('ReportingService.history', () => {
  it('lists closed rentals in the window with their chargeable fines', async () => {
    h.uow.seedVehicle(makeVehicle());
    h.uow.seedReservation(
      makeReservation({
        id: 'r-a',
        reservationStatus: 'finalized',
        operationalStatus: 'fine_pending',
        startDate: '2024-03-10',
        endDate: '2024-03-13',
        odometerIn: 1350,
      }),
    );
    h.uow.seedReservation(
      makeReservation({
        id: 'r-d',
        reservationStatus: 'finalized',
        operationalStatus: 'finalized',
        startDate: '2024-03-18',
        endDate: '2024-03-20',
        odometerOut: null,
      }),
    );
    h.uow.seedReservation(
      makeReservation({ id: 'r-b', reservationStatus: 'finalized', startDate: '2024-03-30', endDate: '2024-04-02' }),
    );
    h.uow.seedReservation(
      makeReservation({ id: 'r-c', reservationStatus: 'rented', startDate: '2024-03-12', endDate: '2024-03-15' }),
    );
    h.uow.seedFine(makeFine({ id: 'f-1', reservationId: 'r-a', amount: money('130.16') }));
    h.uow.seedFine(makeFine({ id: 'f-2', reservationId: 'r-a', amount: money('50.00'), status: 'exempt' }));
    h.uow.seedFine(
      makeFine({ id: 'f-3', reservationId: 'r-a', amount: money('20.00'), status: 'paid', paidAt: new Date() }),
    );

    const entries = await h.services.reporting.history('2024-03-01', '2024-03-31');

    expect(entries.map((e) => e.reservation.id)).toEqual(['r-d', 'r-a']);
    const [late, early] = entries;
    expect(late?.kmDriven).toBeNull();
    expect(late?.fineCount).toBe(0);
    expect(late?.finesTotal.toFixed(2)).toBe('0.00');
    expect(early?.kmDriven).toBe(350);
    expect(early?.fineCount).toBe(2);
    expect(early?.finesTotal.toFixed(2)).toBe('150.16');
  });

  it('rejects an inverted window', async () => {
    await expect(h.services.reporting.history('2024-03-31', '2024-03-01')).rejects.toBeInstanceOf(
      ValidationError,
    );
  });
});
