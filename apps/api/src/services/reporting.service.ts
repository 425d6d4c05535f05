import {
  buildOccupancy,
  compareDates,
  firstDayOfMonth,
  lastDayOfMonth,
  StorageError,
  sumMoney,
  ValidationError,
  ZERO,
  type CalendarDate,
  type DashboardSummary,
  type Fine,
  type HistoryEntry,
  type OccupancyExporterPort,
  type OccupancySnapshot,
  type ReportingQueryPort,
  type UnitOfWorkPort,
} from '@rentdesk/domain';

export interface OccupancyExport {
  filename: string;
  contentType: string;
  body: Uint8Array;
}

function assertMonth(year: number, month: number): void {
  if (!Number.isInteger(year) || year < 1970 || year > 9999) {
    throw new ValidationError('year out of range', { year });
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new ValidationError('month must be 1-12', { month });
  }
}

function emptyDashboard(today: CalendarDate): DashboardSummary {
  return {
    today,
    totalVehicles: 0,
    rentedVehicles: 0,
    reservedVehicles: 0,
    monthRevenue: ZERO,
    returnsDueToday: 0,
    pickupsToday: [],
    returnsToday: [],
    degraded: true,
  };
}

export class ReportingService implements ReportingQueryPort {
  constructor(
    private readonly uow: UnitOfWorkPort,
    private readonly exporter: OccupancyExporterPort,
  ) {}

  /** Falls back to an empty, `degraded` summary when storage is unreachable. */
  async dashboard(today: CalendarDate): Promise<DashboardSummary> {
    try {
      return await this.computeDashboard(today);
    } catch (err) {
      if (!(err instanceof StorageError)) throw err;
      console.warn('[reporting] dashboard degraded:', err.message);
      return emptyDashboard(today);
    }
  }

  private async computeDashboard(today: CalendarDate): Promise<DashboardSummary> {
    const { vehicles, reservations } = this.uow.repositories;
    const year = Number(today.slice(0, 4));
    const month = Number(today.slice(5, 7));
    const monthStart = firstDayOfMonth(year, month);
    const monthEnd = lastDayOfMonth(year, month);

    const [fleet, finalizedThisMonth, pickupsToday, returnsToday] = await Promise.all([
      vehicles.list(),
      reservations.listViews({ reservationStatuses: ['finalized'], endFrom: monthStart, endTo: monthEnd }),
      reservations.listViews({ reservationStatuses: ['reserved'], startOn: today }),
      reservations.listViews({ reservationStatuses: ['rented'], endFrom: today, endTo: today }),
    ]);

    return {
      today,
      totalVehicles: fleet.length,
      rentedVehicles: fleet.filter((v) => v.status === 'rented').length,
      reservedVehicles: fleet.filter((v) => v.status === 'reserved').length,
      monthRevenue: sumMoney(finalizedThisMonth.map((r) => r.grandTotal)),
      returnsDueToday: returnsToday.length,
      pickupsToday,
      returnsToday,
      degraded: false,
    };
  }

  async monthlyOccupancy(year: number, month: number): Promise<OccupancySnapshot> {
    assertMonth(year, month);
    const { vehicles, reservations } = this.uow.repositories;
    const from = firstDayOfMonth(year, month);
    const to = lastDayOfMonth(year, month);

    const [fleet, booked] = await Promise.all([
      vehicles.list(),
      reservations.listViews({
        reservationStatuses: ['reserved', 'rented', 'finalized'],
        overlapping: { from, to },
      }),
    ]);
    return buildOccupancy(year, month, fleet, booked);
  }

  async exportOccupancy(year: number, month: number): Promise<OccupancyExport> {
    const snapshot = await this.monthlyOccupancy(year, month);
    const body = await this.exporter.export(snapshot);
    const mm = String(month).padStart(2, '0');
    return {
      filename: `occupancy-${year}-${mm}.${this.exporter.fileExtension}`,
      contentType: this.exporter.contentType,
      body,
    };
  }

  /** Finalized rentals (fine-pending included) whose end date falls in [from, to]. */
  async history(from: CalendarDate, to: CalendarDate): Promise<HistoryEntry[]> {
    if (compareDates(from, to) > 0) throw new ValidationError('history window is inverted', { from, to });
    const { reservations, fines } = this.uow.repositories;

    const closed = await reservations.listViews({
      reservationStatuses: ['finalized'],
      endFrom: from,
      endTo: to,
    });
    if (closed.length === 0) return [];

    const byReservation = new Map<string, Fine[]>();
    for (const fine of await fines.list({ reservationIds: closed.map((r) => r.id) })) {
      if (fine.status === 'exempt') continue;
      const bucket = byReservation.get(fine.reservationId) ?? [];
      bucket.push(fine);
      byReservation.set(fine.reservationId, bucket);
    }

    return closed.map((reservation) => {
      const charged = byReservation.get(reservation.id) ?? [];
      return {
        reservation,
        kmDriven:
          reservation.odometerIn !== null && reservation.odometerOut !== null
            ? reservation.odometerIn - reservation.odometerOut
            : null,
        fineCount: charged.length,
        finesTotal: sumMoney(charged.map((f) => f.amount)),
      };
    });
  }
}
