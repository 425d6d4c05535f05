import type { ReservationView } from '../../entities/reservation.js';
import type { CalendarDate } from '../../values/calendar-date.js';
import type { Money } from '../../values/money.js';
import type { OccupancySnapshot } from '../outbound/occupancy-exporter.port.js';

export interface DashboardSummary {
  readonly today: CalendarDate;
  readonly totalVehicles: number;
  readonly rentedVehicles: number;
  readonly reservedVehicles: number;
  readonly monthRevenue: Money;
  readonly returnsDueToday: number;
  readonly pickupsToday: ReservationView[];
  readonly returnsToday: ReservationView[];
  /** True when storage was unreachable and the figures are placeholders. */
  readonly degraded: boolean;
}

export interface HistoryEntry {
  readonly reservation: ReservationView;
  readonly kmDriven: number | null;
  readonly fineCount: number;
  readonly finesTotal: Money;
}

export interface ReportingQueryPort {
  dashboard(today: CalendarDate): Promise<DashboardSummary>;
  monthlyOccupancy(year: number, month: number): Promise<OccupancySnapshot>;
  history(from: CalendarDate, to: CalendarDate): Promise<HistoryEntry[]>;
}
