import type { CalendarDate } from '../../values/calendar-date.js';

export type OccupancyCell = 'reserved' | 'rented' | 'finalized' | 'available';

export interface OccupancyRow {
  readonly vehicleId: string;
  readonly label: string;
  readonly plate: string;
  readonly days: readonly OccupancyCell[];
}

export interface OccupancySnapshot {
  readonly year: number;
  readonly month: number;
  readonly days: readonly CalendarDate[];
  readonly rows: readonly OccupancyRow[];
}

export interface OccupancyExporterPort {
  readonly contentType: string;
  readonly fileExtension: string;
  export(snapshot: OccupancySnapshot): Promise<Uint8Array>;
}
