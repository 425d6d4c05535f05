import * as XLSX from 'xlsx';
import type { OccupancyCell, OccupancyExporterPort, OccupancySnapshot } from '@rentdesk/domain';

const CELL_LABELS: Record<OccupancyCell, string> = {
  reserved: 'Reserved',
  rented: 'Rented',
  finalized: 'Finalized',
  available: '',
};

/** One sheet per month: a row per vehicle, a column per day. */
export class XlsxOccupancyExporter implements OccupancyExporterPort {
  readonly contentType = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';
  readonly fileExtension = 'xlsx';

  async export(snapshot: OccupancySnapshot): Promise<Uint8Array> {
    const records = snapshot.rows.map((row) => {
      const record: Record<string, string> = { Vehicle: row.label, Plate: row.plate };
      snapshot.days.forEach((day, i) => {
        record[day.slice(8)] = CELL_LABELS[row.days[i] ?? 'available'];
      });
      return record;
    });

    const worksheet = XLSX.utils.json_to_sheet(records, {
      header: ['Vehicle', 'Plate', ...snapshot.days.map((d) => d.slice(8))],
    });
    const workbook = XLSX.utils.book_new();
    const sheetName = `${snapshot.year}-${String(snapshot.month).padStart(2, '0')}`;
    XLSX.utils.book_append_sheet(workbook, worksheet, sheetName);

    const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    return buffer;
  }
}
