import {
  VEHICLE_STATUSES,
  type AvailableVehicleQuery,
  type Vehicle,
  type VehicleRepositoryListFilters,
  type VehicleRepositoryPort,
} from '@rentdesk/domain';
import { exec, getPool, type Queryable } from './pool.js';
import { BLOCKING_STATUSES_SQL, overlapSql } from './overlap.js';
import { dec, int, moneyParam, oneOf, optInt, str, ts, type Row } from './row.js';

export class PgVehicleRepository implements VehicleRepositoryPort {
  constructor(private readonly db: Queryable = getPool()) {}

  async findById(vehicleId: string): Promise<Vehicle | null> {
    const rows = await exec(this.db, `SELECT * FROM rental.vehicles WHERE id = $1`, [vehicleId]);
    return rows[0] ? mapVehicleRow(rows[0]) : null;
  }

  async findByIdForUpdate(vehicleId: string): Promise<Vehicle | null> {
    const rows = await exec(this.db, `SELECT * FROM rental.vehicles WHERE id = $1 FOR UPDATE`, [
      vehicleId,
    ]);
    return rows[0] ? mapVehicleRow(rows[0]) : null;
  }

  async findByPlate(plate: string): Promise<Vehicle | null> {
    const rows = await exec(this.db, `SELECT * FROM rental.vehicles WHERE plate = $1`, [
      plate.toUpperCase(),
    ]);
    return rows[0] ? mapVehicleRow(rows[0]) : null;
  }

  async list(filters: VehicleRepositoryListFilters = {}): Promise<Vehicle[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    let idx = 1;

    if (filters.status) {
      conditions.push(`status = $${idx++}`);
      params.push(filters.status);
    }
    if (!filters.includeExcluded && filters.status !== 'excluded') {
      conditions.push(`status <> 'excluded'`);
    }
    if (filters.search) {
      conditions.push(`(make ILIKE $${idx} OR model ILIKE $${idx} OR plate ILIKE $${idx})`);
      params.push(`%${filters.search}%`);
      idx++;
    }

    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = await exec(
      this.db,
      `SELECT * FROM rental.vehicles ${where} ORDER BY make, model, plate`,
      params,
    );
    return rows.map(mapVehicleRow);
  }

  async findAvailable(query: AvailableVehicleQuery): Promise<Vehicle[]> {
    const rows = await exec(
      this.db,
      `SELECT v.* FROM rental.vehicles v
       WHERE v.status NOT IN ('unavailable','excluded')
         AND NOT EXISTS (
           SELECT 1 FROM rental.reservations r
           WHERE r.vehicle_id = v.id
             AND r.reservation_status IN ${BLOCKING_STATUSES_SQL}
             AND ${overlapSql('r', '$1', '$2', query.allowSameDayTurnover)}
         )
       ORDER BY v.make, v.model, v.plate`,
      [query.startDate, query.endDate],
    );
    return rows.map(mapVehicleRow);
  }

  async insert(vehicle: Vehicle): Promise<Vehicle> {
    const rows = await exec(
      this.db,
      `INSERT INTO rental.vehicles
         (id, make, model, plate, color, odometer_km, daily_rate, per_km_rate,
          chassis_number, registration_number, manufacture_year, next_oil_change_km,
          status, created_at, updated_at)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14,$15)
       RETURNING *`,
      [...vehicleParams(vehicle), vehicle.createdAt, vehicle.updatedAt],
    );
    const row = rows[0];
    if (!row) throw new Error(`insert of vehicle ${vehicle.id} returned no row`);
    return mapVehicleRow(row);
  }

  async update(vehicle: Vehicle): Promise<Vehicle | null> {
    const rows = await exec(
      this.db,
      `UPDATE rental.vehicles
       SET make = $2, model = $3, plate = $4, color = $5, odometer_km = $6,
           daily_rate = $7, per_km_rate = $8, chassis_number = $9,
           registration_number = $10, manufacture_year = $11,
           next_oil_change_km = $12, status = $13, updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      vehicleParams(vehicle),
    );
    return rows[0] ? mapVehicleRow(rows[0]) : null;
  }
}

function vehicleParams(v: Vehicle): unknown[] {
  return [
    v.id,
    v.make,
    v.model,
    v.plate,
    v.color,
    v.odometerKm,
    moneyParam(v.dailyRate),
    moneyParam(v.perKmRate),
    v.chassisNumber,
    v.registrationNumber,
    v.manufactureYear,
    v.nextOilChangeKm,
    v.status,
  ];
}

export function mapVehicleRow(row: Row): Vehicle {
  return {
    id: str(row, 'id'),
    make: str(row, 'make'),
    model: str(row, 'model'),
    plate: str(row, 'plate'),
    color: str(row, 'color'),
    odometerKm: int(row, 'odometer_km'),
    dailyRate: dec(row, 'daily_rate'),
    perKmRate: dec(row, 'per_km_rate'),
    chassisNumber: str(row, 'chassis_number'),
    registrationNumber: str(row, 'registration_number'),
    manufactureYear: int(row, 'manufacture_year'),
    nextOilChangeKm: optInt(row, 'next_oil_change_km'),
    status: oneOf(row, 'status', VEHICLE_STATUSES),
    createdAt: ts(row, 'created_at'),
    updatedAt: ts(row, 'updated_at'),
  };
}
