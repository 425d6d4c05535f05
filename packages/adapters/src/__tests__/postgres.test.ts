/**
 * PostgreSQL Adapter Tests
 *
 * Repositories run against an in-process recording stand-in for the pool,
 * so SQL shape, parameters and row mapping are checked without a server.
 */

import { describe, it, expect } from '@jest/globals';
import pg from 'pg';

import {
  ConcurrencyConflict,
  DuplicateRecord,
  StorageError,
  ValidationError,
  money,
} from '@rentdesk/domain';
import type { Vehicle } from '@rentdesk/domain';
import { PgCustomerRepository } from '../postgres/customer.repository.js';
import { PgReservationRepository } from '../postgres/reservation.repository.js';
import { PgVehicleRepository } from '../postgres/vehicle.repository.js';
import { overlapSql } from '../postgres/overlap.js';
import { translatePgError, type Queryable } from '../postgres/pool.js';
import type { Row } from '../postgres/row.js';

// ─── Recording stand-in ───────────────────────────────────────────────────────

class RecordingDb implements Queryable {
  readonly calls: Array<{ text: string; values: unknown[] }> = [];

  constructor(private readonly responses: Row[][] = []) {}

  async query(text: string, values: unknown[] = []): Promise<{ rows: Row[] }> {
    this.calls.push({ text, values });
    return { rows: this.responses.shift() ?? [] };
  }
}

const CREATED = new Date('2024-01-01T10:00:00Z');

function vehicleRow(overrides: Row = {}): Row {
  return {
    id: 'veh-1',
    make: 'Fiat',
    model: 'Mobi',
    plate: 'RNT1A23',
    color: 'white',
    odometer_km: 1000,
    daily_rate: '100.00',
    per_km_rate: '0.80',
    chassis_number: 'CHS-1',
    registration_number: 'REG-1',
    manufacture_year: 2022,
    next_oil_change_km: null,
    status: 'available',
    created_at: CREATED,
    updated_at: CREATED,
    ...overrides,
  };
}

function pgError(code: string, extra: Partial<pg.DatabaseError> = {}): pg.DatabaseError {
  const err = new pg.DatabaseError('boom', 0, 'error');
  err.code = code;
  Object.assign(err, extra);
  return err;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Overlap SQL
// ═══════════════════════════════════════════════════════════════════════════════

describe('overlapSql', () => {
  it('uses inclusive comparisons by default', () => {
    expect(overlapSql('r', '$1', '$2', false)).toBe(
      'r.start_date <= $2::date AND r.end_date >= $1::date',
    );
  });

  it('uses strict comparisons for same-day turnover', () => {
    expect(overlapSql('r', '$1', '$2', true)).toBe('r.start_date < $2::date AND r.end_date > $1::date');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Vehicles
// ═══════════════════════════════════════════════════════════════════════════════

describe('PgVehicleRepository', () => {
  it('maps numeric columns to exact money', async () => {
    const db = new RecordingDb([[vehicleRow()]]);
    const vehicle = await new PgVehicleRepository(db).findById('veh-1');

    expect(vehicle?.dailyRate.toFixed(2)).toBe('100.00');
    expect(vehicle?.perKmRate.toFixed(2)).toBe('0.80');
    expect(vehicle?.nextOilChangeKm).toBeNull();
    expect(db.calls[0]?.values).toEqual(['veh-1']);
  });

  it('locks the row when asked to', async () => {
    const db = new RecordingDb([[vehicleRow()]]);
    await new PgVehicleRepository(db).findByIdForUpdate('veh-1');
    expect(db.calls[0]?.text).toContain('FOR UPDATE');
  });

  it('returns null for a missing vehicle', async () => {
    const db = new RecordingDb([[]]);
    expect(await new PgVehicleRepository(db).findById('nope')).toBeNull();
  });

  it('rejects a status outside the closed set', async () => {
    const db = new RecordingDb([[vehicleRow({ status: 'Locado' })]]);
    await expect(new PgVehicleRepository(db).findById('veh-1')).rejects.toThrow(StorageError);
  });

  it('hides excluded vehicles unless asked', async () => {
    const db = new RecordingDb([[], []]);
    const repo = new PgVehicleRepository(db);
    await repo.list();
    await repo.list({ includeExcluded: true, search: 'mobi' });

    expect(db.calls[0]?.text).toContain(`status <> 'excluded'`);
    expect(db.calls[1]?.text).not.toContain(`status <> 'excluded'`);
    expect(db.calls[1]?.values).toEqual(['%mobi%']);
  });

  it('filters availability on blocking statuses with the chosen overlap rule', async () => {
    const db = new RecordingDb([[vehicleRow()]]);
    const vehicles = await new PgVehicleRepository(db).findAvailable({
      startDate: '2024-01-05',
      endDate: '2024-01-08',
      allowSameDayTurnover: true,
    });

    expect(vehicles).toHaveLength(1);
    expect(db.calls[0]?.text).toContain(`NOT IN ('unavailable','excluded')`);
    expect(db.calls[0]?.text).toContain(`IN ('reserved','rented')`);
    expect(db.calls[0]?.text).toContain('r.start_date < $2::date AND r.end_date > $1::date');
    expect(db.calls[0]?.values).toEqual(['2024-01-05', '2024-01-08']);
  });

  it('writes money as two-decimal strings', async () => {
    const db = new RecordingDb([[vehicleRow({ daily_rate: '120.50' })]]);
    const vehicle: Vehicle = {
      id: 'veh-1',
      make: 'Fiat',
      model: 'Mobi',
      plate: 'RNT1A23',
      color: 'white',
      odometerKm: 1000,
      dailyRate: money('120.5'),
      perKmRate: money('0.8'),
      chassisNumber: 'CHS-1',
      registrationNumber: 'REG-1',
      manufactureYear: 2022,
      nextOilChangeKm: null,
      status: 'available',
      createdAt: CREATED,
      updatedAt: CREATED,
    };
    await new PgVehicleRepository(db).update(vehicle);
    expect(db.calls[0]?.values.slice(6, 8)).toEqual(['120.50', '0.80']);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Customers / Reservations
// ═══════════════════════════════════════════════════════════════════════════════

describe('PgCustomerRepository', () => {
  it('looks up national IDs among non-removed customers only', async () => {
    const db = new RecordingDb([[]]);
    await new PgCustomerRepository(db).findByNationalId('123');
    expect(db.calls[0]?.text).toContain(`status <> 'removed'`);
  });
});

describe('PgReservationRepository', () => {
  it('excludes the edited reservation from overlap checks', async () => {
    const db = new RecordingDb([[]]);
    await new PgReservationRepository(db).findOverlapping({
      vehicleId: 'veh-1',
      startDate: '2024-01-01',
      endDate: '2024-01-04',
      excludeReservationId: 'res-1',
    });

    expect(db.calls[0]?.text).toContain('r.id <> $4');
    expect(db.calls[0]?.text).toContain('r.start_date <= $2::date AND r.end_date >= $1::date');
    expect(db.calls[0]?.values).toEqual(['2024-01-01', '2024-01-04', 'veh-1', 'res-1']);
  });

  it('parses COUNT(*) strings', async () => {
    const db = new RecordingDb([[{ cnt: '2' }]]);
    expect(await new PgReservationRepository(db).countBlockingForCustomer('cus-1')).toBe(2);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Error translation
// ═══════════════════════════════════════════════════════════════════════════════

describe('translatePgError', () => {
  it('maps unique violations to DuplicateRecord', () => {
    const err = translatePgError(pgError('23505', { table: 'vehicles', constraint: 'vehicles_plate_key' }));
    expect(err).toBeInstanceOf(DuplicateRecord);
  });

  it('maps check violations to ValidationError', () => {
    expect(translatePgError(pgError('23514'))).toBeInstanceOf(ValidationError);
  });

  it('maps out-of-range numbers to ValidationError', () => {
    expect(translatePgError(pgError('22003'))).toBeInstanceOf(ValidationError);
  });

  it('maps lock and serialization failures to ConcurrencyConflict', () => {
    expect(translatePgError(pgError('55P03'))).toBeInstanceOf(ConcurrencyConflict);
    expect(translatePgError(pgError('40001'))).toBeInstanceOf(ConcurrencyConflict);
  });

  it('maps refused connections to StorageError', () => {
    const refused = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:5432'), {
      code: 'ECONNREFUSED',
    });
    expect(translatePgError(refused)).toBeInstanceOf(StorageError);
  });

  it('passes unrelated errors through', () => {
    const err = new TypeError('x');
    expect(translatePgError(err)).toBe(err);
  });
});
