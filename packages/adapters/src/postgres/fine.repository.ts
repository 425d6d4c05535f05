import {
  FINE_STATUSES,
  type Fine,
  type FineListFilters,
  type FineRepositoryPort,
} from '@rentdesk/domain';
import { exec, getPool, type Queryable } from './pool.js';
import { dec, int, moneyParam, oneOf, optStr, optTs, str, ts, type Row } from './row.js';

export class PgFineRepository implements FineRepositoryPort {
  constructor(private readonly db: Queryable = getPool()) {}

  async findById(fineId: string): Promise<Fine | null> {
    const rows = await exec(this.db, `SELECT * FROM rental.fines WHERE id = $1`, [fineId]);
    return rows[0] ? mapFineRow(rows[0]) : null;
  }

  async findByIdForUpdate(fineId: string): Promise<Fine | null> {
    const rows = await exec(this.db, `SELECT * FROM rental.fines WHERE id = $1 FOR UPDATE`, [fineId]);
    return rows[0] ? mapFineRow(rows[0]) : null;
  }

  async list(filters: FineListFilters = {}): Promise<Fine[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    let idx = 1;

    if (filters.reservationIds) {
      conditions.push(`reservation_id = ANY($${idx++}::uuid[])`);
      params.push(filters.reservationIds);
    }
    if (filters.status) {
      conditions.push(`status = $${idx++}`);
      params.push(filters.status);
    }
    if (filters.from) {
      conditions.push(`infraction_at >= $${idx++}`);
      params.push(filters.from);
    }
    if (filters.to) {
      conditions.push(`infraction_at <= $${idx++}`);
      params.push(filters.to);
    }

    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = await exec(this.db, `SELECT * FROM rental.fines ${where} ORDER BY infraction_at DESC`, params);
    return rows.map(mapFineRow);
  }

  async countPending(reservationId: string): Promise<number> {
    const rows = await exec(
      this.db,
      `SELECT COUNT(*) AS cnt FROM rental.fines WHERE reservation_id = $1 AND status = 'pending'`,
      [reservationId],
    );
    return rows[0] ? int(rows[0], 'cnt') : 0;
  }

  async insert(fine: Fine): Promise<Fine> {
    const rows = await exec(
      this.db,
      `INSERT INTO rental.fines
         (id, reservation_id, infraction_type, amount, infraction_at, location,
          status, paid_at, notes, created_at, updated_at)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11)
       RETURNING *`,
      [...fineParams(fine), fine.createdAt, fine.updatedAt],
    );
    const row = rows[0];
    if (!row) throw new Error(`insert of fine ${fine.id} returned no row`);
    return mapFineRow(row);
  }

  async update(fine: Fine): Promise<Fine | null> {
    const rows = await exec(
      this.db,
      `UPDATE rental.fines
       SET reservation_id = $2, infraction_type = $3, amount = $4, infraction_at = $5,
           location = $6, status = $7, paid_at = $8, notes = $9, updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      fineParams(fine),
    );
    return rows[0] ? mapFineRow(rows[0]) : null;
  }
}

function fineParams(f: Fine): unknown[] {
  return [
    f.id,
    f.reservationId,
    f.infractionType,
    moneyParam(f.amount),
    f.infractionAt,
    f.location,
    f.status,
    f.paidAt,
    f.notes,
  ];
}

export function mapFineRow(row: Row): Fine {
  return {
    id: str(row, 'id'),
    reservationId: str(row, 'reservation_id'),
    infractionType: str(row, 'infraction_type'),
    amount: dec(row, 'amount'),
    infractionAt: ts(row, 'infraction_at'),
    location: optStr(row, 'location'),
    status: oneOf(row, 'status', FINE_STATUSES),
    paidAt: optTs(row, 'paid_at'),
    notes: optStr(row, 'notes'),
    createdAt: ts(row, 'created_at'),
    updatedAt: ts(row, 'updated_at'),
  };
}
