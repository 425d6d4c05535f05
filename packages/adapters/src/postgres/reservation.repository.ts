import {
  BLOCKING_RESERVATION_STATUSES,
  OPERATIONAL_STATUSES,
  RESERVATION_STATUSES,
  type OverlapQuery,
  type Reservation,
  type ReservationListFilters,
  type ReservationRepositoryPort,
  type ReservationView,
} from '@rentdesk/domain';
import { exec, getPool, type Queryable } from './pool.js';
import { BLOCKING_STATUSES_SQL, overlapSql } from './overlap.js';
import {
  bool,
  date,
  dec,
  int,
  moneyParam,
  oneOf,
  optDec,
  optInt,
  optStr,
  str,
  ts,
  type Row,
} from './row.js';

const VIEW_SELECT = `
  SELECT r.*,
         c.full_name AS customer_name,
         v.make || ' ' || v.model AS vehicle_label,
         v.plate AS plate
  FROM rental.reservations r
  JOIN rental.customers c ON c.id = r.customer_id
  JOIN rental.vehicles v ON v.id = r.vehicle_id`;

export class PgReservationRepository implements ReservationRepositoryPort {
  constructor(private readonly db: Queryable = getPool()) {}

  async findById(reservationId: string): Promise<Reservation | null> {
    const rows = await exec(this.db, `SELECT * FROM rental.reservations WHERE id = $1`, [
      reservationId,
    ]);
    return rows[0] ? mapReservationRow(rows[0]) : null;
  }

  async findByIdForUpdate(reservationId: string): Promise<Reservation | null> {
    const rows = await exec(
      this.db,
      `SELECT * FROM rental.reservations WHERE id = $1 FOR UPDATE`,
      [reservationId],
    );
    return rows[0] ? mapReservationRow(rows[0]) : null;
  }

  async findViewById(reservationId: string): Promise<ReservationView | null> {
    const rows = await exec(this.db, `${VIEW_SELECT} WHERE r.id = $1`, [reservationId]);
    return rows[0] ? mapReservationViewRow(rows[0]) : null;
  }

  async listViews(filters: ReservationListFilters = {}): Promise<ReservationView[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    let idx = 1;

    if (filters.reservationStatuses?.length) {
      conditions.push(`r.reservation_status = ANY($${idx++}::text[])`);
      params.push(filters.reservationStatuses);
    }
    if (filters.operationalStatuses?.length) {
      conditions.push(`r.operational_status = ANY($${idx++}::text[])`);
      params.push(filters.operationalStatuses);
    }
    if (filters.vehicleId) {
      conditions.push(`r.vehicle_id = $${idx++}`);
      params.push(filters.vehicleId);
    }
    if (filters.customerId) {
      conditions.push(`r.customer_id = $${idx++}`);
      params.push(filters.customerId);
    }
    if (filters.endFrom) {
      conditions.push(`r.end_date >= $${idx++}::date`);
      params.push(filters.endFrom);
    }
    if (filters.endTo) {
      conditions.push(`r.end_date <= $${idx++}::date`);
      params.push(filters.endTo);
    }
    if (filters.startOn) {
      conditions.push(`r.start_date = $${idx++}::date`);
      params.push(filters.startOn);
    }
    if (filters.overlapping) {
      conditions.push(`r.start_date <= $${idx++}::date AND r.end_date >= $${idx++}::date`);
      params.push(filters.overlapping.to, filters.overlapping.from);
    }

    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = await exec(
      this.db,
      `${VIEW_SELECT} ${where} ORDER BY r.start_date DESC, r.created_at DESC`,
      params,
    );
    return rows.map(mapReservationViewRow);
  }

  async findOverlapping(query: OverlapQuery): Promise<Reservation[]> {
    const params: unknown[] = [query.startDate, query.endDate, query.vehicleId];
    let exclude = '';
    if (query.excludeReservationId) {
      params.push(query.excludeReservationId);
      exclude = `AND r.id <> $4`;
    }
    const rows = await exec(
      this.db,
      `SELECT r.* FROM rental.reservations r
       WHERE r.vehicle_id = $3
         AND r.reservation_status IN ${BLOCKING_STATUSES_SQL}
         AND ${overlapSql('r', '$1', '$2', query.allowSameDayTurnover ?? false)}
         ${exclude}
       ORDER BY r.start_date`,
      params,
    );
    return rows.map(mapReservationRow);
  }

  async countBlockingForCustomer(customerId: string): Promise<number> {
    const rows = await exec(
      this.db,
      `SELECT COUNT(*) AS cnt FROM rental.reservations
       WHERE customer_id = $1 AND reservation_status = ANY($2::text[])`,
      [customerId, BLOCKING_RESERVATION_STATUSES],
    );
    return rows[0] ? int(rows[0], 'cnt') : 0;
  }

  async insert(reservation: Reservation): Promise<Reservation> {
    const rows = await exec(
      this.db,
      `INSERT INTO rental.reservations
         (id, vehicle_id, customer_id, start_date, end_date, delivery_time,
          operational_status, reservation_status, odometer_out, odometer_in,
          km_allowance, advance_payment, partial_payment, wash_cost, fines_amount,
          damages_amount, other_costs, discount, half_day, daily_charge_override,
          total_daily_charge, km_charge, grand_total, remaining_balance, notes,
          created_at, updated_at)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14,$15,$16,$17,$18,$19,$20,
               $21,$22,$23,$24,$25,$26,$27)
       RETURNING *`,
      [...reservationParams(reservation), reservation.createdAt, reservation.updatedAt],
    );
    const row = rows[0];
    if (!row) throw new Error(`insert of reservation ${reservation.id} returned no row`);
    return mapReservationRow(row);
  }

  async update(reservation: Reservation): Promise<Reservation | null> {
    const rows = await exec(
      this.db,
      `UPDATE rental.reservations
       SET vehicle_id = $2, customer_id = $3, start_date = $4, end_date = $5,
           delivery_time = $6, operational_status = $7, reservation_status = $8,
           odometer_out = $9, odometer_in = $10, km_allowance = $11,
           advance_payment = $12, partial_payment = $13, wash_cost = $14,
           fines_amount = $15, damages_amount = $16, other_costs = $17,
           discount = $18, half_day = $19, daily_charge_override = $20,
           total_daily_charge = $21, km_charge = $22, grand_total = $23,
           remaining_balance = $24, notes = $25, updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      reservationParams(reservation),
    );
    return rows[0] ? mapReservationRow(rows[0]) : null;
  }
}

function reservationParams(r: Reservation): unknown[] {
  return [
    r.id,
    r.vehicleId,
    r.customerId,
    r.startDate,
    r.endDate,
    r.deliveryTime,
    r.operationalStatus,
    r.reservationStatus,
    r.odometerOut,
    r.odometerIn,
    r.kmAllowance,
    moneyParam(r.advancePayment),
    moneyParam(r.partialPayment),
    moneyParam(r.washCost),
    moneyParam(r.finesAmount),
    moneyParam(r.damagesAmount),
    moneyParam(r.otherCosts),
    moneyParam(r.discount),
    r.halfDay,
    moneyParam(r.dailyChargeOverride),
    moneyParam(r.totalDailyCharge),
    moneyParam(r.kmCharge),
    moneyParam(r.grandTotal),
    moneyParam(r.remainingBalance),
    r.notes,
  ];
}

export function mapReservationRow(row: Row): Reservation {
  return {
    id: str(row, 'id'),
    vehicleId: str(row, 'vehicle_id'),
    customerId: str(row, 'customer_id'),
    startDate: date(row, 'start_date'),
    endDate: date(row, 'end_date'),
    deliveryTime: optStr(row, 'delivery_time'),
    operationalStatus: oneOf(row, 'operational_status', OPERATIONAL_STATUSES),
    reservationStatus: oneOf(row, 'reservation_status', RESERVATION_STATUSES),
    odometerOut: optInt(row, 'odometer_out'),
    odometerIn: optInt(row, 'odometer_in'),
    kmAllowance: int(row, 'km_allowance'),
    advancePayment: dec(row, 'advance_payment'),
    partialPayment: dec(row, 'partial_payment'),
    washCost: dec(row, 'wash_cost'),
    finesAmount: dec(row, 'fines_amount'),
    damagesAmount: dec(row, 'damages_amount'),
    otherCosts: dec(row, 'other_costs'),
    discount: dec(row, 'discount'),
    halfDay: bool(row, 'half_day'),
    dailyChargeOverride: optDec(row, 'daily_charge_override'),
    totalDailyCharge: dec(row, 'total_daily_charge'),
    kmCharge: dec(row, 'km_charge'),
    grandTotal: dec(row, 'grand_total'),
    remainingBalance: dec(row, 'remaining_balance'),
    notes: optStr(row, 'notes'),
    createdAt: ts(row, 'created_at'),
    updatedAt: ts(row, 'updated_at'),
  };
}

function mapReservationViewRow(row: Row): ReservationView {
  return {
    ...mapReservationRow(row),
    customerName: str(row, 'customer_name'),
    vehicleLabel: str(row, 'vehicle_label'),
    plate: str(row, 'plate'),
  };
}
