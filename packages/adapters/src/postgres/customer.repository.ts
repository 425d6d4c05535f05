import {
  CUSTOMER_STATUSES,
  type Customer,
  type CustomerRepositoryListFilters,
  type CustomerRepositoryPort,
} from '@rentdesk/domain';
import { exec, getPool, type Queryable } from './pool.js';
import { oneOf, optDate, optStr, str, ts, type Row } from './row.js';

export class PgCustomerRepository implements CustomerRepositoryPort {
  constructor(private readonly db: Queryable = getPool()) {}

  async findById(customerId: string): Promise<Customer | null> {
    const rows = await exec(this.db, `SELECT * FROM rental.customers WHERE id = $1`, [customerId]);
    return rows[0] ? mapCustomerRow(rows[0]) : null;
  }

  async findByNationalId(nationalId: string): Promise<Customer | null> {
    const rows = await exec(
      this.db,
      `SELECT * FROM rental.customers WHERE national_id = $1 AND status <> 'removed'`,
      [nationalId],
    );
    return rows[0] ? mapCustomerRow(rows[0]) : null;
  }

  async findBySecondaryId(secondaryId: string): Promise<Customer | null> {
    const rows = await exec(
      this.db,
      `SELECT * FROM rental.customers WHERE secondary_id = $1 AND status <> 'removed'`,
      [secondaryId],
    );
    return rows[0] ? mapCustomerRow(rows[0]) : null;
  }

  async list(filters: CustomerRepositoryListFilters = {}): Promise<Customer[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    let idx = 1;

    if (filters.status) {
      conditions.push(`status = $${idx++}`);
      params.push(filters.status);
    }
    if (!filters.includeRemoved && filters.status !== 'removed') {
      conditions.push(`status <> 'removed'`);
    }
    if (filters.search) {
      conditions.push(`(full_name ILIKE $${idx} OR national_id ILIKE $${idx})`);
      params.push(`%${filters.search}%`);
      idx++;
    }

    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = await exec(this.db, `SELECT * FROM rental.customers ${where} ORDER BY full_name`, params);
    return rows.map(mapCustomerRow);
  }

  async insert(customer: Customer): Promise<Customer> {
    const rows = await exec(
      this.db,
      `INSERT INTO rental.customers
         (id, full_name, national_id, secondary_id, license_number, license_expiry,
          license_region, phone, address, notes, status, created_at, updated_at)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13)
       RETURNING *`,
      [...customerParams(customer), customer.createdAt, customer.updatedAt],
    );
    const row = rows[0];
    if (!row) throw new Error(`insert of customer ${customer.id} returned no row`);
    return mapCustomerRow(row);
  }

  async update(customer: Customer): Promise<Customer | null> {
    const rows = await exec(
      this.db,
      `UPDATE rental.customers
       SET full_name = $2, national_id = $3, secondary_id = $4, license_number = $5,
           license_expiry = $6, license_region = $7, phone = $8, address = $9,
           notes = $10, status = $11, updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      customerParams(customer),
    );
    return rows[0] ? mapCustomerRow(rows[0]) : null;
  }
}

function customerParams(c: Customer): unknown[] {
  return [
    c.id,
    c.fullName,
    c.nationalId,
    c.secondaryId,
    c.licenseNumber,
    c.licenseExpiry,
    c.licenseRegion,
    c.phone,
    c.address,
    c.notes,
    c.status,
  ];
}

export function mapCustomerRow(row: Row): Customer {
  return {
    id: str(row, 'id'),
    fullName: str(row, 'full_name'),
    nationalId: str(row, 'national_id'),
    secondaryId: optStr(row, 'secondary_id'),
    licenseNumber: str(row, 'license_number'),
    licenseExpiry: optDate(row, 'license_expiry'),
    licenseRegion: str(row, 'license_region'),
    phone: str(row, 'phone'),
    address: optStr(row, 'address'),
    notes: optStr(row, 'notes'),
    status: oneOf(row, 'status', CUSTOMER_STATUSES),
    createdAt: ts(row, 'created_at'),
    updatedAt: ts(row, 'updated_at'),
  };
}
