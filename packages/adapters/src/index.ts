// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export {
  getPool,
  closePool,
  configurePool,
  withTransaction,
  translatePgError,
  exec,
} from './postgres/pool.js';
export type { DbPool, DbClient, Queryable, PoolOptions } from './postgres/pool.js';
export { PgVehicleRepository } from './postgres/vehicle.repository.js';
export { PgCustomerRepository } from './postgres/customer.repository.js';
export { PgReservationRepository } from './postgres/reservation.repository.js';
export { PgFineRepository } from './postgres/fine.repository.js';
export { PgUserDirectory } from './postgres/user.repository.js';
export { PgAuditLogRepository } from './postgres/audit-log.repository.js';
export { PgUnitOfWork } from './postgres/unit-of-work.js';

// ─── Documents / Reporting ────────────────────────────────────────────────────
export { TextDocumentGenerator } from './documents/text-document-generator.js';
export { XlsxOccupancyExporter } from './reporting/xlsx-occupancy-exporter.js';

// ─── Clock ────────────────────────────────────────────────────────────────────
export { SystemClock, FixedClock } from './clock/system-clock.js';
