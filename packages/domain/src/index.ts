// ─── Errors & Values ──────────────────────────────────────────────────────────
export * from './errors.js';
export * from './values/money.js';
export * from './values/calendar-date.js';

// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/vehicle.js';
export * from './entities/customer.js';
export * from './entities/reservation.js';
export * from './entities/fine.js';
export * from './entities/user.js';

// ─── Rules ────────────────────────────────────────────────────────────────────
export * from './rules/pricing.js';
export * from './rules/availability.js';
export * from './rules/lifecycle.js';
export * from './rules/occupancy.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/operation-context.js';
export * from './ports/inbound/availability-query.port.js';
export * from './ports/inbound/reservation-command.port.js';
export * from './ports/inbound/registry-command.port.js';
export * from './ports/inbound/reporting-query.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/vehicle-repository.port.js';
export * from './ports/outbound/customer-repository.port.js';
export * from './ports/outbound/reservation-repository.port.js';
export * from './ports/outbound/fine-repository.port.js';
export * from './ports/outbound/unit-of-work.port.js';
export * from './ports/outbound/document-generator.port.js';
export * from './ports/outbound/occupancy-exporter.port.js';
export * from './ports/outbound/user-directory.port.js';
export * from './ports/outbound/audit-log.port.js';
export * from './ports/outbound/clock.port.js';
