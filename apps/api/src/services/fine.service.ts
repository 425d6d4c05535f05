import { v4 as uuidv4 } from 'uuid';
import {
  assertFineTransition,
  calendarDateOf,
  compareDates,
  ConcurrencyConflict,
  FINEABLE_RESERVATION_STATUSES,
  InvalidTransition,
  NotFoundError,
  operationalStatusAfterFines,
  roundMoney,
  ValidationError,
  type AuditLogPort,
  type CalendarDate,
  type Fine,
  type FineCommandPort,
  type FineStatus,
  type OperationContext,
  type RegisterFineCommand,
  type Reservation,
  type ResolveFineCommand,
  type UnitOfWorkPort,
} from '@rentdesk/domain';
import { writeAuditLog } from './audit-log.service.js';

/**
 * An infraction must fall on a day the customer had the car: from pickup to
 * the end date, or to today while the car is still out.
 */
function assertWithinRental(reservation: Reservation, infractionAt: Date, today: CalendarDate): void {
  const day = calendarDateOf(infractionAt);
  const lastDay =
    reservation.reservationStatus === 'rented' && compareDates(today, reservation.endDate) > 0
      ? today
      : reservation.endDate;
  if (compareDates(day, reservation.startDate) < 0 || compareDates(day, lastDay) > 0) {
    throw new ValidationError('infraction date is outside the rental period', {
      infractionDate: day,
      startDate: reservation.startDate,
      endDate: lastDay,
    });
  }
}

export class FineService implements FineCommandPort {
  constructor(
    private readonly uow: UnitOfWorkPort,
    private readonly auditLog: AuditLogPort,
  ) {}

  listFines(
    filters: { reservationId?: string; status?: FineStatus; from?: Date; to?: Date } = {},
  ): Promise<Fine[]> {
    return this.uow.repositories.fines.list({
      reservationIds: filters.reservationId ? [filters.reservationId] : undefined,
      status: filters.status,
      from: filters.from,
      to: filters.to,
    });
  }

  async registerFine(ctx: OperationContext, cmd: RegisterFineCommand): Promise<Fine> {
    const amount = roundMoney(cmd.amount);
    if (amount.isNegative()) throw new ValidationError('fine amount cannot be negative');
    if (!cmd.infractionType.trim()) throw new ValidationError('infraction type is required');

    const fine = await this.uow.transaction(async (tx) => {
      const reservation = await tx.reservations.findByIdForUpdate(cmd.reservationId);
      if (!reservation) throw new NotFoundError('reservation', cmd.reservationId);
      if (!FINEABLE_RESERVATION_STATUSES.includes(reservation.reservationStatus)) {
        throw new InvalidTransition('reservation', reservation.reservationStatus, 'fine_pending');
      }
      assertWithinRental(reservation, cmd.infractionAt, ctx.today);

      const now = new Date();
      const created = await tx.fines.insert({
        id: uuidv4(),
        reservationId: reservation.id,
        infractionType: cmd.infractionType.trim(),
        amount,
        infractionAt: cmd.infractionAt,
        location: cmd.location ?? null,
        status: 'pending',
        paidAt: null,
        notes: cmd.notes ?? null,
        createdAt: now,
        updatedAt: now,
      });

      if (reservation.operationalStatus !== 'fine_pending') {
        const updated = await tx.reservations.update({ ...reservation, operationalStatus: 'fine_pending' });
        if (!updated) throw new ConcurrencyConflict(`reservation ${reservation.id} changed while fining`);
      }
      return created;
    });

    await writeAuditLog(this.auditLog, {
      actorId: ctx.actorId,
      action: 'fine.registered',
      entityType: 'fine',
      entityId: fine.id,
      payload: { reservationId: fine.reservationId, amount: fine.amount.toFixed(2) },
    });
    return fine;
  }

  async resolveFine(ctx: OperationContext, cmd: ResolveFineCommand): Promise<Fine> {
    const fine = await this.uow.transaction(async (tx) => {
      const current = await tx.fines.findByIdForUpdate(cmd.fineId);
      if (!current) throw new NotFoundError('fine', cmd.fineId);
      assertFineTransition(current.status, cmd.status);

      const reservation = await tx.reservations.findByIdForUpdate(current.reservationId);
      if (!reservation) throw new ConcurrencyConflict(`reservation ${current.reservationId} disappeared`);

      const updated = await tx.fines.update({
        ...current,
        status: cmd.status,
        paidAt: cmd.status === 'paid' ? (cmd.paidAt ?? current.paidAt ?? new Date()) : null,
        notes: cmd.notes === undefined ? current.notes : cmd.notes,
      });
      if (!updated) throw new ConcurrencyConflict(`fine ${current.id} changed during update`);

      const pending = await tx.fines.countPending(reservation.id);
      const operationalStatus = operationalStatusAfterFines(pending);
      if (operationalStatus !== reservation.operationalStatus) {
        const saved = await tx.reservations.update({ ...reservation, operationalStatus });
        if (!saved) throw new ConcurrencyConflict(`reservation ${reservation.id} changed while resolving fine`);
      }
      return updated;
    });

    await writeAuditLog(this.auditLog, {
      actorId: ctx.actorId,
      action: 'fine.status_changed',
      entityType: 'fine',
      entityId: fine.id,
      payload: { status: fine.status },
    });
    return fine;
  }
}
