import { v4 as uuidv4 } from 'uuid';
import {
  assertReservationTransition,
  AvailabilityConflict,
  billableDays,
  BLOCKING_RESERVATION_STATUSES,
  compareDates,
  computeDailyCharge,
  computeFinalTotal,
  computeKmCharge,
  ConcurrencyConflict,
  deriveVehicleStatus,
  DocumentGenerationError,
  DEFAULT_KM_ALLOWANCE,
  InvalidTransition,
  isValidInterval,
  minMoney,
  NotFoundError,
  operationalStatusFor,
  roundMoney,
  ValidationError,
  ZERO,
  type AuditLogPort,
  type CalendarDate,
  type CreateReservationCommand,
  type Customer,
  type DeliverReservationCommand,
  type DeliveryResult,
  type DocumentGeneratorPort,
  type EditReservationCommand,
  type EditResult,
  type FinalTotal,
  type Money,
  type MoneyInput,
  type OperationalStatus,
  type OperationContext,
  type Reservation,
  type ReservationCommandPort,
  type ReservationListFilters,
  type ReservationStatus,
  type RentalRepositories,
  type ReservationView,
  type ReturnBreakdown,
  type ReturnReservationCommand,
  type ReturnResult,
  type UnitOfWorkPort,
  type Vehicle,
} from '@rentdesk/domain';
import { writeAuditLog } from './audit-log.service.js';

export interface ReservationServiceOptions {
  defaultKmAllowance?: number;
}

function optionalMoney(value: MoneyInput | undefined, fallback: Money): Money {
  return value === undefined ? fallback : roundMoney(value);
}

function requireBookable(vehicle: Vehicle, startDate: CalendarDate, endDate: CalendarDate): void {
  if (vehicle.status === 'unavailable' || vehicle.status === 'excluded') {
    throw new AvailabilityConflict(vehicle.id, startDate, endDate);
  }
}

function totalsOf(r: Reservation, overrides: Partial<Reservation> = {}): FinalTotal {
  const next = { ...r, ...overrides };
  return computeFinalTotal({
    dailyCharge: next.totalDailyCharge,
    kmCharge: next.kmCharge,
    extras: {
      wash: next.washCost,
      fines: next.finesAmount,
      damages: next.damagesAmount,
      other: next.otherCosts,
    },
    advancePaid: next.advancePayment,
    partialPaid: next.partialPayment,
  });
}

/**
 * Operational status after an edit. Pending fines always win; otherwise an
 * unchanged reservation status keeps its operational status.
 */
function resolveOperationalStatus(
  current: Reservation,
  reservationStatus: ReservationStatus,
  pendingFines: number,
  requested: OperationalStatus | undefined,
): OperationalStatus {
  if (requested !== undefined) return requested;
  if (pendingFines > 0) return 'fine_pending';
  if (reservationStatus === current.reservationStatus && current.operationalStatus !== 'fine_pending') {
    return current.operationalStatus;
  }
  return operationalStatusFor(reservationStatus);
}

/**
 * Reservation lifecycle: create, deliver, return, edit, cancel.
 *
 * Every multi-row mutation runs in one unit of work. The vehicle status is
 * re-derived from its live reservations inside the same transaction, so a
 * reservation and its vehicle never disagree after a commit.
 */
export class ReservationService implements ReservationCommandPort {
  private readonly defaultKmAllowance: number;

  constructor(
    private readonly uow: UnitOfWorkPort,
    private readonly documents: DocumentGeneratorPort,
    private readonly auditLog: AuditLogPort,
    options: ReservationServiceOptions = {},
  ) {
    this.defaultKmAllowance = options.defaultKmAllowance ?? DEFAULT_KM_ALLOWANCE;
  }

  // ─── Queries ────────────────────────────────────────────────────────────────

  async get(reservationId: string): Promise<ReservationView> {
    const view = await this.uow.repositories.reservations.findViewById(reservationId);
    if (!view) throw new NotFoundError('reservation', reservationId);
    return view;
  }

  list(filters: ReservationListFilters = {}): Promise<ReservationView[]> {
    return this.uow.repositories.reservations.listViews(filters);
  }

  /** Reservations running on a given day: the candidates for a traffic fine. */
  findOnDate(date: CalendarDate): Promise<ReservationView[]> {
    return this.uow.repositories.reservations.listViews({
      reservationStatuses: ['reserved', 'rented', 'finalized'],
      overlapping: { from: date, to: date },
    });
  }

  // ─── Create ─────────────────────────────────────────────────────────────────

  async create(ctx: OperationContext, cmd: CreateReservationCommand): Promise<Reservation> {
    if (!isValidInterval(cmd)) {
      throw new ValidationError('end date must be on or after start date', {
        startDate: cmd.startDate,
        endDate: cmd.endDate,
      });
    }

    const reservation = await this.uow.transaction(async (tx) => {
      const vehicle = await tx.vehicles.findByIdForUpdate(cmd.vehicleId);
      if (!vehicle) throw new NotFoundError('vehicle', cmd.vehicleId);
      requireBookable(vehicle, cmd.startDate, cmd.endDate);

      const customer = await tx.customers.findById(cmd.customerId);
      if (!customer) throw new NotFoundError('customer', cmd.customerId);
      if (customer.status !== 'active') {
        throw new ValidationError(`customer ${customer.id} is ${customer.status}`, {
          customerId: customer.id,
        });
      }

      // Re-checked under the vehicle lock: a concurrent booking of the same
      // vehicle waits here until this transaction ends.
      const clashes = await tx.reservations.findOverlapping({
        vehicleId: vehicle.id,
        startDate: cmd.startDate,
        endDate: cmd.endDate,
        allowSameDayTurnover: cmd.allowSameDayTurnover ?? false,
      });
      if (clashes.length > 0) throw new AvailabilityConflict(vehicle.id, cmd.startDate, cmd.endDate);

      const halfDay = cmd.halfDay ?? false;
      const discount = optionalMoney(cmd.discount, ZERO);
      const totalDailyCharge = computeDailyCharge(
        vehicle.dailyRate,
        billableDays(cmd.startDate, cmd.endDate),
        halfDay,
        discount,
      );
      const advancePayment = optionalMoney(cmd.advancePayment, roundMoney(totalDailyCharge.times(0.5)));
      if (advancePayment.isNegative()) throw new ValidationError('advance payment cannot be negative');

      const now = new Date();
      const draft: Reservation = {
        id: uuidv4(),
        vehicleId: vehicle.id,
        customerId: customer.id,
        startDate: cmd.startDate,
        endDate: cmd.endDate,
        deliveryTime: cmd.deliveryTime ?? null,
        operationalStatus: 'active',
        reservationStatus: 'reserved',
        odometerOut: vehicle.odometerKm,
        odometerIn: null,
        kmAllowance: cmd.kmAllowance ?? this.defaultKmAllowance,
        advancePayment,
        partialPayment: ZERO,
        washCost: ZERO,
        finesAmount: ZERO,
        damagesAmount: ZERO,
        otherCosts: ZERO,
        discount,
        halfDay,
        dailyChargeOverride: null,
        totalDailyCharge,
        kmCharge: ZERO,
        grandTotal: ZERO,
        remainingBalance: ZERO,
        notes: cmd.notes ?? null,
        createdAt: now,
        updatedAt: now,
      };
      const totals = totalsOf(draft);
      const created = await tx.reservations.insert({
        ...draft,
        grandTotal: totals.grandTotal,
        remainingBalance: totals.remainingBalance,
      });

      await this.syncVehicle(tx, vehicle.id);
      return created;
    });

    await writeAuditLog(this.auditLog, {
      actorId: ctx.actorId,
      action: 'reservation.created',
      entityType: 'reservation',
      entityId: reservation.id,
      payload: {
        vehicleId: reservation.vehicleId,
        customerId: reservation.customerId,
        startDate: reservation.startDate,
        endDate: reservation.endDate,
        sameDayTurnover: cmd.allowSameDayTurnover ?? false,
      },
    });
    return reservation;
  }

  // ─── Deliver ────────────────────────────────────────────────────────────────

  async deliver(ctx: OperationContext, cmd: DeliverReservationCommand): Promise<DeliveryResult> {
    const amountCollected = roundMoney(cmd.amountCollected);
    if (amountCollected.isNegative()) throw new ValidationError('amount collected cannot be negative');

    const result = await this.uow.transaction(async (tx) => {
      const current = await tx.reservations.findByIdForUpdate(cmd.reservationId);
      if (!current) throw new NotFoundError('reservation', cmd.reservationId);
      assertReservationTransition(current.reservationStatus, 'rented');

      const customer = await this.requireCustomer(tx, current.customerId);
      if (!customer.licenseExpiry || compareDates(customer.licenseExpiry, ctx.today) < 0) {
        throw new ValidationError(`driver licence of customer ${customer.id} is expired or missing`, {
          licenseExpiry: customer.licenseExpiry,
          today: ctx.today,
        });
      }

      const vehicle = await tx.vehicles.findByIdForUpdate(current.vehicleId);
      if (!vehicle) throw new ConcurrencyConflict(`vehicle ${current.vehicleId} disappeared`);
      if (vehicle.status === 'unavailable' || vehicle.status === 'excluded' || vehicle.status === 'rented') {
        throw new InvalidTransition('vehicle', vehicle.status, 'rented');
      }
      if (cmd.odometerOut < vehicle.odometerKm) {
        throw new ValidationError('odometer-out cannot be lower than the vehicle odometer', {
          odometerOut: cmd.odometerOut,
          vehicleOdometerKm: vehicle.odometerKm,
        });
      }
      if (compareDates(cmd.departureDate, current.endDate) > 0) {
        throw new ValidationError('departure date is after the reservation end date', {
          departureDate: cmd.departureDate,
          endDate: current.endDate,
        });
      }
      if (compareDates(cmd.departureDate, current.startDate) < 0) {
        const clashes = await tx.reservations.findOverlapping({
          vehicleId: vehicle.id,
          startDate: cmd.departureDate,
          endDate: current.endDate,
          excludeReservationId: current.id,
        });
        if (clashes.length > 0) {
          throw new AvailabilityConflict(vehicle.id, cmd.departureDate, current.endDate);
        }
      }

      const totalDailyCharge =
        current.dailyChargeOverride ??
        computeDailyCharge(
          vehicle.dailyRate,
          billableDays(cmd.departureDate, current.endDate),
          current.halfDay,
          current.discount,
        );
      const changes: Partial<Reservation> = {
        startDate: cmd.departureDate,
        odometerOut: cmd.odometerOut,
        deliveryTime: cmd.deliveryTime ?? current.deliveryTime,
        reservationStatus: 'rented',
        operationalStatus: current.operationalStatus === 'fine_pending' ? 'fine_pending' : 'active',
        totalDailyCharge,
      };
      const due = totalsOf(current, changes).remainingBalance;
      const paymentApplied = minMoney(amountCollected, due);
      const changeDue = roundMoney(amountCollected.minus(paymentApplied));
      const partialPayment = roundMoney(current.partialPayment.plus(paymentApplied));
      const totals = totalsOf(current, { ...changes, partialPayment });

      const reservation = await tx.reservations.update({
        ...current,
        ...changes,
        partialPayment,
        grandTotal: totals.grandTotal,
        remainingBalance: totals.remainingBalance,
      });
      if (!reservation) throw new ConcurrencyConflict(`reservation ${current.id} changed during delivery`);

      const rented = await tx.vehicles.update({ ...vehicle, odometerKm: cmd.odometerOut, status: 'rented' });
      if (!rented) throw new ConcurrencyConflict(`vehicle ${vehicle.id} changed during delivery`);

      let contract: Uint8Array;
      try {
        contract = await this.documents.generateContract(customer, rented, {
          reservationId: reservation.id,
          startDate: reservation.startDate,
          endDate: reservation.endDate,
          deliveryTime: reservation.deliveryTime,
          odometerOut: cmd.odometerOut,
          kmAllowance: reservation.kmAllowance,
          totalDailyCharge: reservation.totalDailyCharge,
          amountPaid: totals.totalPaid,
        });
      } catch (err) {
        throw new DocumentGenerationError('contract', err);
      }

      return { reservation, totals, paymentApplied, changeDue, contract };
    });

    await writeAuditLog(this.auditLog, {
      actorId: ctx.actorId,
      action: 'reservation.delivered',
      entityType: 'reservation',
      entityId: result.reservation.id,
      payload: {
        odometerOut: cmd.odometerOut,
        departureDate: cmd.departureDate,
        amountCollected: amountCollected.toFixed(2),
        paymentApplied: result.paymentApplied.toFixed(2),
        changeDue: result.changeDue.toFixed(2),
      },
    });
    return result;
  }

  // ─── Return ─────────────────────────────────────────────────────────────────

  async returnVehicle(ctx: OperationContext, cmd: ReturnReservationCommand): Promise<ReturnResult> {
    const paymentReceived = roundMoney(cmd.paymentReceived);
    if (paymentReceived.isNegative()) throw new ValidationError('payment received cannot be negative');

    const result = await this.uow.transaction(async (tx) => {
      const current = await tx.reservations.findByIdForUpdate(cmd.reservationId);
      if (!current) throw new NotFoundError('reservation', cmd.reservationId);
      assertReservationTransition(current.reservationStatus, 'finalized');
      if (current.odometerOut === null) {
        throw new ValidationError(`reservation ${current.id} has no odometer-out recorded`);
      }

      const vehicle = await tx.vehicles.findByIdForUpdate(current.vehicleId);
      if (!vehicle) throw new ConcurrencyConflict(`vehicle ${current.vehicleId} disappeared`);
      const customer = await this.requireCustomer(tx, current.customerId);

      const warnings: string[] = [];
      let returnDate = cmd.returnDate ?? ctx.today;
      if (compareDates(returnDate, ctx.today) > 0) {
        warnings.push(`return date ${returnDate} is in the future; using ${ctx.today}`);
        returnDate = ctx.today;
      }
      if (compareDates(returnDate, current.startDate) < 0) {
        warnings.push(
          `return date ${returnDate} is before the pickup date; using ${current.startDate}`,
        );
        returnDate = current.startDate;
      }

      const kmCharge = computeKmCharge(
        current.odometerOut,
        cmd.odometerIn,
        current.kmAllowance,
        vehicle.perKmRate,
      );
      const extras = cmd.extraCharges ?? {};
      const changes: Partial<Reservation> = {
        kmCharge,
        washCost: optionalMoney(extras.wash, current.washCost),
        finesAmount: optionalMoney(extras.fines, current.finesAmount),
        damagesAmount: optionalMoney(extras.damages, current.damagesAmount),
        otherCosts: optionalMoney(extras.other, current.otherCosts),
      };

      const due = totalsOf(current, changes).remainingBalance;
      const paymentApplied = minMoney(paymentReceived, due);
      const changeDue = roundMoney(paymentReceived.minus(paymentApplied));
      const partialPayment = roundMoney(current.partialPayment.plus(paymentApplied));
      const totals = totalsOf(current, { ...changes, partialPayment });

      const pendingFines = await tx.fines.countPending(current.id);
      const reservation = await tx.reservations.update({
        ...current,
        ...changes,
        partialPayment,
        odometerIn: cmd.odometerIn,
        endDate: returnDate,
        reservationStatus: 'finalized',
        operationalStatus: pendingFines > 0 ? 'fine_pending' : 'finalized',
        grandTotal: totals.grandTotal,
        remainingBalance: totals.remainingBalance,
      });
      if (!reservation) throw new ConcurrencyConflict(`reservation ${current.id} changed during return`);

      const returned = await this.syncVehicle(tx, vehicle.id, Math.max(vehicle.odometerKm, cmd.odometerIn));

      const kmDriven = cmd.odometerIn - current.odometerOut;
      const breakdown: ReturnBreakdown = {
        reservationId: reservation.id,
        startDate: reservation.startDate,
        returnDate,
        days: billableDays(reservation.startDate, returnDate),
        odometerOut: current.odometerOut,
        odometerIn: cmd.odometerIn,
        kmDriven,
        kmAllowance: current.kmAllowance,
        billableKm: Math.max(0, kmDriven - current.kmAllowance),
        totals,
        paymentReceived,
        paymentApplied,
        changeDue,
        warnings,
      };

      let receipt: Uint8Array;
      try {
        receipt = await this.documents.generateReceipt(customer, returned, breakdown);
      } catch (err) {
        throw new DocumentGenerationError('receipt', err);
      }

      return { reservation, totals, returnDate, paymentApplied, changeDue, warnings, receipt };
    });

    if (result.warnings.length > 0) {
      console.warn(`[reservations] ${result.reservation.id}: ${result.warnings.join('; ')}`);
    }
    await writeAuditLog(this.auditLog, {
      actorId: ctx.actorId,
      action: 'reservation.returned',
      entityType: 'reservation',
      entityId: result.reservation.id,
      payload: {
        odometerIn: cmd.odometerIn,
        returnDate: result.returnDate,
        grandTotal: result.totals.grandTotal.toFixed(2),
        signedBalance: result.totals.signedBalance.toFixed(2),
        settlement: result.totals.settlement,
      },
    });
    return result;
  }

  // ─── Edit ───────────────────────────────────────────────────────────────────

  async edit(ctx: OperationContext, cmd: EditReservationCommand): Promise<EditResult> {
    const result = await this.uow.transaction(async (tx) => {
      const current = await tx.reservations.findByIdForUpdate(cmd.reservationId);
      if (!current) throw new NotFoundError('reservation', cmd.reservationId);

      const startDate = cmd.startDate ?? current.startDate;
      const endDate = cmd.endDate ?? current.endDate;
      if (!isValidInterval({ startDate, endDate })) {
        throw new ValidationError('end date must be on or after start date', { startDate, endDate });
      }

      const odometerOut = cmd.odometerOut === undefined ? current.odometerOut : cmd.odometerOut;
      const odometerIn = cmd.odometerIn === undefined ? current.odometerIn : cmd.odometerIn;
      if (odometerOut !== null && odometerIn !== null && odometerIn < odometerOut) {
        throw new ValidationError('odometer-in cannot be lower than odometer-out', {
          odometerOut,
          odometerIn,
        });
      }

      const customerId = cmd.customerId ?? current.customerId;
      if (customerId !== current.customerId) {
        const customer = await this.requireCustomer(tx, customerId);
        if (customer.status === 'removed') {
          throw new ValidationError(`customer ${customer.id} has been removed`);
        }
      }

      const reservationStatus = cmd.reservationStatus ?? current.reservationStatus;
      const pendingFines = await tx.fines.countPending(current.id);
      const requestedFinePending = cmd.operationalStatus === 'fine_pending';
      if (cmd.operationalStatus !== undefined && requestedFinePending !== pendingFines > 0) {
        throw new ValidationError(
          pendingFines > 0
            ? `reservation ${current.id} has pending fines and must stay fine_pending`
            : `reservation ${current.id} has no pending fines`,
          { operationalStatus: cmd.operationalStatus, pendingFines },
        );
      }
      const operationalStatus = resolveOperationalStatus(
        current,
        reservationStatus,
        pendingFines,
        cmd.operationalStatus,
      );

      const vehicleId = cmd.vehicleId ?? current.vehicleId;
      const vehicleChanged = vehicleId !== current.vehicleId;
      if (vehicleChanged) {
        const previous = await tx.vehicles.findByIdForUpdate(current.vehicleId);
        if (!previous) throw new ConcurrencyConflict(`vehicle ${current.vehicleId} disappeared`);
      }
      const vehicle = await tx.vehicles.findByIdForUpdate(vehicleId);
      if (!vehicle) throw new NotFoundError('vehicle', vehicleId);

      if (BLOCKING_RESERVATION_STATUSES.includes(reservationStatus)) {
        if (vehicleChanged) requireBookable(vehicle, startDate, endDate);
        const clashes = await tx.reservations.findOverlapping({
          vehicleId,
          startDate,
          endDate,
          excludeReservationId: current.id,
        });
        if (clashes.length > 0) throw new AvailabilityConflict(vehicleId, startDate, endDate);
      }

      const halfDay = cmd.halfDay ?? current.halfDay;
      const discount = optionalMoney(cmd.discount, current.discount);
      const kmAllowance = cmd.kmAllowance ?? current.kmAllowance;
      const computedDailyCharge = computeDailyCharge(
        vehicle.dailyRate,
        billableDays(startDate, endDate),
        halfDay,
        discount,
      );
      const dailyChargeOverride =
        cmd.dailyChargeOverride === undefined
          ? current.dailyChargeOverride
          : cmd.dailyChargeOverride === null
            ? null
            : roundMoney(cmd.dailyChargeOverride);

      let kmCharge = optionalMoney(cmd.kmCharge, current.kmCharge);
      if (cmd.kmCharge === undefined && odometerOut !== null && odometerIn !== null) {
        kmCharge = computeKmCharge(odometerOut, odometerIn, kmAllowance, vehicle.perKmRate);
      }

      const next: Reservation = {
        ...current,
        customerId,
        vehicleId,
        startDate,
        endDate,
        deliveryTime: cmd.deliveryTime === undefined ? current.deliveryTime : cmd.deliveryTime,
        reservationStatus,
        operationalStatus,
        odometerOut,
        odometerIn,
        kmAllowance,
        advancePayment: optionalMoney(cmd.advancePayment, current.advancePayment),
        partialPayment: optionalMoney(cmd.partialPayment, current.partialPayment),
        washCost: optionalMoney(cmd.washCost, current.washCost),
        finesAmount: optionalMoney(cmd.finesAmount, current.finesAmount),
        damagesAmount: optionalMoney(cmd.damagesAmount, current.damagesAmount),
        otherCosts: optionalMoney(cmd.otherCosts, current.otherCosts),
        discount,
        halfDay,
        dailyChargeOverride,
        totalDailyCharge: dailyChargeOverride ?? computedDailyCharge,
        kmCharge,
        notes: cmd.notes === undefined ? current.notes : cmd.notes,
      };
      const amounts = [
        'advancePayment',
        'partialPayment',
        'washCost',
        'finesAmount',
        'damagesAmount',
        'otherCosts',
      ] as const;
      for (const field of amounts) {
        if (next[field].isNegative()) throw new ValidationError(`${field} cannot be negative`);
      }
      if (dailyChargeOverride?.isNegative()) {
        throw new ValidationError('daily charge override cannot be negative');
      }
      const totals = totalsOf(next);

      const reservation = await tx.reservations.update({
        ...next,
        grandTotal: totals.grandTotal,
        remainingBalance: totals.remainingBalance,
      });
      if (!reservation) throw new ConcurrencyConflict(`reservation ${current.id} changed during edit`);

      await this.syncVehicle(tx, vehicleId);
      if (vehicleChanged) await this.syncVehicle(tx, current.vehicleId);

      return { reservation, computedDailyCharge };
    });

    await writeAuditLog(this.auditLog, {
      actorId: ctx.actorId,
      action: 'reservation.edited',
      entityType: 'reservation',
      entityId: result.reservation.id,
      payload: { fields: Object.keys(cmd).filter((k) => k !== 'reservationId') },
    });
    return result;
  }

  // ─── Cancel ─────────────────────────────────────────────────────────────────

  async cancel(ctx: OperationContext, reservationId: string): Promise<Reservation> {
    const reservation = await this.uow.transaction(async (tx) => {
      const current = await tx.reservations.findByIdForUpdate(reservationId);
      if (!current) throw new NotFoundError('reservation', reservationId);
      assertReservationTransition(current.reservationStatus, 'cancelled');

      const cancelled = await tx.reservations.update({
        ...current,
        reservationStatus: 'cancelled',
        operationalStatus: 'inactive',
      });
      if (!cancelled) throw new ConcurrencyConflict(`reservation ${reservationId} changed during cancel`);

      await this.syncVehicle(tx, current.vehicleId);
      return cancelled;
    });

    await writeAuditLog(this.auditLog, {
      actorId: ctx.actorId,
      action: 'reservation.cancelled',
      entityType: 'reservation',
      entityId: reservation.id,
    });
    return reservation;
  }

  // ─── Receipt reprint ────────────────────────────────────────────────────────

  async reprintReceipt(_ctx: OperationContext, reservationId: string): Promise<Uint8Array> {
    const { reservations, vehicles } = this.uow.repositories;
    const reservation = await reservations.findById(reservationId);
    if (!reservation) throw new NotFoundError('reservation', reservationId);
    if (
      reservation.reservationStatus !== 'finalized' ||
      reservation.odometerOut === null ||
      reservation.odometerIn === null
    ) {
      throw new InvalidTransition('reservation', reservation.reservationStatus, 'receipt');
    }

    const vehicle = await vehicles.findById(reservation.vehicleId);
    if (!vehicle) throw new NotFoundError('vehicle', reservation.vehicleId);
    const customer = await this.requireCustomer(this.uow.repositories, reservation.customerId);

    const kmDriven = reservation.odometerIn - reservation.odometerOut;
    try {
      return await this.documents.generateReceipt(customer, vehicle, {
        reservationId: reservation.id,
        startDate: reservation.startDate,
        returnDate: reservation.endDate,
        days: billableDays(reservation.startDate, reservation.endDate),
        odometerOut: reservation.odometerOut,
        odometerIn: reservation.odometerIn,
        kmDriven,
        kmAllowance: reservation.kmAllowance,
        billableKm: Math.max(0, kmDriven - reservation.kmAllowance),
        totals: totalsOf(reservation),
        paymentReceived: ZERO,
        paymentApplied: ZERO,
        changeDue: ZERO,
        warnings: [],
      });
    } catch (err) {
      throw new DocumentGenerationError('receipt', err);
    }
  }

  // ─── Helpers ────────────────────────────────────────────────────────────────

  private async requireCustomer(repos: RentalRepositories, customerId: string): Promise<Customer> {
    const customer = await repos.customers.findById(customerId);
    if (!customer) throw new NotFoundError('customer', customerId);
    return customer;
  }

  /** Re-derives the vehicle status from its live reservations, optionally moving the odometer. */
  private async syncVehicle(
    tx: RentalRepositories,
    vehicleId: string,
    odometerKm?: number,
  ): Promise<Vehicle> {
    const vehicle = await tx.vehicles.findByIdForUpdate(vehicleId);
    if (!vehicle) throw new ConcurrencyConflict(`vehicle ${vehicleId} disappeared`);

    const live = await tx.reservations.listViews({
      vehicleId,
      reservationStatuses: [...BLOCKING_RESERVATION_STATUSES],
    });
    const status = deriveVehicleStatus(
      vehicle.status,
      live.map((r) => r.reservationStatus),
    );
    const odometer = odometerKm ?? vehicle.odometerKm;
    if (status === vehicle.status && odometer === vehicle.odometerKm) return vehicle;

    const updated = await tx.vehicles.update({ ...vehicle, status, odometerKm: odometer });
    if (!updated) throw new ConcurrencyConflict(`vehicle ${vehicleId} changed during update`);
    return updated;
  }
}
