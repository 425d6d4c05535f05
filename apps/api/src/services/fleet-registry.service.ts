import { v4 as uuidv4 } from 'uuid';
import {
  BLOCKING_RESERVATION_STATUSES,
  DuplicateRecord,
  IntegrityViolation,
  InvalidTransition,
  MANUAL_VEHICLE_STATUSES,
  NotFoundError,
  roundMoney,
  ValidationError,
  type AuditLogPort,
  type FleetRegistryPort,
  type OperationContext,
  type RegisterVehicleCommand,
  type UnitOfWorkPort,
  type UpdateVehicleCommand,
  type Vehicle,
  type VehicleRepositoryListFilters,
} from '@rentdesk/domain';
import { writeAuditLog } from './audit-log.service.js';

function normalizePlate(plate: string): string {
  return plate.replace(/\s+/g, '').toUpperCase();
}

function validateVehicle(vehicle: Vehicle): void {
  const required: Array<[string, string]> = [
    ['make', vehicle.make],
    ['model', vehicle.model],
    ['plate', vehicle.plate],
    ['color', vehicle.color],
    ['chassisNumber', vehicle.chassisNumber],
    ['registrationNumber', vehicle.registrationNumber],
  ];
  const missing = required.filter(([, value]) => value.trim().length === 0).map(([name]) => name);
  if (missing.length > 0) throw new ValidationError('required fields are empty', { missing });
  if (!vehicle.dailyRate.greaterThan(0)) throw new ValidationError('daily rate must be positive');
  if (vehicle.perKmRate.isNegative()) throw new ValidationError('per-km rate cannot be negative');
  if (!Number.isInteger(vehicle.odometerKm) || vehicle.odometerKm < 0) {
    throw new ValidationError('odometer must be a non-negative integer');
  }
}

export class FleetRegistryService implements FleetRegistryPort {
  constructor(
    private readonly uow: UnitOfWorkPort,
    private readonly auditLog: AuditLogPort,
  ) {}

  async get(vehicleId: string): Promise<Vehicle> {
    const vehicle = await this.uow.repositories.vehicles.findById(vehicleId);
    if (!vehicle) throw new NotFoundError('vehicle', vehicleId);
    return vehicle;
  }

  list(filters: VehicleRepositoryListFilters = {}): Promise<Vehicle[]> {
    return this.uow.repositories.vehicles.list(filters);
  }

  async register(ctx: OperationContext, cmd: RegisterVehicleCommand): Promise<Vehicle> {
    const now = new Date();
    const vehicle: Vehicle = {
      id: uuidv4(),
      make: cmd.make.trim(),
      model: cmd.model.trim(),
      plate: normalizePlate(cmd.plate),
      color: cmd.color.trim(),
      odometerKm: cmd.odometerKm,
      dailyRate: roundMoney(cmd.dailyRate),
      perKmRate: roundMoney(cmd.perKmRate),
      chassisNumber: cmd.chassisNumber.trim(),
      registrationNumber: cmd.registrationNumber.trim(),
      manufactureYear: cmd.manufactureYear,
      nextOilChangeKm: cmd.nextOilChangeKm ?? null,
      status: 'available',
      createdAt: now,
      updatedAt: now,
    };
    validateVehicle(vehicle);

    const { vehicles } = this.uow.repositories;
    if (await vehicles.findByPlate(vehicle.plate)) {
      throw new DuplicateRecord('vehicle', 'plate', vehicle.plate);
    }
    const created = await vehicles.insert(vehicle);

    await writeAuditLog(this.auditLog, {
      actorId: ctx.actorId,
      action: 'vehicle.registered',
      entityType: 'vehicle',
      entityId: created.id,
      payload: { plate: created.plate },
    });
    return created;
  }

  async update(ctx: OperationContext, cmd: UpdateVehicleCommand): Promise<Vehicle> {
    const updated = await this.uow.transaction(async (tx) => {
      const current = await tx.vehicles.findByIdForUpdate(cmd.vehicleId);
      if (!current) throw new NotFoundError('vehicle', cmd.vehicleId);
      if (current.status === 'excluded') {
        throw new InvalidTransition('vehicle', 'excluded', cmd.status ?? 'excluded');
      }

      const next: Vehicle = {
        ...current,
        make: cmd.make?.trim() ?? current.make,
        model: cmd.model?.trim() ?? current.model,
        plate: cmd.plate === undefined ? current.plate : normalizePlate(cmd.plate),
        color: cmd.color?.trim() ?? current.color,
        odometerKm: cmd.odometerKm ?? current.odometerKm,
        dailyRate: cmd.dailyRate === undefined ? current.dailyRate : roundMoney(cmd.dailyRate),
        perKmRate: cmd.perKmRate === undefined ? current.perKmRate : roundMoney(cmd.perKmRate),
        chassisNumber: cmd.chassisNumber?.trim() ?? current.chassisNumber,
        registrationNumber: cmd.registrationNumber?.trim() ?? current.registrationNumber,
        manufactureYear: cmd.manufactureYear ?? current.manufactureYear,
        nextOilChangeKm:
          cmd.nextOilChangeKm === undefined ? current.nextOilChangeKm : cmd.nextOilChangeKm,
        status: cmd.status ?? current.status,
      };
      validateVehicle(next);

      if (next.odometerKm < current.odometerKm) {
        throw new ValidationError('odometer cannot go backwards', {
          current: current.odometerKm,
          requested: next.odometerKm,
        });
      }
      if (next.status !== current.status) {
        const manual =
          MANUAL_VEHICLE_STATUSES.includes(next.status) && MANUAL_VEHICLE_STATUSES.includes(current.status);
        if (!manual) throw new InvalidTransition('vehicle', current.status, next.status);
      }
      if (next.plate !== current.plate) {
        const holder = await tx.vehicles.findByPlate(next.plate);
        if (holder && holder.id !== current.id) throw new DuplicateRecord('vehicle', 'plate', next.plate);
      }

      const saved = await tx.vehicles.update(next);
      if (!saved) throw new NotFoundError('vehicle', cmd.vehicleId);
      return saved;
    });

    await writeAuditLog(this.auditLog, {
      actorId: ctx.actorId,
      action: 'vehicle.updated',
      entityType: 'vehicle',
      entityId: updated.id,
      payload: { fields: Object.keys(cmd).filter((k) => k !== 'vehicleId') },
    });
    return updated;
  }

  /** Soft delete. Terminal; refused while the vehicle is out or booked. */
  async exclude(ctx: OperationContext, vehicleId: string): Promise<Vehicle> {
    const excluded = await this.uow.transaction(async (tx) => {
      const current = await tx.vehicles.findByIdForUpdate(vehicleId);
      if (!current) throw new NotFoundError('vehicle', vehicleId);
      if (current.status === 'excluded') return current;
      if (current.status === 'rented' || current.status === 'reserved') {
        throw new IntegrityViolation(`vehicle ${vehicleId} is ${current.status}`, {
          vehicleId,
          status: current.status,
        });
      }

      const live = await tx.reservations.listViews({
        vehicleId,
        reservationStatuses: [...BLOCKING_RESERVATION_STATUSES],
      });
      if (live.length > 0) {
        throw new IntegrityViolation(`vehicle ${vehicleId} has ${live.length} open reservation(s)`, {
          vehicleId,
          reservationIds: live.map((r) => r.id),
        });
      }

      const saved = await tx.vehicles.update({ ...current, status: 'excluded' });
      if (!saved) throw new NotFoundError('vehicle', vehicleId);
      return saved;
    });

    await writeAuditLog(this.auditLog, {
      actorId: ctx.actorId,
      action: 'vehicle.excluded',
      entityType: 'vehicle',
      entityId: vehicleId,
    });
    return excluded;
  }
}
