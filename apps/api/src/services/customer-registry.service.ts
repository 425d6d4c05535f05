import { v4 as uuidv4 } from 'uuid';
import {
  DuplicateRecord,
  IntegrityViolation,
  InvalidTransition,
  NotFoundError,
  ValidationError,
  type AuditLogPort,
  type Customer,
  type CustomerRegistryPort,
  type CustomerRepositoryListFilters,
  type CustomerRepositoryPort,
  type OperationContext,
  type RegisterCustomerCommand,
  type UnitOfWorkPort,
  type UpdateCustomerCommand,
} from '@rentdesk/domain';
import { writeAuditLog } from './audit-log.service.js';

function blankToNull(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function validateCustomer(customer: Customer): void {
  const required: Array<[string, string]> = [
    ['fullName', customer.fullName],
    ['nationalId', customer.nationalId],
    ['licenseNumber', customer.licenseNumber],
    ['licenseRegion', customer.licenseRegion],
    ['phone', customer.phone],
  ];
  const missing = required.filter(([, value]) => value.trim().length === 0).map(([name]) => name);
  if (missing.length > 0) throw new ValidationError('required fields are empty', { missing });
}

/**
 * National and secondary IDs are unique among non-removed customers only:
 * a removed customer is history and its IDs may be registered again.
 */
async function assertUniqueIds(repo: CustomerRepositoryPort, customer: Customer): Promise<void> {
  const byNational = await repo.findByNationalId(customer.nationalId);
  if (byNational && byNational.id !== customer.id) {
    throw new DuplicateRecord('customer', 'nationalId', customer.nationalId);
  }
  if (customer.secondaryId) {
    const bySecondary = await repo.findBySecondaryId(customer.secondaryId);
    if (bySecondary && bySecondary.id !== customer.id) {
      throw new DuplicateRecord('customer', 'secondaryId', customer.secondaryId);
    }
  }
}

export class CustomerRegistryService implements CustomerRegistryPort {
  constructor(
    private readonly uow: UnitOfWorkPort,
    private readonly auditLog: AuditLogPort,
  ) {}

  async get(customerId: string): Promise<Customer> {
    const customer = await this.uow.repositories.customers.findById(customerId);
    if (!customer) throw new NotFoundError('customer', customerId);
    return customer;
  }

  list(filters: CustomerRepositoryListFilters = {}): Promise<Customer[]> {
    return this.uow.repositories.customers.list(filters);
  }

  async register(ctx: OperationContext, cmd: RegisterCustomerCommand): Promise<Customer> {
    const now = new Date();
    const customer: Customer = {
      id: uuidv4(),
      fullName: cmd.fullName.trim(),
      nationalId: cmd.nationalId.trim(),
      secondaryId: blankToNull(cmd.secondaryId),
      licenseNumber: cmd.licenseNumber.trim(),
      licenseExpiry: cmd.licenseExpiry ?? null,
      licenseRegion: cmd.licenseRegion.trim(),
      phone: cmd.phone.trim(),
      address: blankToNull(cmd.address),
      notes: blankToNull(cmd.notes),
      status: 'active',
      createdAt: now,
      updatedAt: now,
    };
    validateCustomer(customer);
    await assertUniqueIds(this.uow.repositories.customers, customer);

    const created = await this.uow.repositories.customers.insert(customer);
    await writeAuditLog(this.auditLog, {
      actorId: ctx.actorId,
      action: 'customer.registered',
      entityType: 'customer',
      entityId: created.id,
    });
    return created;
  }

  async update(ctx: OperationContext, cmd: UpdateCustomerCommand): Promise<Customer> {
    const updated = await this.uow.transaction(async (tx) => {
      const current = await tx.customers.findById(cmd.customerId);
      if (!current) throw new NotFoundError('customer', cmd.customerId);
      if (current.status === 'removed') {
        throw new InvalidTransition('customer', 'removed', cmd.status ?? 'removed');
      }

      const next: Customer = {
        ...current,
        fullName: cmd.fullName?.trim() ?? current.fullName,
        secondaryId: cmd.secondaryId === undefined ? current.secondaryId : blankToNull(cmd.secondaryId),
        licenseNumber: cmd.licenseNumber?.trim() ?? current.licenseNumber,
        licenseExpiry: cmd.licenseExpiry === undefined ? current.licenseExpiry : cmd.licenseExpiry,
        licenseRegion: cmd.licenseRegion?.trim() ?? current.licenseRegion,
        phone: cmd.phone?.trim() ?? current.phone,
        address: cmd.address === undefined ? current.address : blankToNull(cmd.address),
        notes: cmd.notes === undefined ? current.notes : blankToNull(cmd.notes),
        status: cmd.status ?? current.status,
      };
      validateCustomer(next);
      await assertUniqueIds(tx.customers, next);

      const saved = await tx.customers.update(next);
      if (!saved) throw new NotFoundError('customer', cmd.customerId);
      return saved;
    });

    await writeAuditLog(this.auditLog, {
      actorId: ctx.actorId,
      action: 'customer.updated',
      entityType: 'customer',
      entityId: updated.id,
      payload: { fields: Object.keys(cmd).filter((k) => k !== 'customerId') },
    });
    return updated;
  }

  /** Soft delete. Terminal; refused while the customer holds a reserved or rented reservation. */
  async remove(ctx: OperationContext, customerId: string): Promise<Customer> {
    const removed = await this.uow.transaction(async (tx) => {
      const current = await tx.customers.findById(customerId);
      if (!current) throw new NotFoundError('customer', customerId);
      if (current.status === 'removed') return current;

      const open = await tx.reservations.countBlockingForCustomer(customerId);
      if (open > 0) {
        throw new IntegrityViolation(`customer ${customerId} has ${open} open reservation(s)`, {
          customerId,
          openReservations: open,
        });
      }

      const saved = await tx.customers.update({ ...current, status: 'removed' });
      if (!saved) throw new NotFoundError('customer', customerId);
      return saved;
    });

    await writeAuditLog(this.auditLog, {
      actorId: ctx.actorId,
      action: 'customer.removed',
      entityType: 'customer',
      entityId: customerId,
    });
    return removed;
  }
}
