/**
 * Error taxonomy shared by every layer. Each error carries a stable `code`
 * and the HTTP `status` the API answers with.
 */
export type RentalErrorCode =
  | 'validation_error'
  | 'not_found'
  | 'availability_conflict'
  | 'concurrency_conflict'
  | 'invalid_transition'
  | 'integrity_violation'
  | 'duplicate_record'
  | 'document_generation_error'
  | 'storage_error'
  | 'unauthorized';

export class RentalError extends Error {
  constructor(
    message: string,
    readonly code: RentalErrorCode,
    readonly status: number,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends RentalError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'validation_error', 400, details);
  }
}

export class NotFoundError extends RentalError {
  constructor(entity: string, id: string) {
    super(`${entity} ${id} not found`, 'not_found', 404, { entity, id });
  }
}

/** Requested interval overlaps a live reservation of the vehicle. */
export class AvailabilityConflict extends RentalError {
  constructor(vehicleId: string, startDate: string, endDate: string) {
    super(
      `vehicle ${vehicleId} is not available from ${startDate} to ${endDate}`,
      'availability_conflict',
      409,
      { vehicleId, startDate, endDate },
    );
  }
}

/** A row changed or vanished between read and write. */
export class ConcurrencyConflict extends RentalError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'concurrency_conflict', 409, details);
  }
}

export class InvalidTransition extends RentalError {
  constructor(entity: string, from: string, to: string) {
    super(`${entity} cannot move from ${from} to ${to}`, 'invalid_transition', 409, {
      entity,
      from,
      to,
    });
  }
}

/** Soft delete or mutation refused because live records depend on the target. */
export class IntegrityViolation extends RentalError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'integrity_violation', 409, details);
  }
}

export class DuplicateRecord extends RentalError {
  constructor(entity: string, field: string, value: string) {
    super(`${entity} with ${field} ${value} already exists`, 'duplicate_record', 409, {
      entity,
      field,
      value,
    });
  }
}

export class DocumentGenerationError extends RentalError {
  constructor(document: string, cause?: unknown) {
    super(
      `failed to generate ${document}: ${cause instanceof Error ? cause.message : String(cause)}`,
      'document_generation_error',
      502,
      { document },
    );
  }
}

export class StorageError extends RentalError {
  constructor(message: string) {
    super(message, 'storage_error', 503);
  }
}

export class UnauthorizedError extends RentalError {
  constructor(message = 'unknown or inactive user') {
    super(message, 'unauthorized', 401);
  }
}

export function isRentalError(err: unknown): err is RentalError {
  return err instanceof RentalError;
}
