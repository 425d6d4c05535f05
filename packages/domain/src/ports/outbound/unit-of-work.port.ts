import type { CustomerRepositoryPort } from './customer-repository.port.js';
import type { FineRepositoryPort } from './fine-repository.port.js';
import type { ReservationRepositoryPort } from './reservation-repository.port.js';
import type { VehicleRepositoryPort } from './vehicle-repository.port.js';

export interface RentalRepositories {
  readonly vehicles: VehicleRepositoryPort;
  readonly customers: CustomerRepositoryPort;
  readonly reservations: ReservationRepositoryPort;
  readonly fines: FineRepositoryPort;
}

export interface UnitOfWorkPort {
  /** Repositories on the shared pool, for reads and single-row writes. */
  readonly repositories: RentalRepositories;
  /**
   * Runs `fn` with repositories bound to one connection inside
   * BEGIN/COMMIT. Any rejection rolls the whole unit back.
   */
  transaction<T>(fn: (tx: RentalRepositories) => Promise<T>): Promise<T>;
}
