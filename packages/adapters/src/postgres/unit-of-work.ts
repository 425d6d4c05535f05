import type { RentalRepositories, UnitOfWorkPort } from '@rentdesk/domain';
import { PgCustomerRepository } from './customer.repository.js';
import { PgFineRepository } from './fine.repository.js';
import { getPool, withTransaction, type DbPool, type Queryable } from './pool.js';
import { PgReservationRepository } from './reservation.repository.js';
import { PgVehicleRepository } from './vehicle.repository.js';

function bindRepositories(db: Queryable): RentalRepositories {
  return {
    vehicles: new PgVehicleRepository(db),
    customers: new PgCustomerRepository(db),
    reservations: new PgReservationRepository(db),
    fines: new PgFineRepository(db),
  };
}

export class PgUnitOfWork implements UnitOfWorkPort {
  readonly repositories: RentalRepositories;

  constructor(private readonly pool: DbPool = getPool()) {
    this.repositories = bindRepositories(pool);
  }

  transaction<T>(fn: (tx: RentalRepositories) => Promise<T>): Promise<T> {
    return withTransaction((client) => fn(bindRepositories(client)), this.pool);
  }
}
