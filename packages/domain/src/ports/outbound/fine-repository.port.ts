import type { Fine, FineStatus } from '../../entities/fine.js';

export interface FineListFilters {
  reservationIds?: string[];
  status?: FineStatus;
  /** Infraction timestamp bounds, inclusive. */
  from?: Date;
  to?: Date;
}

export interface FineRepositoryPort {
  findById(fineId: string): Promise<Fine | null>;
  findByIdForUpdate(fineId: string): Promise<Fine | null>;
  list(filters?: FineListFilters): Promise<Fine[]>;
  countPending(reservationId: string): Promise<number>;
  insert(fine: Fine): Promise<Fine>;
  update(fine: Fine): Promise<Fine | null>;
}
