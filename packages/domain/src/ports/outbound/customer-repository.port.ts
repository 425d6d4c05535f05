import type { Customer, CustomerStatus } from '../../entities/customer.js';

export interface CustomerRepositoryListFilters {
  status?: CustomerStatus;
  includeRemoved?: boolean;
  search?: string;
}

export interface CustomerRepositoryPort {
  findById(customerId: string): Promise<Customer | null>;
  /** Lookups ignore removed customers. */
  findByNationalId(nationalId: string): Promise<Customer | null>;
  findBySecondaryId(secondaryId: string): Promise<Customer | null>;
  list(filters?: CustomerRepositoryListFilters): Promise<Customer[]>;
  insert(customer: Customer): Promise<Customer>;
  update(customer: Customer): Promise<Customer | null>;
}
