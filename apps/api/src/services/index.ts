import type {
  AuditLogPort,
  DocumentGeneratorPort,
  OccupancyExporterPort,
  UnitOfWorkPort,
} from '@rentdesk/domain';
import { AvailabilityService } from './availability.service.js';
import { CustomerRegistryService } from './customer-registry.service.js';
import { FineService } from './fine.service.js';
import { FleetRegistryService } from './fleet-registry.service.js';
import { ReportingService } from './reporting.service.js';
import { ReservationService } from './reservation.service.js';

export interface ServiceDeps {
  uow: UnitOfWorkPort;
  documents: DocumentGeneratorPort;
  exporter: OccupancyExporterPort;
  auditLog: AuditLogPort;
  defaultKmAllowance?: number;
}

export interface ApiServices {
  availability: AvailabilityService;
  reservations: ReservationService;
  fines: FineService;
  fleet: FleetRegistryService;
  customers: CustomerRegistryService;
  reporting: ReportingService;
}

export function createServices(deps: ServiceDeps): ApiServices {
  return {
    availability: new AvailabilityService(deps.uow),
    reservations: new ReservationService(deps.uow, deps.documents, deps.auditLog, {
      defaultKmAllowance: deps.defaultKmAllowance,
    }),
    fines: new FineService(deps.uow, deps.auditLog),
    fleet: new FleetRegistryService(deps.uow, deps.auditLog),
    customers: new CustomerRegistryService(deps.uow, deps.auditLog),
    reporting: new ReportingService(deps.uow, deps.exporter),
  };
}
