import { FixedClock, XlsxOccupancyExporter } from '@rentdesk/adapters';
import {
  money,
  ZERO,
  type CalendarDate,
  type Customer,
  type Fine,
  type OperationContext,
  type Reservation,
  type User,
  type Vehicle,
} from '@rentdesk/domain';
import type { AppDeps } from '../../app.js';
import { createServices, type ApiServices } from '../../services/index.js';
import {
  InMemoryAuditLog,
  InMemoryUnitOfWork,
  InMemoryUserDirectory,
  RecordingDocumentGenerator,
} from './in-memory.js';

const CREATED = new Date('2024-03-01T09:00:00Z');

export const TEST_USERS: User[] = [
  { id: 'u-admin', fullName: 'Ada Admin', role: 'admin', isActive: true },
  { id: 'u-clerk', fullName: 'Eli Employee', role: 'employee', isActive: true },
  { id: 'u-viewer', fullName: 'Val Viewer', role: 'viewer', isActive: true },
  { id: 'u-gone', fullName: 'Former Staff', role: 'manager', isActive: false },
];

export function makeVehicle(overrides: Partial<Vehicle> = {}): Vehicle {
  return {
    id: 'veh-1',
    make: 'Fiat',
    model: 'Mobi',
    plate: 'RNT1A23',
    color: 'white',
    odometerKm: 1000,
    dailyRate: money('100.00'),
    perKmRate: money('0.80'),
    chassisNumber: 'CHS-0001',
    registrationNumber: 'REG-0001',
    manufactureYear: 2022,
    nextOilChangeKm: 5000,
    status: 'available',
    createdAt: CREATED,
    updatedAt: CREATED,
    ...overrides,
  };
}

export function makeCustomer(overrides: Partial<Customer> = {}): Customer {
  return {
    id: 'cus-1',
    fullName: 'Maria Test',
    nationalId: '111.222.333-44',
    secondaryId: null,
    licenseNumber: 'LIC-0001',
    licenseExpiry: '2030-12-31',
    licenseRegion: 'North',
    phone: '555-0100',
    address: null,
    notes: null,
    status: 'active',
    createdAt: CREATED,
    updatedAt: CREATED,
    ...overrides,
  };
}

export function makeReservation(overrides: Partial<Reservation> = {}): Reservation {
  return {
    id: 'res-1',
    vehicleId: 'veh-1',
    customerId: 'cus-1',
    startDate: '2024-03-10',
    endDate: '2024-03-13',
    deliveryTime: null,
    operationalStatus: 'active',
    reservationStatus: 'reserved',
    odometerOut: 1000,
    odometerIn: null,
    kmAllowance: 300,
    advancePayment: ZERO,
    partialPayment: ZERO,
    washCost: ZERO,
    finesAmount: ZERO,
    damagesAmount: ZERO,
    otherCosts: ZERO,
    discount: ZERO,
    halfDay: false,
    dailyChargeOverride: null,
    totalDailyCharge: money('300.00'),
    kmCharge: ZERO,
    grandTotal: money('300.00'),
    remainingBalance: money('300.00'),
    notes: null,
    createdAt: CREATED,
    updatedAt: CREATED,
    ...overrides,
  };
}

export function makeFine(overrides: Partial<Fine> = {}): Fine {
  return {
    id: 'fine-1',
    reservationId: 'res-1',
    infractionType: 'speeding',
    amount: money('130.16'),
    infractionAt: new Date('2024-03-11T14:30:00Z'),
    location: 'Main Ave',
    status: 'pending',
    paidAt: null,
    notes: null,
    createdAt: CREATED,
    updatedAt: CREATED,
    ...overrides,
  };
}

export interface Harness {
  uow: InMemoryUnitOfWork;
  documents: RecordingDocumentGenerator;
  auditLog: InMemoryAuditLog;
  users: InMemoryUserDirectory;
  clock: FixedClock;
  services: ApiServices;
  deps: AppDeps;
  ctx(today?: CalendarDate): OperationContext;
}

export function createHarness(today: CalendarDate = '2024-03-10'): Harness {
  const uow = new InMemoryUnitOfWork();
  const documents = new RecordingDocumentGenerator();
  const auditLog = new InMemoryAuditLog();
  const users = new InMemoryUserDirectory(TEST_USERS);
  const clock = new FixedClock(today);
  const deps: AppDeps = {
    uow,
    documents,
    exporter: new XlsxOccupancyExporter(),
    auditLog,
    users,
    clock,
    authDevFallback: false,
    accessLog: false,
  };
  return {
    uow,
    documents,
    auditLog,
    users,
    clock,
    deps,
    services: createServices(deps),
    ctx: (day = clock.today()) => ({ actorId: 'u-clerk', today: day }),
  };
}
