import type { AuditLogPort, ClockPort, UserDirectoryPort } from '@rentdesk/domain';
import type { Rbac } from '../middleware/rbac.js';
import type { ApiServices } from '../services/index.js';

/** What every router factory is built from. */
export interface ApiContext {
  services: ApiServices;
  rbac: Rbac;
  clock: ClockPort;
  users: UserDirectoryPort;
  auditLog: AuditLogPort;
}
