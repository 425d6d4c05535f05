import type { AuditEntry } from '../../entities/user.js';

export interface AuditLogInput {
  actorId?: string | null;
  action: string;
  entityType: string;
  entityId?: string | null;
  payload?: Record<string, unknown>;
}

export interface AuditLogListFilters {
  entityType?: string;
  entityId?: string;
  actorId?: string;
  limit?: number;
  offset?: number;
}

export interface AuditLogPort {
  append(input: AuditLogInput): Promise<void>;
  list(filters?: AuditLogListFilters): Promise<AuditEntry[]>;
}
