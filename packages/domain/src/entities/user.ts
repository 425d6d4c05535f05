export type UserRole = 'admin' | 'manager' | 'employee' | 'viewer';

export type Permission = 'read' | 'write' | 'delete' | 'view_reports' | 'manage_users';

export const ROLE_PERMISSIONS: Record<UserRole, readonly Permission[]> = {
  admin: ['read', 'write', 'delete', 'view_reports', 'manage_users'],
  manager: ['read', 'write', 'delete', 'view_reports'],
  employee: ['read', 'write', 'view_reports'],
  viewer: ['read'],
};

export interface User {
  readonly id: string;
  readonly fullName: string;
  readonly role: UserRole;
  readonly isActive: boolean;
}

export interface AuditEntry {
  readonly id: number;
  readonly actorId: string | null;
  readonly action: string;
  readonly entityType: string;
  readonly entityId: string | null;
  readonly payload: Record<string, unknown>;
  readonly ts: Date;
}
