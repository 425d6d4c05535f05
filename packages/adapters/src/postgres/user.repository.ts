import type { User, UserDirectoryPort, UserRole } from '@rentdesk/domain';
import { exec, getPool, type Queryable } from './pool.js';
import { bool, oneOf, str, type Row } from './row.js';

const USER_ROLES: readonly UserRole[] = ['admin', 'manager', 'employee', 'viewer'];

/** Read side of the identity provider's user table. */
export class PgUserDirectory implements UserDirectoryPort {
  constructor(private readonly db: Queryable = getPool()) {}

  async findActiveUser(userId: string): Promise<User | null> {
    const rows = await exec(
      this.db,
      `SELECT id, full_name, role, is_active FROM rental.users WHERE id = $1 AND is_active = TRUE`,
      [userId],
    );
    return rows[0] ? mapUserRow(rows[0]) : null;
  }

  async listUsers(): Promise<User[]> {
    const rows = await exec(
      this.db,
      `SELECT id, full_name, role, is_active FROM rental.users ORDER BY full_name`,
    );
    return rows.map(mapUserRow);
  }
}

function mapUserRow(row: Row): User {
  return {
    id: str(row, 'id'),
    fullName: str(row, 'full_name'),
    role: oneOf(row, 'role', USER_ROLES),
    isActive: bool(row, 'is_active'),
  };
}
