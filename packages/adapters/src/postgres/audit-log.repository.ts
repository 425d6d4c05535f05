import type { AuditEntry, AuditLogInput, AuditLogListFilters, AuditLogPort } from '@rentdesk/domain';
import { exec, getPool, type Queryable } from './pool.js';
import { int, json, optStr, str, ts, type Row } from './row.js';

export class PgAuditLogRepository implements AuditLogPort {
  constructor(private readonly db: Queryable = getPool()) {}

  async append(input: AuditLogInput): Promise<void> {
    await exec(
      this.db,
      `INSERT INTO rental.audit_logs
         (actor_id, action, entity_type, entity_id, payload)
       VALUES
         ($1, $2, $3, $4, $5::jsonb)`,
      [
        input.actorId ?? null,
        input.action,
        input.entityType,
        input.entityId ?? null,
        JSON.stringify(input.payload ?? {}),
      ],
    );
  }

  async list(filters: AuditLogListFilters = {}): Promise<AuditEntry[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    let idx = 1;

    if (filters.entityType) {
      conditions.push(`entity_type = $${idx++}`);
      params.push(filters.entityType);
    }
    if (filters.entityId) {
      conditions.push(`entity_id = $${idx++}`);
      params.push(filters.entityId);
    }
    if (filters.actorId) {
      conditions.push(`actor_id = $${idx++}`);
      params.push(filters.actorId);
    }

    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = await exec(
      this.db,
      `SELECT * FROM rental.audit_logs ${where} ORDER BY ts DESC LIMIT $${idx++} OFFSET $${idx++}`,
      [...params, filters.limit ?? 100, filters.offset ?? 0],
    );
    return rows.map(mapAuditRow);
  }
}

function mapAuditRow(row: Row): AuditEntry {
  return {
    id: int(row, 'id'),
    actorId: optStr(row, 'actor_id'),
    action: str(row, 'action'),
    entityType: str(row, 'entity_type'),
    entityId: optStr(row, 'entity_id'),
    payload: json(row, 'payload'),
    ts: ts(row, 'ts'),
  };
}
