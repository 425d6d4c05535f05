import type { AuditLogInput, AuditLogPort } from '@rentdesk/domain';

/** Best-effort audit logging. Operational actions should not fail if audit insert fails. */
export async function writeAuditLog(auditLog: AuditLogPort, input: AuditLogInput): Promise<void> {
  try {
    await auditLog.append(input);
  } catch (err) {
    console.error('[audit-log] failed to write audit entry', err);
  }
}
