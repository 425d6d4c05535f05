import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ROLE_PERMISSIONS } from '@rentdesk/domain';
import type { ApiContext } from './context.js';
import { presentAuditEntry } from './presenters.js';

const listAuditLogsQuerySchema = z.object({
  actorId: z.string().optional(),
  entityType: z.string().optional(),
  entityId: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

export function createAdminRouter(ctx: ApiContext): Router {
  const router = Router();

  router.use(ctx.rbac.requirePermission('manage_users'));

  /** GET /api/admin/users (read-only; accounts live with the identity provider) */
  router.get('/users', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const users = await ctx.users.listUsers();
      const data = users.map((user) => ({ ...user, permissions: ROLE_PERMISSIONS[user.role] }));
      return res.json({ data, total: data.length });
    } catch (err) {
      return next(err);
    }
  });

  /** GET /api/admin/audit-logs */
  router.get('/audit-logs', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listAuditLogsQuerySchema.parse(req.query);
      const entries = await ctx.auditLog.list(query);
      return res.json({ data: entries.map(presentAuditEntry), total: entries.length });
    } catch (err) {
      return next(err);
    }
  });

  return router;
}
