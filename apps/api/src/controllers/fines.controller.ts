import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { operationContext } from '../middleware/rbac.js';
import type { ApiContext } from './context.js';
import { presentFine } from './presenters.js';
import { calendarDateSchema, idParamSchema, nonNegativeMoneySchema } from './schemas.js';

const fineStatusSchema = z.enum(['pending', 'paid', 'exempt']);

const listQuerySchema = z.object({
  reservationId: z.string().optional(),
  status: fineStatusSchema.optional(),
  from: calendarDateSchema.optional(),
  to: calendarDateSchema.optional(),
});

const registerBodySchema = z.object({
  reservationId: z.string().min(1),
  infractionType: z.string().min(1).max(120),
  amount: nonNegativeMoneySchema,
  infractionAt: z.string().datetime({ offset: true }),
  location: z.string().max(200).nullable().optional(),
  notes: z.string().max(1000).nullable().optional(),
});

const statusBodySchema = z.object({
  status: fineStatusSchema,
  paidAt: z.string().datetime({ offset: true }).nullable().optional(),
  notes: z.string().max(1000).nullable().optional(),
});

export function createFinesRouter(ctx: ApiContext): Router {
  const router = Router();
  const { fines } = ctx.services;
  const { requirePermission } = ctx.rbac;

  /** GET /api/fines?reservationId=&status=&from=&to= (window on infraction date) */
  router.get('/', requirePermission('read'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listQuerySchema.parse(req.query);
      const data = await fines.listFines({
        reservationId: query.reservationId,
        status: query.status,
        from: query.from ? new Date(`${query.from}T00:00:00.000Z`) : undefined,
        to: query.to ? new Date(`${query.to}T23:59:59.999Z`) : undefined,
      });
      res.json({ data: data.map(presentFine), total: data.length });
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/fines */
  router.post('/', requirePermission('write'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = registerBodySchema.parse(req.body);
      const fine = await fines.registerFine(operationContext(req, ctx.clock), {
        ...body,
        infractionAt: new Date(body.infractionAt),
      });
      res.status(201).json(presentFine(fine));
    } catch (err) {
      next(err);
    }
  });

  /** PATCH /api/fines/:fineId/status */
  router.patch('/:fineId/status', requirePermission('write'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const fineId = idParamSchema.parse(req.params['fineId']);
      const body = statusBodySchema.parse(req.body);
      const fine = await fines.resolveFine(operationContext(req, ctx.clock), {
        fineId,
        status: body.status,
        paidAt: body.paidAt ? new Date(body.paidAt) : undefined,
        notes: body.notes,
      });
      res.json(presentFine(fine));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
