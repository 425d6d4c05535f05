import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { operationContext } from '../middleware/rbac.js';
import type { ApiContext } from './context.js';
import { calendarDateSchema, idParamSchema, queryFlagSchema } from './schemas.js';

const listQuerySchema = z.object({
  status: z.enum(['active', 'inactive', 'removed']).optional(),
  includeRemoved: queryFlagSchema,
  search: z.string().trim().min(1).max(100).optional(),
});

const registerBodySchema = z.object({
  fullName: z.string().min(1).max(120),
  nationalId: z.string().min(1).max(30),
  secondaryId: z.string().max(30).nullable().optional(),
  licenseNumber: z.string().min(1).max(30),
  licenseExpiry: calendarDateSchema.nullable().optional(),
  licenseRegion: z.string().min(1).max(60),
  phone: z.string().min(1).max(30),
  address: z.string().max(200).nullable().optional(),
  notes: z.string().max(1000).nullable().optional(),
});

const updateBodySchema = registerBodySchema
  .omit({ nationalId: true })
  .partial()
  .extend({ status: z.enum(['active', 'inactive']).optional() })
  .strict()
  .refine((v) => Object.keys(v).length > 0, { message: 'at least one field is required' });

export function createCustomersRouter(ctx: ApiContext): Router {
  const router = Router();
  const { customers } = ctx.services;
  const { requirePermission } = ctx.rbac;

  /** GET /api/customers */
  router.get('/', requirePermission('read'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listQuerySchema.parse(req.query);
      const data = await customers.list(query);
      res.json({ data, total: data.length });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/customers/:customerId */
  router.get('/:customerId', requirePermission('read'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await customers.get(idParamSchema.parse(req.params['customerId'])));
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/customers */
  router.post('/', requirePermission('write'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = registerBodySchema.parse(req.body);
      const customer = await customers.register(operationContext(req, ctx.clock), body);
      res.status(201).json(customer);
    } catch (err) {
      next(err);
    }
  });

  /** PATCH /api/customers/:customerId (national ID is not editable) */
  router.patch('/:customerId', requirePermission('write'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const customerId = idParamSchema.parse(req.params['customerId']);
      const body = updateBodySchema.parse(req.body);
      const customer = await customers.update(operationContext(req, ctx.clock), { ...body, customerId });
      res.json(customer);
    } catch (err) {
      next(err);
    }
  });

  /** DELETE /api/customers/:customerId (soft delete: status becomes removed) */
  router.delete('/:customerId', requirePermission('delete'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const customerId = idParamSchema.parse(req.params['customerId']);
      res.json(await customers.remove(operationContext(req, ctx.clock), customerId));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
