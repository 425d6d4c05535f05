import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { operationContext } from '../middleware/rbac.js';
import type { ApiContext } from './context.js';
import { presentVehicle } from './presenters.js';
import {
  calendarDateSchema,
  idParamSchema,
  moneySchema,
  odometerSchema,
  queryFlagSchema,
} from './schemas.js';

const vehicleStatusSchema = z.enum(['available', 'rented', 'reserved', 'unavailable', 'excluded']);

const listQuerySchema = z.object({
  status: vehicleStatusSchema.optional(),
  includeExcluded: queryFlagSchema,
  search: z.string().trim().min(1).max(100).optional(),
});

const availableQuerySchema = z.object({
  startDate: calendarDateSchema,
  endDate: calendarDateSchema,
  allowSameDayTurnover: queryFlagSchema,
});

const availabilityQuerySchema = z.object({
  startDate: calendarDateSchema,
  endDate: calendarDateSchema,
  excludeReservationId: z.string().optional(),
});

const registerBodySchema = z.object({
  make: z.string().min(1).max(60),
  model: z.string().min(1).max(60),
  plate: z.string().min(1).max(15),
  color: z.string().min(1).max(30),
  odometerKm: odometerSchema,
  dailyRate: moneySchema,
  perKmRate: moneySchema,
  chassisNumber: z.string().min(1).max(40),
  registrationNumber: z.string().min(1).max(40),
  manufactureYear: z.number().int().min(1950).max(2100),
  nextOilChangeKm: odometerSchema.nullable().optional(),
});

const updateBodySchema = registerBodySchema
  .partial()
  .extend({ status: vehicleStatusSchema.optional() })
  .refine((v) => Object.keys(v).length > 0, { message: 'at least one field is required' });

export function createVehiclesRouter(ctx: ApiContext): Router {
  const router = Router();
  const { fleet, availability } = ctx.services;
  const { requirePermission } = ctx.rbac;

  /** GET /api/vehicles */
  router.get('/', requirePermission('read'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listQuerySchema.parse(req.query);
      const vehicles = await fleet.list(query);
      res.json({ data: vehicles.map(presentVehicle), total: vehicles.length });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/vehicles/available?startDate=&endDate=&allowSameDayTurnover= */
  router.get('/available', requirePermission('read'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = availableQuerySchema.parse(req.query);
      const result = await availability.findAvailable(
        query.startDate,
        query.endDate,
        query.allowSameDayTurnover,
      );
      res.json({
        data: result.vehicles.map(presentVehicle),
        total: result.vehicles.length,
        caution: result.caution,
      });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/vehicles/:vehicleId */
  router.get('/:vehicleId', requirePermission('read'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const vehicle = await fleet.get(idParamSchema.parse(req.params['vehicleId']));
      res.json(presentVehicle(vehicle));
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/vehicles/:vehicleId/availability?startDate=&endDate= */
  router.get(
    '/:vehicleId/availability',
    requirePermission('read'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const vehicleId = idParamSchema.parse(req.params['vehicleId']);
        const query = availabilityQuerySchema.parse(req.query);
        const available = await availability.isVehicleAvailable(
          vehicleId,
          query.startDate,
          query.endDate,
          query.excludeReservationId,
        );
        res.json({ vehicleId, startDate: query.startDate, endDate: query.endDate, available });
      } catch (err) {
        next(err);
      }
    },
  );

  /** POST /api/vehicles */
  router.post('/', requirePermission('write'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = registerBodySchema.parse(req.body);
      const vehicle = await fleet.register(operationContext(req, ctx.clock), body);
      res.status(201).json(presentVehicle(vehicle));
    } catch (err) {
      next(err);
    }
  });

  /** PATCH /api/vehicles/:vehicleId */
  router.patch('/:vehicleId', requirePermission('write'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const vehicleId = idParamSchema.parse(req.params['vehicleId']);
      const body = updateBodySchema.parse(req.body);
      const vehicle = await fleet.update(operationContext(req, ctx.clock), { ...body, vehicleId });
      res.json(presentVehicle(vehicle));
    } catch (err) {
      next(err);
    }
  });

  /** DELETE /api/vehicles/:vehicleId (soft delete: status becomes excluded) */
  router.delete('/:vehicleId', requirePermission('delete'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const vehicleId = idParamSchema.parse(req.params['vehicleId']);
      const vehicle = await fleet.exclude(operationContext(req, ctx.clock), vehicleId);
      res.json(presentVehicle(vehicle));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
