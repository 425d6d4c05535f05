import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { defaultEndDate, formatMoney, type ReservationListFilters } from '@rentdesk/domain';
import { operationContext } from '../middleware/rbac.js';
import type { ApiContext } from './context.js';
import { presentReservation, presentReturn, presentTotals } from './presenters.js';
import {
  calendarDateSchema,
  deliveryTimeSchema,
  idParamSchema,
  kmAllowanceSchema,
  nonNegativeMoneySchema,
  odometerSchema,
  queryFlagSchema,
} from './schemas.js';

const reservationStatusSchema = z.enum(['reserved', 'rented', 'cancelled', 'finalized']);
const operationalStatusSchema = z.enum(['active', 'inactive', 'finalized', 'fine_pending']);

const listQuerySchema = z.object({
  /** `delivery`: booked and waiting for handover. `return`: out on the road. */
  queue: z.enum(['delivery', 'return']).optional(),
  status: reservationStatusSchema.optional(),
  operationalStatus: operationalStatusSchema.optional(),
  vehicleId: z.string().optional(),
  customerId: z.string().optional(),
  from: calendarDateSchema.optional(),
  to: calendarDateSchema.optional(),
});

const onDateQuerySchema = z.object({ date: calendarDateSchema });

const createBodySchema = z.object({
  vehicleId: z.string().min(1),
  customerId: z.string().min(1),
  startDate: calendarDateSchema,
  /** Defaults to the day after startDate. */
  endDate: calendarDateSchema.optional(),
  halfDay: z.boolean().optional(),
  discount: nonNegativeMoneySchema.optional(),
  kmAllowance: kmAllowanceSchema.optional(),
  advancePayment: nonNegativeMoneySchema.optional(),
  deliveryTime: deliveryTimeSchema.nullable().optional(),
  notes: z.string().max(1000).nullable().optional(),
  allowSameDayTurnover: z.boolean().optional(),
});

const deliverBodySchema = z.object({
  odometerOut: odometerSchema,
  departureDate: calendarDateSchema,
  deliveryTime: deliveryTimeSchema.nullable().optional(),
  amountCollected: nonNegativeMoneySchema.default(0),
});

const returnBodySchema = z.object({
  odometerIn: odometerSchema,
  paymentReceived: nonNegativeMoneySchema.default(0),
  returnDate: calendarDateSchema.optional(),
  extraCharges: z
    .object({
      wash: nonNegativeMoneySchema.optional(),
      fines: nonNegativeMoneySchema.optional(),
      damages: nonNegativeMoneySchema.optional(),
      other: nonNegativeMoneySchema.optional(),
    })
    .optional(),
});

const editBodySchema = z
  .object({
    customerId: z.string().min(1),
    vehicleId: z.string().min(1),
    startDate: calendarDateSchema,
    endDate: calendarDateSchema,
    deliveryTime: deliveryTimeSchema.nullable(),
    reservationStatus: reservationStatusSchema,
    operationalStatus: operationalStatusSchema,
    odometerOut: odometerSchema.nullable(),
    odometerIn: odometerSchema.nullable(),
    kmAllowance: kmAllowanceSchema,
    advancePayment: nonNegativeMoneySchema,
    partialPayment: nonNegativeMoneySchema,
    washCost: nonNegativeMoneySchema,
    finesAmount: nonNegativeMoneySchema,
    damagesAmount: nonNegativeMoneySchema,
    otherCosts: nonNegativeMoneySchema,
    kmCharge: nonNegativeMoneySchema,
    discount: nonNegativeMoneySchema,
    halfDay: z.boolean(),
    dailyChargeOverride: nonNegativeMoneySchema.nullable(),
    notes: z.string().max(1000).nullable(),
  })
  .partial()
  .strict()
  .refine((v) => Object.keys(v).length > 0, { message: 'at least one field is required' });

const receiptQuerySchema = z.object({ inline: queryFlagSchema });

function toListFilters(query: z.infer<typeof listQuerySchema>): ReservationListFilters {
  const filters: ReservationListFilters = {
    vehicleId: query.vehicleId,
    customerId: query.customerId,
    endFrom: query.from,
    endTo: query.to,
  };
  if (query.queue === 'delivery') {
    filters.reservationStatuses = ['reserved'];
    filters.operationalStatuses = ['active'];
  } else if (query.queue === 'return') {
    filters.reservationStatuses = ['rented'];
  }
  if (query.status) filters.reservationStatuses = [query.status];
  if (query.operationalStatus) filters.operationalStatuses = [query.operationalStatus];
  return filters;
}

export function createReservationsRouter(ctx: ApiContext): Router {
  const router = Router();
  const { reservations } = ctx.services;
  const { requirePermission } = ctx.rbac;

  /** GET /api/reservations?queue=delivery|return */
  router.get('/', requirePermission('read'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listQuerySchema.parse(req.query);
      const data = await reservations.list(toListFilters(query));
      res.json({ data: data.map(presentReservation), total: data.length });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/reservations/on-date?date=YYYY-MM-DD */
  router.get('/on-date', requirePermission('read'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { date } = onDateQuerySchema.parse(req.query);
      const data = await reservations.findOnDate(date);
      res.json({ date, data: data.map(presentReservation), total: data.length });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/reservations/:reservationId */
  router.get('/:reservationId', requirePermission('read'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const reservation = await reservations.get(idParamSchema.parse(req.params['reservationId']));
      res.json(presentReservation(reservation));
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/reservations */
  router.post('/', requirePermission('write'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = createBodySchema.parse(req.body);
      const reservation = await reservations.create(operationContext(req, ctx.clock), {
        ...body,
        endDate: body.endDate ?? defaultEndDate(body.startDate),
      });
      res.status(201).json(presentReservation(reservation));
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/reservations/:reservationId/deliver */
  router.post(
    '/:reservationId/deliver',
    requirePermission('write'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const reservationId = idParamSchema.parse(req.params['reservationId']);
        const body = deliverBodySchema.parse(req.body);
        const result = await reservations.deliver(operationContext(req, ctx.clock), {
          ...body,
          reservationId,
        });
        res.json({
          reservation: presentReservation(result.reservation),
          totals: presentTotals(result.totals),
          paymentApplied: formatMoney(result.paymentApplied),
          changeDue: formatMoney(result.changeDue),
          contract: Buffer.from(result.contract).toString('base64'),
        });
      } catch (err) {
        next(err);
      }
    },
  );

  /** POST /api/reservations/:reservationId/return */
  router.post(
    '/:reservationId/return',
    requirePermission('write'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const reservationId = idParamSchema.parse(req.params['reservationId']);
        const body = returnBodySchema.parse(req.body);
        const result = await reservations.returnVehicle(operationContext(req, ctx.clock), {
          ...body,
          reservationId,
        });
        res.json(presentReturn(result));
      } catch (err) {
        next(err);
      }
    },
  );

  /** PATCH /api/reservations/:reservationId (operator correction) */
  router.patch('/:reservationId', requirePermission('write'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const reservationId = idParamSchema.parse(req.params['reservationId']);
      const body = editBodySchema.parse(req.body);
      const result = await reservations.edit(operationContext(req, ctx.clock), { ...body, reservationId });
      res.json({
        reservation: presentReservation(result.reservation),
        computedDailyCharge: formatMoney(result.computedDailyCharge),
      });
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/reservations/:reservationId/cancel */
  router.post(
    '/:reservationId/cancel',
    requirePermission('write'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const reservationId = idParamSchema.parse(req.params['reservationId']);
        const reservation = await reservations.cancel(operationContext(req, ctx.clock), reservationId);
        res.json(presentReservation(reservation));
      } catch (err) {
        next(err);
      }
    },
  );

  /** GET /api/reservations/:reservationId/receipt (plain-text reprint) */
  router.get(
    '/:reservationId/receipt',
    requirePermission('read'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const reservationId = idParamSchema.parse(req.params['reservationId']);
        const { inline } = receiptQuerySchema.parse(req.query);
        const receipt = await reservations.reprintReceipt(operationContext(req, ctx.clock), reservationId);
        res.type('text/plain; charset=utf-8');
        if (!inline) res.attachment(`receipt-${reservationId}.txt`);
        res.send(Buffer.from(receipt));
      } catch (err) {
        next(err);
      }
    },
  );

  return router;
}
