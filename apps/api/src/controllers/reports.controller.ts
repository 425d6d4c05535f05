import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { ApiContext } from './context.js';
import { presentDashboard, presentHistoryEntry } from './presenters.js';
import { calendarDateSchema } from './schemas.js';

const monthQuerySchema = z.object({
  year: z.coerce.number().int().min(1970).max(9999),
  month: z.coerce.number().int().min(1).max(12),
});

const historyQuerySchema = z.object({
  from: calendarDateSchema,
  to: calendarDateSchema,
});

export function createReportsRouter(ctx: ApiContext): Router {
  const router = Router();
  const { reporting } = ctx.services;

  router.use(ctx.rbac.requirePermission('view_reports'));

  /** GET /api/reports/dashboard */
  router.get('/dashboard', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const summary = await reporting.dashboard(ctx.clock.today());
      res.json(presentDashboard(summary));
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/reports/occupancy?year=&month= */
  router.get('/occupancy', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { year, month } = monthQuerySchema.parse(req.query);
      res.json(await reporting.monthlyOccupancy(year, month));
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/reports/occupancy/export?year=&month= (spreadsheet download) */
  router.get('/occupancy/export', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { year, month } = monthQuerySchema.parse(req.query);
      const file = await reporting.exportOccupancy(year, month);
      res.type(file.contentType);
      res.setHeader('Content-Disposition', `attachment; filename="${file.filename}"`);
      res.send(Buffer.from(file.body));
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/reports/history?from=&to= */
  router.get('/history', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { from, to } = historyQuerySchema.parse(req.query);
      const entries = await reporting.history(from, to);
      res.json({ from, to, data: entries.map(presentHistoryEntry), total: entries.length });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
