import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import {
  getPool,
  PgAuditLogRepository,
  PgUnitOfWork,
  PgUserDirectory,
  SystemClock,
  TextDocumentGenerator,
  XlsxOccupancyExporter,
} from '@rentdesk/adapters';
import type { ClockPort, UserDirectoryPort } from '@rentdesk/domain';

import type { AppConfig } from './config/env.js';
import type { ApiContext } from './controllers/context.js';
import { createAdminRouter } from './controllers/admin.controller.js';
import { createCustomersRouter } from './controllers/customers.controller.js';
import { createFinesRouter } from './controllers/fines.controller.js';
import { createReportsRouter } from './controllers/reports.controller.js';
import { createReservationsRouter } from './controllers/reservations.controller.js';
import { createVehiclesRouter } from './controllers/vehicles.controller.js';
import { errorHandler } from './middleware/error-handler.js';
import { createRbac } from './middleware/rbac.js';
import { createServices, type ServiceDeps } from './services/index.js';

export interface AppDeps extends ServiceDeps {
  users: UserDirectoryPort;
  clock: ClockPort;
  authDevFallback: boolean;
  corsOrigin?: string;
  /** Write morgan access logs (default true). */
  accessLog?: boolean;
  /** Resolves true when the database answers. */
  checkDatabase?: () => Promise<boolean>;
}

export function buildApp(deps: AppDeps): ReturnType<typeof express> {
  const app = express();
  const ctx: ApiContext = {
    services: createServices(deps),
    rbac: createRbac(deps.users, { devFallback: deps.authDevFallback }),
    clock: deps.clock,
    users: deps.users,
    auditLog: deps.auditLog,
  };

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: deps.corsOrigin ?? '*' }));
  if (deps.accessLog !== false) app.use(morgan('combined'));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/vehicles', createVehiclesRouter(ctx));
  app.use('/api/customers', createCustomersRouter(ctx));
  app.use('/api/reservations', createReservationsRouter(ctx));
  app.use('/api/fines', createFinesRouter(ctx));
  app.use('/api/reports', createReportsRouter(ctx));
  app.use('/api/admin', createAdminRouter(ctx));

  app.get('/healthz', async (_req, res) => {
    const connected = deps.checkDatabase ? await deps.checkDatabase() : true;
    res.status(connected ? 200 : 503).json({
      status: connected ? 'ok' : 'degraded',
      ts: new Date().toISOString(),
      database: connected ? 'connected' : 'unavailable',
    });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}

/** Production wiring: PostgreSQL repositories, plain-text documents, xlsx export. */
export function createDefaultDeps(config: AppConfig): AppDeps {
  const pool = getPool();
  return {
    uow: new PgUnitOfWork(pool),
    documents: new TextDocumentGenerator(config.companyName),
    exporter: new XlsxOccupancyExporter(),
    auditLog: new PgAuditLogRepository(pool),
    users: new PgUserDirectory(pool),
    clock: new SystemClock(config.businessTimezone),
    authDevFallback: config.authDevFallback,
    corsOrigin: config.corsOrigin,
    defaultKmAllowance: config.defaultKmAllowance,
    checkDatabase: async () => {
      try {
        await pool.query('SELECT 1');
        return true;
      } catch (err) {
        console.warn('[server] database check failed', err instanceof Error ? err.message : err);
        return false;
      }
    },
  };
}
