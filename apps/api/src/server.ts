import 'dotenv/config';
import { createServer } from 'http';
import { closePool, configurePool, getPool } from '@rentdesk/adapters';
import { buildApp, createDefaultDeps } from './app.js';
import { loadConfig } from './config/env.js';

async function main() {
  const config = loadConfig();
  configurePool({ connectionString: config.databaseUrl, max: config.poolMax });

  // Verify DB connection
  await getPool().query('SELECT 1');
  console.log('[server] database connected');

  if (config.authDevFallback) {
    console.warn('[server] AUTH_DEV_FALLBACK is on: requests without x-user-id act as admin');
  }

  const app = buildApp(createDefaultDeps(config));
  const httpServer = createServer(app);

  httpServer.listen(config.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.port}`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    httpServer.close();
    await closePool();
    process.exit(0);
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
