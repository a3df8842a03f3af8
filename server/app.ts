// =============================================================
// File: server/app.ts
// Description: Fastify server bootstrap. Registers plugins, the
//              error envelope and every route module under /api.
// =============================================================

import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import sensible from '@fastify/sensible';
import { getConfig } from './config';
import { getLogger, loggerOptions } from './lib/logger';
import { ValidationError } from './lib/errors';
import { initializeDb, closeDb } from './database/connection';
import { registerErrorHandler } from './plugins/error-handler';
import { healthRoutes } from './routes/health';
import { authRoutes } from './routes/auth';
import { itemRoutes } from './routes/items';
import { mastersRoutes } from './routes/masters';
import { purchaseRoutes } from './routes/purchases';
import { paymentRoutes } from './routes/payments';
import { ledgerRoutes } from './routes/ledgers';
import { recipeRoutes } from './routes/recipes';
import { productionRoutes } from './routes/production';
import { stockAdjustmentRoutes } from './routes/stock-adjustments';
import { expenseRoutes } from './routes/expenses';
import { APP_NAME } from '../shared/constants';

export async function buildServer(): Promise<FastifyInstance> {
  const server = Fastify({ logger: loggerOptions() });

  // Plugins
  await server.register(cors, {
    origin: true,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });
  await server.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });
  await server.register(sensible);

  // Action endpoints (execute, complete) are POSTed without a body.
  server.removeContentTypeParser('application/json');
  server.addContentTypeParser('application/json', { parseAs: 'string' }, (_req, body, done) => {
    const text = (typeof body === 'string' ? body : body.toString('utf8')).trim();
    if (!text) {
      done(null, {});
      return;
    }
    try {
      done(null, JSON.parse(text));
    } catch {
      done(new ValidationError('Request body is not valid JSON'), undefined);
    }
  });

  registerErrorHandler(server);

  await initializeDb();

  // Register routes
  await server.register(healthRoutes, { prefix: '/api' });
  await server.register(authRoutes, { prefix: '/api' });
  await server.register(itemRoutes, { prefix: '/api' });
  await server.register(mastersRoutes, { prefix: '/api' });
  await server.register(purchaseRoutes, { prefix: '/api' });
  await server.register(paymentRoutes, { prefix: '/api' });
  await server.register(ledgerRoutes, { prefix: '/api' });
  await server.register(recipeRoutes, { prefix: '/api' });
  await server.register(productionRoutes, { prefix: '/api' });
  await server.register(stockAdjustmentRoutes, { prefix: '/api' });
  await server.register(expenseRoutes, { prefix: '/api' });

  return server;
}

async function start() {
  const { API_HOST, API_PORT } = getConfig();
  const log = getLogger();

  const server = await buildServer();

  const shutdown = async (signal: string) => {
    log.info({ signal }, 'Shutting down');
    await server.close();
    await closeDb();
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await server.listen({ port: API_PORT, host: API_HOST });
  log.info(`${APP_NAME} API running on http://${API_HOST}:${API_PORT}`);
}

if (require.main === module) {
  start().catch((err: unknown) => {
    getLogger().fatal({ err }, 'Failed to start');
    process.exit(1);
  });
}
