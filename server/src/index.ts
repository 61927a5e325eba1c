import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createClientRoutes } from './routes/clients.js';
import { createTaskRoutes } from './routes/tasks.js';
import { getConfig } from './lib/config.js';
import { hasEngineCredentials } from './lib/llm.js';
import logger from './lib/logger.js';
import { SUPPORTED_PLATFORMS } from './audience/types.js';
import { createServices, type AppServices } from './services.js';

export function createApp(services: AppServices): Hono {
  const app = new Hono();
  const { config } = services;

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Referrer-Policy', 'no-referrer');
  });

  app.get('/', (c) => c.json({
    service: 'Audience Outreach Engine',
    supported_platforms: SUPPORTED_PLATFORMS,
    endpoints: {
      register: 'POST /api/clients',
      fetch_audience: 'POST /api/clients/:id/fetch-audience',
      generate_messages: 'POST /api/clients/:id/generate-messages',
      audience: 'GET /api/clients/:id/audience',
      client_status: 'GET /api/clients/:id/status',
      task_status: 'GET /api/tasks/:taskId',
      health: 'GET /health',
    },
  }));

  app.get('/health', async (c) => {
    c.header('Cache-Control', 'no-store');
    const storeOk = await services.clients.ping();
    const llmKeyPresent = hasEngineCredentials(config.llm);
    return c.json({
      status: storeOk && llmKeyPresent ? 'ok' : 'degraded',
      store: services.storeName,
      store_ok: storeOk,
      llm_provider: config.llm.provider,
      llm_key_ok: llmKeyPresent,
      tasks: services.registry.stats(),
      jobs: services.runner.stats(),
      scheduler: services.scheduler.status(),
      timestamp: new Date().toISOString(),
    });
  });

  app.route('/api/clients', createClientRoutes(services));
  app.route('/api/tasks', createTaskRoutes(services.registry));

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    c.get('log').error({ err, path: c.req.path }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}

let server: ReturnType<typeof serve> | null = null;
let shuttingDown = false;

function shutdown(services: AppServices, signal: string) {
  if (shuttingDown || !server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');
  services.scheduler.stop();

  server.close(() => {
    // Give in-flight jobs a short budget before exiting.
    void Promise.race([
      services.runner.drain(),
      new Promise((resolve) => setTimeout(resolve, 5_000)),
    ]).finally(() => {
      services.registry.dispose();
      logger.info('HTTP server closed');
      process.exit(0);
    });
  });

  // Force exit if connections don't drain
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

export function startServer(services: AppServices = createServices(getConfig())) {
  if (server) return server;

  const { port } = services.config;
  logger.info({ port, store: services.storeName, llm_provider: services.config.llm.provider }, 'Audience outreach server starting');
  const app = createApp(services);
  server = serve({ fetch: app.fetch, port });
  logger.info({ port }, `Server running at http://localhost:${port}`);

  services.scheduler.start();

  process.on('SIGTERM', () => shutdown(services, 'SIGTERM'));
  process.on('SIGINT', () => shutdown(services, 'SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown(services, 'UNHANDLED_REJECTION');
  });
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'Uncaught exception');
    shutdown(services, 'UNCAUGHT_EXCEPTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}
