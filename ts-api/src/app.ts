import { Hono } from 'hono';
import { cors } from 'hono/cors';

// Middleware
import { createAuthMiddleware } from './shared/middleware/auth.js';
import { createReadonlyMiddleware } from './shared/middleware/readonly.js';

// Domain - Lock
import type { LockService } from './domains/lock/services/lock-service.js';
import { createLockRoutes } from './domains/lock/api/routes.js';

// Domain - Config
import type { LockwardenConfig } from './domains/config/index.js';

import { LockwardenError } from './shared/errors/index.js';
import { createLogger } from './shared/logging/logger.js';

const log = createLogger('app');

export const API_VERSION = '1.0.0';

export interface AppDependencies {
  lockService: LockService;
  config: LockwardenConfig;
}

export function createApp({ lockService, config }: AppDependencies): Hono {
  const apiApp = new Hono();

  apiApp.get('/health', (c) => c.json({ status: 'ok', version: API_VERSION }));
  apiApp.route('/locks', createLockRoutes(lockService, config.lockDir));

  const app = new Hono();

  app.use('*', cors({ origin: config.corsOrigins, credentials: true }));
  app.use('*', createAuthMiddleware(config.apiKeys));
  app.use('*', createReadonlyMiddleware(config.readonly));

  // Mounted at root and under /api
  app.route('/api', apiApp);
  app.route('/', apiApp);

  app.notFound((c) => c.json({ error: 'Not found', code: 'NOT_FOUND' }, 404));

  app.onError((err, c) => {
    if (err instanceof LockwardenError) {
      log.debug({ code: err.code, path: c.req.path }, err.message);
      return c.json({ error: err.message, code: err.code }, err.statusCode);
    }
    log.error({ err, path: c.req.path }, 'unhandled error');
    return c.json({ error: 'Internal server error', code: 'INTERNAL' }, 500);
  });

  return app;
}
