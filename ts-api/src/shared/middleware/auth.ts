import type { MiddlewareHandler } from 'hono';
import { createLogger } from '../logging/logger.js';

const log = createLogger('auth');

export function createAuthMiddleware(apiKeys: string[]): MiddlewareHandler {
  // No keys configured: open access
  if (apiKeys.length === 0) {
    return async (_, next) => await next();
  }

  return async (c, next) => {
    const providedKey = c.req.header('X-API-Key');

    if (!providedKey) {
      return c.json({ error: 'API key required. Pass X-API-Key header.', code: 'UNAUTHORIZED' }, 401);
    }

    if (!apiKeys.includes(providedKey)) {
      log.warn({ path: c.req.path, method: c.req.method }, 'rejected request with unknown API key');
      return c.json({ error: 'Invalid API key', code: 'FORBIDDEN' }, 403);
    }

    await next();
  };
}
