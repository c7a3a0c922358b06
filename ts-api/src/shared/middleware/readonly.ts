import type { MiddlewareHandler } from 'hono';

const MUTATING_METHODS = ['POST', 'PUT', 'DELETE', 'PATCH'];

/** Status reads stay available; lock and unlock are refused */
export function createReadonlyMiddleware(enabled: boolean): MiddlewareHandler {
  if (!enabled) {
    return async (_, next) => await next();
  }

  return async (c, next) => {
    if (MUTATING_METHODS.includes(c.req.method)) {
      return c.json({
        error: 'Server is in read-only mode',
        code: 'READONLY',
        readonly: true,
      }, 403);
    }

    await next();
  };
}
