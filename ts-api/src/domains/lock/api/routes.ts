import { Hono } from 'hono';
import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type { LockService } from '../services/lock-service.js';
import { isLockPayload, type LockPayload } from '../model/lock-record.js';
import { ValidationError } from '../../../shared/errors/index.js';
import { createLogger } from '../../../shared/logging/logger.js';

const log = createLogger('lock-routes');

const LockActionBody = Type.Object({
  action: Type.Optional(Type.String()),
  payload: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  guard_unlocked: Type.Optional(Type.Boolean()),
  guard_locked: Type.Optional(Type.Boolean()),
});

function parseJson(text: string): unknown {
  if (text.trim() === '') return {};
  try {
    return JSON.parse(text);
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }
}

function toPayload(value: unknown): LockPayload {
  if (value === undefined) return {};
  if (!isLockPayload(value)) {
    throw new ValidationError('payload values must be strings, finite numbers, booleans, null, lists or mappings');
  }
  return value;
}

export function createLockRoutes(lockService: LockService, lockDir: string): Hono {
  const app = new Hono();

  // GET /locks - Objects currently locked
  app.get('/', (c) => {
    return c.json({ locks: lockService.list(lockDir) });
  });

  // GET /locks/:name - Status
  app.get('/:name', (c) => {
    const record = lockService.apply({
      directory: lockDir,
      objectName: c.req.param('name'),
      action: 'status',
    });
    return c.json(record);
  });

  // POST /locks/:name - Lock (or any action named in the body)
  app.post('/:name', async (c) => {
    const body = parseJson(await c.req.text());
    if (!Value.Check(LockActionBody, body)) {
      const first = Value.Errors(LockActionBody, body).First();
      throw new ValidationError(
        first ? `Invalid request body at ${first.path || '/'}: ${first.message}` : 'Invalid request body'
      );
    }

    const objectName = c.req.param('name');
    const record = lockService.apply({
      directory: lockDir,
      objectName,
      action: body.action ?? 'lock',
      payload: toPayload(body.payload),
      guardUnlocked: body.guard_unlocked ?? false,
      guardLocked: body.guard_locked ?? false,
    });

    log.debug({ objectName, action: record.action, status: record.status }, 'lock action applied');
    return c.json(record);
  });

  // DELETE /locks/:name?guard_locked=true - Unlock
  app.delete('/:name', (c) => {
    const record = lockService.apply({
      directory: lockDir,
      objectName: c.req.param('name'),
      action: 'unlock',
      guardLocked: c.req.query('guard_locked') === 'true',
    });
    return c.json(record);
  });

  return app;
}
