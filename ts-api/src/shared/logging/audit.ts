/**
 * Audit trail for lock state changes.
 * External expiry tooling keys off these entries, so they stay at info level.
 */
import { createLogger } from './logger.js';

const log = createLogger('audit');

export function auditLog(
  action: string,
  lockPath: string,
  details?: Record<string, unknown>
): void {
  log.info({
    audit: true,
    action,
    lockPath,
    ...(details ? { details } : {}),
  }, `audit: ${action}`);
}
