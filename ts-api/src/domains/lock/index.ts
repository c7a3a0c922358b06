import { FileLockAdapter } from './adapters/file-lock-adapter.js';
import { resolveLockPath } from './paths/lock-path.js';
import type { LockPayload, LockRecord } from './model/lock-record.js';

const defaultAdapter = new FileLockAdapter();

/**
 * Query, create or remove the lock for one object.
 *
 * @example
 *   const record = applyLock('/tmp/locks/', 'srv1', { msg: 'draining' }, 'lock', true);
 *   // record.location === '/tmp/locks/srv1.lock'
 */
export function applyLock(
  directory: string,
  objectName: string,
  payload: LockPayload = {},
  action: string = 'status',
  guardUnlocked = false,
  guardLocked = false
): LockRecord {
  return defaultAdapter.apply({
    directory,
    objectName,
    payload,
    action,
    guardUnlocked,
    guardLocked,
  });
}

/** Existence check against a lock file path, or a directory and object name */
export function isLocked(lockPath: string): boolean;
export function isLocked(directory: string, objectName: string): boolean;
export function isLocked(pathOrDirectory: string, objectName?: string): boolean {
  const lockPath =
    objectName === undefined ? pathOrDirectory : resolveLockPath(pathOrDirectory, objectName);
  return defaultAdapter.isLocked(lockPath);
}

export function listLocks(directory: string): string[] {
  return defaultAdapter.list(directory);
}

export { FileLockAdapter, type FileLockAdapterOptions } from './adapters/file-lock-adapter.js';
export type { LockRequest, LockService } from './services/lock-service.js';
export { resolveLockPath, validateObjectName, LOCK_EXTENSION } from './paths/lock-path.js';
export {
  getCodec,
  jsonCodec,
  yamlCodec,
  LOCK_FORMATS,
  type LockCodec,
  type LockFormat,
} from './codec/lock-codec.js';
export {
  LOCK_ACTIONS,
  RESERVED_KEYS,
  isLockAction,
  isLockPayload,
  parseLockAction,
  toLockDocument,
  type LockAction,
  type LockDocument,
  type LockedRecord,
  type LockPayload,
  type LockRecord,
  type LockStatus,
  type LockValue,
  type UnlockedRecord,
} from './model/lock-record.js';
