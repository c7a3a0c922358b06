// Lock service interface - abstraction over where lock state lives

import type { LockPayload, LockRecord } from '../model/lock-record.js';

export interface LockRequest {
  /** Directory holding the lock files */
  directory: string;
  /** Logical object being locked, e.g. a server name */
  objectName: string;
  /** Caller metadata merged into the result (and written on lock) */
  payload?: LockPayload;
  /** status | lock | unlock, validated at entry. Default: status */
  action?: string;
  /** Fail with LockFilePresentError if the object is already locked */
  guardUnlocked?: boolean;
  /** Fail with LockFileNotPresentError if the object is not locked */
  guardLocked?: boolean;
}

export interface LockService {
  /**
   * Perform one status/lock/unlock cycle against current state
   * @throws LockFilePresentError, LockFileNotPresentError, MalformedLockFileError,
   *         InvalidActionError, InvalidNameError
   */
  apply(request: LockRequest): LockRecord;

  /** Existence check only; never reads the payload */
  isLocked(lockPath: string): boolean;

  /** Names of the objects currently locked in a directory */
  list(directory: string): string[];
}
