/**
 * Lock record types
 * A LockRecord is built fresh for every call and never mutated afterwards.
 */

import { InvalidActionError } from '../../../shared/errors/index.js';

export const LOCK_ACTIONS = ['status', 'lock', 'unlock'] as const;

export type LockAction = (typeof LOCK_ACTIONS)[number];

export type LockStatus = 'locked' | 'unlocked';

/** Values a lock file can carry: scalars, lists and nested mappings */
export type LockValue =
  | string
  | number
  | boolean
  | null
  | LockValue[]
  | { [key: string]: LockValue };

/** Caller-defined metadata stored alongside the system fields */
export type LockPayload = { [key: string]: LockValue };

/** Flat mapping as it sits on disk: payload plus reserved keys */
export type LockDocument = LockPayload;

/**
 * Keys the system writes into every lock file.
 * Names are shared with audit/expiry tooling that scans lock directories.
 */
export const RESERVED_KEYS = {
  status: 'lock_file_status',
  location: 'lock_file_location',
  action: 'lock_action',
} as const;

const RESERVED_KEY_SET: ReadonlySet<string> = new Set(Object.values(RESERVED_KEYS));

export interface LockedRecord {
  readonly status: 'locked';
  readonly action: LockAction;
  readonly location: string;
  readonly payload: Readonly<LockPayload>;
}

export interface UnlockedRecord {
  readonly status: 'unlocked';
  readonly action: LockAction;
  readonly location: null;
  readonly payload: Readonly<LockPayload>;
}

export type LockRecord = LockedRecord | UnlockedRecord;

export function isLockAction(value: unknown): value is LockAction {
  return typeof value === 'string' && (LOCK_ACTIONS as readonly string[]).includes(value);
}

/**
 * Validate an action supplied at the boundary
 * @throws InvalidActionError for anything outside status/lock/unlock
 */
export function parseLockAction(value: unknown): LockAction {
  if (!isLockAction(value)) {
    throw new InvalidActionError(value);
  }
  return value;
}

export function isLockValue(value: unknown): value is LockValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      // NaN and Infinity have no JSON form
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isLockValue);
      return isLockPayload(value);
    default:
      return false;
  }
}

export function isLockPayload(value: unknown): value is LockPayload {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) {
    return false;
  }
  return Object.values(value).every(isLockValue);
}

/** Drop the reserved system keys, leaving only caller metadata */
export function stripReserved(source: Readonly<LockPayload>): LockPayload {
  // fromEntries defines keys, so an own `__proto__` key stays data
  return Object.fromEntries(
    Object.entries(source).filter(([key]) => !RESERVED_KEY_SET.has(key))
  );
}

/** On-disk payload first, caller keys on top */
export function mergePayload(
  onDisk: Readonly<LockDocument>,
  caller: Readonly<LockPayload>
): LockPayload {
  return { ...stripReserved(onDisk), ...stripReserved(caller) };
}

export function lockedRecord(
  action: LockAction,
  location: string,
  payload: LockPayload
): LockedRecord {
  return Object.freeze({
    status: 'locked',
    action,
    location,
    payload: Object.freeze(payload),
  });
}

export function unlockedRecord(action: LockAction, payload: LockPayload): UnlockedRecord {
  return Object.freeze({
    status: 'unlocked',
    action,
    location: null,
    payload: Object.freeze(payload),
  });
}

/** Flatten a record into the mapping written to the lock file; system fields last */
export function toLockDocument(record: LockRecord): LockDocument {
  return {
    ...stripReserved(record.payload),
    [RESERVED_KEYS.status]: record.status,
    [RESERVED_KEYS.location]: record.location,
    [RESERVED_KEYS.action]: record.action,
  };
}
