import {
  type Dirent,
  existsSync,
  linkSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  renameSync,
  rmSync,
  unlinkSync,
  writeFileSync,
} from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { randomUUID } from 'node:crypto';
import type { LockRequest, LockService } from '../services/lock-service.js';
import { yamlCodec, type LockCodec } from '../codec/lock-codec.js';
import { LOCK_EXTENSION, resolveLockPath } from '../paths/lock-path.js';
import {
  isLockPayload,
  lockedRecord,
  mergePayload,
  parseLockAction,
  stripReserved,
  toLockDocument,
  unlockedRecord,
  type LockDocument,
  type LockPayload,
  type LockRecord,
} from '../model/lock-record.js';
import {
  LockFileNotPresentError,
  LockFilePresentError,
  LockVerificationError,
  ValidationError,
} from '../../../shared/errors/index.js';
import { hasErrorCode } from '../../../shared/utils/fs-errors.js';
import { auditLog } from '../../../shared/logging/audit.js';
import { createLogger } from '../../../shared/logging/logger.js';

const log = createLogger('file-lock');

export interface FileLockAdapterOptions {
  /** Lock file format. Default: YAML */
  codec?: LockCodec;
  /** Create the lock directory (recursively) on lock. Default: true */
  createDirectory?: boolean;
}

/**
 * Lock state kept as marker files on a shared filesystem:
 * - Lock file: {directory}/{objectName}.lock holding payload + system fields
 * - Guarded lock: content staged in a temp sibling, then hard-linked into
 *   place; link() fails with EEXIST so check and create are one step
 * - Unguarded lock: temp sibling renamed over the target
 * - Unlock: read, then unlink; ENOENT from unlink means another caller won
 */
export class FileLockAdapter implements LockService {
  private readonly codec: LockCodec;
  private readonly createDirectory: boolean;

  constructor(options: FileLockAdapterOptions = {}) {
    this.codec = options.codec ?? yamlCodec;
    this.createDirectory = options.createDirectory ?? true;
  }

  apply(request: LockRequest): LockRecord {
    const action = parseLockAction(request.action ?? 'status');
    const lockPath = resolveLockPath(request.directory, request.objectName);
    const payload = request.payload ?? {};
    if (!isLockPayload(payload)) {
      throw new ValidationError(
        'payload values must be strings, finite numbers, booleans, null, lists or mappings'
      );
    }
    const guardUnlocked = request.guardUnlocked ?? false;
    const guardLocked = request.guardLocked ?? false;

    // Both guards may be set; each one is checked on its own
    if (guardUnlocked && this.isLocked(lockPath)) {
      throw new LockFilePresentError(lockPath);
    }
    if (guardLocked && !this.isLocked(lockPath)) {
      throw new LockFileNotPresentError(lockPath);
    }

    switch (action) {
      case 'status':
        return this.status(lockPath, payload);
      case 'lock':
        return this.lock(lockPath, payload, guardUnlocked);
      case 'unlock':
        return this.unlock(lockPath, payload, guardLocked);
    }
  }

  isLocked(lockPath: string): boolean {
    return existsSync(lockPath);
  }

  list(directory: string): string[] {
    let entries: Dirent[];
    try {
      entries = readdirSync(directory, { withFileTypes: true });
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) return [];
      throw err;
    }

    return entries
      .filter(entry => entry.isFile() && entry.name.endsWith(LOCK_EXTENSION))
      .map(entry => entry.name.slice(0, -LOCK_EXTENSION.length))
      .filter(name => name.length > 0)
      .sort();
  }

  private status(lockPath: string, payload: LockPayload): LockRecord {
    const onDisk = this.read(lockPath);
    log.debug({ lockPath, locked: onDisk !== undefined }, 'lock status');

    if (onDisk === undefined) {
      return unlockedRecord('status', stripReserved(payload));
    }
    return lockedRecord('status', lockPath, mergePayload(onDisk, payload));
  }

  private lock(lockPath: string, payload: LockPayload, exclusive: boolean): LockRecord {
    const record = lockedRecord('lock', lockPath, stripReserved(payload));
    const content = this.codec.serialize(toLockDocument(record));

    if (this.createDirectory) {
      mkdirSync(dirname(lockPath), { recursive: true });
    }

    const tempPath = join(dirname(lockPath), `.${basename(lockPath)}.${randomUUID()}.tmp`);
    try {
      writeFileSync(tempPath, content, { encoding: 'utf8', flag: 'wx' });
      if (exclusive) {
        try {
          linkSync(tempPath, lockPath);
        } catch (err) {
          if (hasErrorCode(err, 'EEXIST')) {
            throw new LockFilePresentError(lockPath);
          }
          throw err;
        }
      } else {
        renameSync(tempPath, lockPath);
      }
    } finally {
      rmSync(tempPath, { force: true });
    }

    if (!this.isLocked(lockPath)) {
      throw new LockVerificationError(lockPath, 'lock');
    }

    auditLog('lock', lockPath, { exclusive, keys: Object.keys(record.payload) });
    return record;
  }

  private unlock(lockPath: string, payload: LockPayload, mustExist: boolean): LockRecord {
    const onDisk = this.read(lockPath);

    if (onDisk === undefined) {
      if (mustExist) {
        throw new LockFileNotPresentError(lockPath);
      }
      log.debug({ lockPath }, 'unlock of an object that was not locked');
      return unlockedRecord('unlock', stripReserved(payload));
    }

    try {
      unlinkSync(lockPath);
    } catch (err) {
      if (!hasErrorCode(err, 'ENOENT')) throw err;
      if (mustExist) {
        throw new LockFileNotPresentError(lockPath);
      }
      log.warn({ lockPath }, 'lock file removed concurrently during unlock');
    }

    if (this.isLocked(lockPath)) {
      throw new LockVerificationError(lockPath, 'unlock');
    }

    auditLog('unlock', lockPath);
    return unlockedRecord('unlock', mergePayload(onDisk, payload));
  }

  /** Parsed lock file, or undefined when there is none */
  private read(lockPath: string): LockDocument | undefined {
    let text: string;
    try {
      text = readFileSync(lockPath, 'utf8');
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) return undefined;
      throw err;
    }
    return this.codec.parse(text, lockPath);
  }
}
