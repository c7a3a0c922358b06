import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  rmSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import * as yaml from 'js-yaml';
import { applyLock, isLockPayload, isLocked, listLocks } from '../domains/lock/index.js';
import { FileLockAdapter } from '../domains/lock/adapters/file-lock-adapter.js';
import { jsonCodec, yamlCodec, type LockCodec } from '../domains/lock/codec/lock-codec.js';
import {
  InvalidActionError,
  InvalidNameError,
  LockFileNotPresentError,
  LockFilePresentError,
  MalformedLockFileError,
  ValidationError,
} from '../shared/errors/index.js';

const TEMP_DIR = join(tmpdir(), 'lockwarden-test-' + randomUUID());

function readDoc(lockPath: string): unknown {
  return yaml.load(readFileSync(lockPath, 'utf8'));
}

beforeAll(() => {
  mkdirSync(TEMP_DIR, { recursive: true });
});

afterAll(() => {
  rmSync(TEMP_DIR, { recursive: true, force: true });
});

describe('applyLock', () => {
  let dir: string;
  let lockPath: string;

  beforeEach(() => {
    dir = join(TEMP_DIR, randomUUID());
    lockPath = join(dir, 'srv1.lock');
  });

  describe('status', () => {
    it('reports a never-locked object as unlocked without touching disk', () => {
      const record = applyLock(dir, 'srv1');

      expect(record).toEqual({ status: 'unlocked', action: 'status', location: null, payload: {} });
      expect(existsSync(lockPath)).toBe(false);
      expect(existsSync(dir)).toBe(false);
    });

    it('returns the caller payload unchanged when unlocked', () => {
      const record = applyLock(dir, 'srv1', { ticket: 'OPS-1' });
      expect(record.payload).toEqual({ ticket: 'OPS-1' });
    });

    it('merges on-disk payload with caller keys winning', () => {
      applyLock(dir, 'srv1', { msg: 'maintenance', contact: 'ops' }, 'lock');

      const record = applyLock(dir, 'srv1', { msg: 'extended' }, 'status');

      expect(record).toEqual({
        status: 'locked',
        action: 'status',
        location: lockPath,
        payload: { msg: 'extended', contact: 'ops' },
      });
    });

    it('does not rewrite the lock file', () => {
      applyLock(dir, 'srv1', { msg: 'maintenance' }, 'lock');
      const before = readFileSync(lockPath, 'utf8');

      applyLock(dir, 'srv1', { msg: 'other' }, 'status');

      expect(readFileSync(lockPath, 'utf8')).toBe(before);
    });
  });

  describe('lock', () => {
    it('creates the lock file with payload and system fields', () => {
      const record = applyLock(dir + '/', 'srv1', {}, 'lock', true);

      expect(record).toEqual({ status: 'locked', location: lockPath, action: 'lock', payload: {} });
      expect(readDoc(lockPath)).toEqual({
        lock_file_status: 'locked',
        lock_file_location: lockPath,
        lock_action: 'lock',
      });
    });

    it('is visible to a following status call', () => {
      applyLock(dir, 'srv1', { msg: 'maintenance', expire: '2030-01-01 00:00:00', window: { hours: 2 } }, 'lock');

      const record = applyLock(dir, 'srv1');

      expect(record.status).toBe('locked');
      expect(record.location).toBe(lockPath);
      expect(record.payload).toEqual({
        msg: 'maintenance',
        expire: '2030-01-01 00:00:00',
        window: { hours: 2 },
      });
    });

    it('rejects a guarded lock on a locked object and leaves the file alone', () => {
      applyLock(dir, 'srv1', { owner: 'first' }, 'lock', true);
      const content = readFileSync(lockPath, 'utf8');
      const mtime = statSync(lockPath).mtimeMs;

      expect(() => applyLock(dir, 'srv1', { owner: 'second' }, 'lock', true)).toThrow(LockFilePresentError);

      expect(readFileSync(lockPath, 'utf8')).toBe(content);
      expect(statSync(lockPath).mtimeMs).toBe(mtime);
    });

    it('lets the last unguarded lock determine the file content', () => {
      applyLock(dir, 'srv1', { a: 1 }, 'lock');
      const record = applyLock(dir, 'srv1', { b: 2 }, 'lock');

      expect(record.payload).toEqual({ b: 2 });
      expect(readDoc(lockPath)).toEqual({
        b: 2,
        lock_file_status: 'locked',
        lock_file_location: lockPath,
        lock_action: 'lock',
      });
    });

    it('never lets caller data shadow system fields', () => {
      const record = applyLock(
        dir,
        'srv1',
        { lock_file_status: 'unlocked', lock_action: 'status', msg: 'drain' },
        'lock'
      );

      expect(record).toEqual({ status: 'locked', action: 'lock', location: lockPath, payload: { msg: 'drain' } });
      expect(readDoc(lockPath)).toEqual({
        msg: 'drain',
        lock_file_status: 'locked',
        lock_file_location: lockPath,
        lock_action: 'lock',
      });
    });

    it('leaves no temporary files behind', () => {
      applyLock(dir, 'srv1', {}, 'lock', true);
      applyLock(dir, 'srv1', {}, 'lock');
      expect(readdirSync(dir)).toEqual(['srv1.lock']);
    });

    it('keeps a __proto__ key as ordinary metadata', () => {
      const payload: unknown = JSON.parse('{"__proto__":{"team":"netops"},"msg":"x"}');
      if (!isLockPayload(payload)) throw new Error('expected a lock payload');

      const record = applyLock(dir, 'srv1', payload, 'lock');

      expect(JSON.stringify(record.payload)).toBe('{"__proto__":{"team":"netops"},"msg":"x"}');
      expect(JSON.stringify(applyLock(dir, 'srv1').payload)).toBe(
        '{"__proto__":{"team":"netops"},"msg":"x"}'
      );
      expect(JSON.stringify(applyLock(dir, 'srv1', {}, 'unlock').payload)).toBe(
        '{"__proto__":{"team":"netops"},"msg":"x"}'
      );
    });

    it('rejects non-finite numbers without writing anything', () => {
      expect(() => applyLock(dir, 'srv1', { weight: Number.NaN }, 'lock')).toThrow(ValidationError);
      expect(() => applyLock(dir, 'srv1', { weight: Infinity }, 'lock')).toThrow(ValidationError);
      expect(existsSync(dir)).toBe(false);
    });

    it('returns a frozen record', () => {
      const record = applyLock(dir, 'srv1', { msg: 'x' }, 'lock');
      expect(Object.isFrozen(record)).toBe(true);
      expect(Object.isFrozen(record.payload)).toBe(true);
    });
  });

  describe('unlock', () => {
    it('removes the lock and returns the stored payload', () => {
      applyLock(dir, 'srv1', { msg: 'maintenance', contact: 'ops' }, 'lock');

      const record = applyLock(dir, 'srv1', { contact: 'oncall' }, 'unlock', false, true);

      expect(record).toEqual({
        status: 'unlocked',
        action: 'unlock',
        location: null,
        payload: { msg: 'maintenance', contact: 'oncall' },
      });
      expect(existsSync(lockPath)).toBe(false);
      expect(applyLock(dir, 'srv1')).toEqual({
        status: 'unlocked',
        action: 'status',
        location: null,
        payload: {},
      });
    });

    it('is a no-op on an unlocked object without a guard', () => {
      expect(applyLock(dir, 'srv1', {}, 'unlock')).toEqual({
        status: 'unlocked',
        action: 'unlock',
        location: null,
        payload: {},
      });
    });

    it('rejects a guarded unlock on an unlocked object', () => {
      expect(() => applyLock(dir, 'srv1', {}, 'unlock', false, true)).toThrow(LockFileNotPresentError);
    });
  });

  describe('guards', () => {
    it('checks both guards independently', () => {
      // Unlocked: guardUnlocked holds, guardLocked does not
      expect(() => applyLock(dir, 'srv1', {}, 'lock', true, true)).toThrow(LockFileNotPresentError);
      expect(existsSync(lockPath)).toBe(false);

      applyLock(dir, 'srv1', {}, 'lock');
      expect(() => applyLock(dir, 'srv1', {}, 'unlock', true, true)).toThrow(LockFilePresentError);
      expect(existsSync(lockPath)).toBe(true);
    });

    it('applies to status as well', () => {
      expect(() => applyLock(dir, 'srv1', {}, 'status', false, true)).toThrow(LockFileNotPresentError);
    });
  });

  describe('input validation', () => {
    it('rejects unknown actions before touching disk', () => {
      expect(() => applyLock(dir, 'srv1', {}, 'destroy')).toThrow(InvalidActionError);
      expect(existsSync(dir)).toBe(false);
    });

    it('rejects names that escape the directory', () => {
      expect(() => applyLock(dir, '../srv1', {}, 'lock')).toThrow(InvalidNameError);
      expect(() => applyLock(dir, '', {}, 'lock')).toThrow(InvalidNameError);
      expect(existsSync(dir)).toBe(false);
    });
  });

  describe('malformed lock files', () => {
    it('treats an empty file as an error, not as unlocked', () => {
      mkdirSync(dir, { recursive: true });
      writeFileSync(lockPath, '');

      expect(() => applyLock(dir, 'srv1')).toThrow(MalformedLockFileError);
    });

    it('rejects non-finite numbers read from disk', () => {
      mkdirSync(dir, { recursive: true });
      writeFileSync(lockPath, 'weight: .nan\n');

      expect(() => applyLock(dir, 'srv1')).toThrow(MalformedLockFileError);
    });

    it('refuses to unlock unparsable content and keeps the file', () => {
      mkdirSync(dir, { recursive: true });
      writeFileSync(lockPath, 'msg: [broken\n');

      expect(() => applyLock(dir, 'srv1', {}, 'unlock')).toThrow(MalformedLockFileError);
      expect(readFileSync(lockPath, 'utf8')).toBe('msg: [broken\n');
    });
  });

  it('keeps objects and directories independent', () => {
    const other = join(TEMP_DIR, randomUUID());
    applyLock(dir, 'srv1', {}, 'lock');

    expect(applyLock(dir, 'srv2').status).toBe('unlocked');
    expect(applyLock(other, 'srv1').status).toBe('unlocked');
  });
});

describe('FileLockAdapter', () => {
  let dir: string;
  let lockPath: string;

  beforeEach(() => {
    dir = join(TEMP_DIR, randomUUID());
    lockPath = join(dir, 'srv1.lock');
  });

  /** Writes a competing lock file between the guard check and the create */
  function racingCodec(target: string): LockCodec {
    return {
      format: 'yaml',
      parse: (text, source) => yamlCodec.parse(text, source),
      serialize: (document) => {
        writeFileSync(target, 'owner: other-process\n');
        return yamlCodec.serialize(document);
      },
    };
  }

  it('guarded lock loses atomically to a file created after the guard check', () => {
    mkdirSync(dir, { recursive: true });
    const adapter = new FileLockAdapter({ codec: racingCodec(lockPath) });

    expect(() =>
      adapter.apply({ directory: dir, objectName: 'srv1', action: 'lock', guardUnlocked: true })
    ).toThrow(LockFilePresentError);

    expect(readFileSync(lockPath, 'utf8')).toBe('owner: other-process\n');
    expect(readdirSync(dir)).toEqual(['srv1.lock']);
  });

  it('unguarded lock replaces a concurrently created file', () => {
    mkdirSync(dir, { recursive: true });
    const adapter = new FileLockAdapter({ codec: racingCodec(lockPath) });

    adapter.apply({ directory: dir, objectName: 'srv1', action: 'lock', payload: { owner: 'me' } });

    expect(readDoc(lockPath)).toEqual({
      owner: 'me',
      lock_file_status: 'locked',
      lock_file_location: lockPath,
      lock_action: 'lock',
    });
  });

  /** Deletes the lock file between the read and the unlink */
  function vanishingCodec(target: string): LockCodec {
    return {
      format: 'yaml',
      parse: (text, source) => {
        const document = yamlCodec.parse(text, source);
        unlinkSync(target);
        return document;
      },
      serialize: (document) => yamlCodec.serialize(document),
    };
  }

  it('guarded unlock fails when another caller removes the file first', () => {
    applyLock(dir, 'srv1', { a: 1 }, 'lock');
    const adapter = new FileLockAdapter({ codec: vanishingCodec(lockPath) });

    expect(() =>
      adapter.apply({ directory: dir, objectName: 'srv1', action: 'unlock', guardLocked: true })
    ).toThrow(LockFileNotPresentError);
    expect(existsSync(lockPath)).toBe(false);
  });

  it('unguarded unlock still reports unlocked with the payload it read', () => {
    applyLock(dir, 'srv1', { a: 1 }, 'lock');
    const adapter = new FileLockAdapter({ codec: vanishingCodec(lockPath) });

    expect(adapter.apply({ directory: dir, objectName: 'srv1', action: 'unlock' })).toEqual({
      status: 'unlocked',
      action: 'unlock',
      location: null,
      payload: { a: 1 },
    });
  });

  it('writes JSON when configured with the JSON codec', () => {
    const adapter = new FileLockAdapter({ codec: jsonCodec });

    adapter.apply({ directory: dir, objectName: 'srv1', action: 'lock', payload: { ports: [80, 443] } });

    expect(JSON.parse(readFileSync(lockPath, 'utf8'))).toEqual({
      ports: [80, 443],
      lock_file_status: 'locked',
      lock_file_location: lockPath,
      lock_action: 'lock',
    });
    expect(adapter.apply({ directory: dir, objectName: 'srv1' }).payload).toEqual({ ports: [80, 443] });
  });

  it('does not create the directory when createDirectory is off', () => {
    const adapter = new FileLockAdapter({ createDirectory: false });

    expect(() => adapter.apply({ directory: dir, objectName: 'srv1', action: 'lock' })).toThrow(/ENOENT/);
    expect(existsSync(dir)).toBe(false);
  });
});

describe('isLocked / listLocks', () => {
  let dir: string;

  beforeEach(() => {
    dir = join(TEMP_DIR, randomUUID());
  });

  it('checks existence by path or by directory and name', () => {
    expect(isLocked(dir, 'srv1')).toBe(false);
    applyLock(dir, 'srv1', {}, 'lock');
    expect(isLocked(dir, 'srv1')).toBe(true);
    expect(isLocked(join(dir, 'srv1.lock'))).toBe(true);
  });

  it('does not parse the file', () => {
    mkdirSync(dir, { recursive: true });
    writeFileSync(join(dir, 'srv1.lock'), '');
    expect(isLocked(dir, 'srv1')).toBe(true);
  });

  it('lists lock files only, sorted', () => {
    mkdirSync(dir, { recursive: true });
    applyLock(dir, 'srv2', {}, 'lock');
    applyLock(dir, 'srv1', {}, 'lock');
    writeFileSync(join(dir, 'notes.txt'), 'x');
    writeFileSync(join(dir, '.srv3.lock.0000.tmp'), 'x');

    expect(listLocks(dir)).toEqual(['srv1', 'srv2']);
  });

  it('returns nothing for a missing directory', () => {
    expect(listLocks(dir)).toEqual([]);
  });
});
