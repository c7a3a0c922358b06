/**
 * Lock file codecs
 * The engine only needs parse(text) → mapping and serialize(mapping) → text;
 * YAML is the default because lock files are read and edited by operators.
 */

import * as yaml from 'js-yaml';
import { MalformedLockFileError, ValidationError } from '../../../shared/errors/index.js';
import { isLockPayload, type LockDocument } from '../model/lock-record.js';

export const LOCK_FORMATS = ['yaml', 'json'] as const;

export type LockFormat = (typeof LOCK_FORMATS)[number];

export interface LockCodec {
  readonly format: LockFormat;
  /**
   * @param source Path of the file being parsed, used in error messages
   * @throws MalformedLockFileError when the text is empty, unparsable or not a mapping
   */
  parse(text: string, source: string): LockDocument;
  serialize(document: LockDocument): string;
}

function requireDocument(value: unknown, source: string): LockDocument {
  if (value === undefined || value === null) {
    throw new MalformedLockFileError(source, 'file is empty');
  }
  if (!isLockPayload(value)) {
    throw new MalformedLockFileError(source, 'content is not a mapping of strings, finite numbers, booleans, null, lists or mappings');
  }
  return value;
}

// CORE_SCHEMA: no timestamp or binary tags, so values stay plain JSON-like data
export const yamlCodec: LockCodec = {
  format: 'yaml',

  parse(text, source) {
    let raw: unknown;
    try {
      raw = yaml.load(text, { schema: yaml.CORE_SCHEMA, filename: source });
    } catch (err) {
      throw new MalformedLockFileError(source, err instanceof Error ? err.message : String(err));
    }
    return requireDocument(raw, source);
  },

  serialize(document) {
    return yaml.dump(document, { schema: yaml.CORE_SCHEMA, lineWidth: 120, noRefs: true });
  },
};

export const jsonCodec: LockCodec = {
  format: 'json',

  parse(text, source) {
    if (text.trim() === '') {
      throw new MalformedLockFileError(source, 'file is empty');
    }
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new MalformedLockFileError(source, err instanceof Error ? err.message : String(err));
    }
    return requireDocument(raw, source);
  },

  serialize(document) {
    return JSON.stringify(document, null, 2) + '\n';
  },
};

const CODECS: Record<LockFormat, LockCodec> = {
  yaml: yamlCodec,
  json: jsonCodec,
};

export function isLockFormat(value: string): value is LockFormat {
  return (LOCK_FORMATS as readonly string[]).includes(value);
}

export function getCodec(format: string): LockCodec {
  const normalized = format.trim().toLowerCase();
  if (!isLockFormat(normalized)) {
    throw new ValidationError(
      `Unknown lock format: ${format}. Valid values: ${LOCK_FORMATS.join(', ')}`
    );
  }
  return CODECS[normalized];
}
