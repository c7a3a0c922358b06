/**
 * Lockwarden runtime configuration
 * Read once from the environment at startup.
 */

import type { LockFormat } from '../../lock/codec/lock-codec.js';

export interface LockwardenConfig {
  /** HTTP port for the API */
  port: number;

  /** Directory the API serves locks from */
  lockDir: string;

  /** Lock file format */
  format: LockFormat;

  /** Create lockDir on the first lock if missing */
  createDirectory: boolean;

  /** Accepted X-API-Key values; empty disables auth */
  apiKeys: string[];

  /** Reject POST/PUT/DELETE/PATCH */
  readonly: boolean;

  /** Allowed CORS origins */
  corsOrigins: string[];
}

export const DEFAULT_CONFIG: LockwardenConfig = {
  port: 8000,
  lockDir: '/tmp/locks',
  format: 'yaml',
  createDirectory: true,
  apiKeys: [],
  readonly: false,
  corsOrigins: ['http://localhost:8000', 'http://127.0.0.1:8000'],
};

/** Environment variable names, by config field */
export const CONFIG_ENV = {
  port: 'PORT',
  lockDir: 'LOCK_DIR',
  format: 'LOCK_FORMAT',
  createDirectory: 'LOCK_CREATE_DIR',
  apiKeys: 'LOCKWARDEN_API_KEYS',
  readonly: 'LOCKWARDEN_READONLY',
  corsOrigins: 'LOCKWARDEN_CORS_ORIGINS',
} as const satisfies Record<keyof LockwardenConfig, string>;
