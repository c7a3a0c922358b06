import { CONFIG_ENV, DEFAULT_CONFIG, type LockwardenConfig } from '../model/config.js';
import { isLockFormat, LOCK_FORMATS } from '../../lock/codec/lock-codec.js';
import { ValidationError } from '../../../shared/errors/index.js';
import { createLogger } from '../../../shared/logging/logger.js';

const log = createLogger('config');

type Env = Record<string, string | undefined>;

function readList(value: string | undefined, fallback: string[]): string[] {
  if (value === undefined) return fallback;
  return value.split(',').map(item => item.trim()).filter(Boolean);
}

function readBoolean(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) return true;
  if (['false', '0', 'no'].includes(normalized)) return false;
  throw new ValidationError(`${name} must be true or false, got: ${value}`);
}

function readPort(value: string | undefined): number {
  if (value === undefined || value.trim() === '') return DEFAULT_CONFIG.port;
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ValidationError(`${CONFIG_ENV.port} must be an integer between 0 and 65535, got: ${value}`);
  }
  return port;
}

/**
 * Build the runtime config from environment variables
 * @throws ValidationError naming the offending variable
 */
export function loadConfig(env: Env = process.env): LockwardenConfig {
  const format = (env[CONFIG_ENV.format] ?? DEFAULT_CONFIG.format).trim().toLowerCase();
  if (!isLockFormat(format)) {
    throw new ValidationError(
      `${CONFIG_ENV.format} must be one of ${LOCK_FORMATS.join(', ')}, got: ${format}`
    );
  }

  const lockDir = env[CONFIG_ENV.lockDir]?.trim() || DEFAULT_CONFIG.lockDir;

  const config: LockwardenConfig = {
    port: readPort(env[CONFIG_ENV.port]),
    lockDir,
    format,
    createDirectory: readBoolean(
      CONFIG_ENV.createDirectory,
      env[CONFIG_ENV.createDirectory],
      DEFAULT_CONFIG.createDirectory
    ),
    apiKeys: readList(env[CONFIG_ENV.apiKeys], DEFAULT_CONFIG.apiKeys),
    readonly: readBoolean(CONFIG_ENV.readonly, env[CONFIG_ENV.readonly], DEFAULT_CONFIG.readonly),
    corsOrigins: readList(env[CONFIG_ENV.corsOrigins], DEFAULT_CONFIG.corsOrigins),
  };

  log.debug({ ...config, apiKeys: config.apiKeys.length }, 'config loaded');
  return config;
}
