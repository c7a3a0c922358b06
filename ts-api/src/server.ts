import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { loadConfig } from './domains/config/index.js';
import { FileLockAdapter } from './domains/lock/adapters/file-lock-adapter.js';
import { getCodec } from './domains/lock/codec/lock-codec.js';
import { logger } from './shared/logging/logger.js';

const config = loadConfig();

const lockService = new FileLockAdapter({
  codec: getCodec(config.format),
  createDirectory: config.createDirectory,
});

const app = createApp({ lockService, config });

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info(
    { port: info.port, lockDir: config.lockDir, format: config.format, readonly: config.readonly },
    'Lockwarden API listening'
  );
});

// Graceful shutdown
function shutdown(signal: string): void {
  logger.info({ signal }, 'shutting down');
  server.close((err) => {
    if (err) {
      logger.error({ err }, 'error while closing server');
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
