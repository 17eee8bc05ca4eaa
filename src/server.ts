import http from 'http';
import https from 'https';
import type { Server } from 'net';
import type { Pool } from 'pg';
import { createApp } from './app';
import { loadConfig } from './config';
import { createPool } from './config/database';
import { loadTlsCredentials } from './config/tls';
import { MessageRepository } from './repositories/message.repository';
import { ConfigError } from './utils/errors';
import { logger, setLogLevel } from './utils/logger';

function registerShutdown(server: Server, pool: Pool): void {
  let shuttingDown = false;

  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down`);

    server.close((closeError) => {
      if (closeError) {
        logger.error('Error closing HTTP server', { error: closeError.message });
      }
      pool
        .end()
        .then(() => {
          logger.info('Database pool closed');
          process.exit(closeError ? 1 : 0);
        })
        .catch((error: unknown) => {
          logger.error('Error closing database pool', {
            error: error instanceof Error ? error.message : String(error),
          });
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

async function startServer(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const tlsCredentials = config.tls ? loadTlsCredentials(config.tls) : null;

  const pool = createPool(config.database);
  await pool.query('SELECT 1');
  logger.info('Database connected', {
    host: config.database.host,
    database: config.database.database,
  });

  const app = createApp({
    messageStore: new MessageRepository(pool),
    bodyLimit: config.bodyLimit,
    enforceFieldLimits: config.enforceFieldLimits,
  });

  const server: Server = tlsCredentials
    ? https.createServer(tlsCredentials, app)
    : http.createServer(app);

  server.on('error', (error) => {
    logger.error('HTTP server error', { error: error.message });
    process.exit(1);
  });

  server.listen(config.port, () => {
    logger.info(`SMS webhook listening on port ${config.port}`, {
      protocol: tlsCredentials ? 'https' : 'http',
      environment: config.nodeEnv,
      endpoint: 'POST /sms',
    });
  });

  registerShutdown(server, pool);
}

startServer().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.error('Invalid configuration', { problems: error.problems });
  } else {
    logger.error('Failed to start server', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
  process.exit(1);
});
