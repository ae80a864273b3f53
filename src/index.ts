import pino from 'pino';
import { loadConfig, loadConfigFromEnv, mergeConfig } from './config/index.js';
import type { Config } from './config/index.js';
import { initializeDatabase, closeDatabase } from './db/index.js';
import { createReputationEngine } from './bootstrap.js';
import { createApiServer } from './api/server.js';
import { CachingGeoProvider } from './geo/index.js';

const CONFIG_PATH = process.env.CONFIG_PATH || './config/reputation.yaml';

function createLogger(config: Config) {
  const usePrettyLogs = config.logging.format === 'pretty' && process.env.NODE_ENV !== 'production';
  return pino({
    level: config.logging.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
    transport: usePrettyLogs ? { target: 'pino-pretty' } : undefined,
  });
}

async function main() {
  // Load configuration from file, then override with environment variables
  const config = mergeConfig(loadConfig(CONFIG_PATH), loadConfigFromEnv());

  const logger = createLogger(config);

  if (config.logging.format === 'pretty' && process.env.NODE_ENV === 'production') {
    logger.warn('Pretty logging is not available in production, using JSON format instead');
  }

  logger.info('Starting IP reputation engine...');
  logger.info({ configPath: CONFIG_PATH }, 'Configuration loaded');

  // Initialize database
  initializeDatabase(config.storage.path, logger);

  const { orchestrator, geoProvider, scoreStore } = await createReputationEngine(config, logger);

  const server = await createApiServer({ config, orchestrator, logger });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down...');

    await server.close();
    logger.info('HTTP server closed');

    closeDatabase();
    logger.info('Resources cleaned up');

    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  // Start server
  const { listen_port: port, host } = config.server;
  await server.listen({ port, host });

  logger.info({ port, host, geoProvider: geoProvider.name }, 'API server started');

  // Schedule cleanup job
  const cleanupInterval = 24 * 60 * 60 * 1000; // Daily
  setInterval(() => {
    void (async () => {
      try {
        const deleted = await scoreStore.cleanup(config.storage.retention_days);
        if (deleted > 0) {
          logger.info({ deleted }, 'Cleaned up old scores');
        }
      } catch (err) {
        logger.error({ err }, 'Cleanup failed');
      }

      if (geoProvider instanceof CachingGeoProvider) {
        const expired = geoProvider.cleanupExpired();
        logger.debug({ expired }, 'Geolocation cache cleaned');
      }
    })();
  }, cleanupInterval).unref();
}

// Handle uncaught errors
process.on('uncaughtException', (err) => {
  console.error('Uncaught exception:', err);
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled rejection at:', promise, 'reason:', reason);
  // Don't exit - let the app continue
});

main().catch((err) => {
  console.error('Failed to start:', err);
  process.exit(1);
});
