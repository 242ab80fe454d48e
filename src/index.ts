import { createApp } from './app.js';
import { loadConfig, type Config } from './config.js';
import { ConfigError } from './errors.js';
import { createLogger } from './logger.js';
import { LocationService } from './services/location-service.js';
import { ProviderRegistry, createProviders } from './services/provider-registry.js';
import { createCacheTiers } from './storage/cache-factory.js';

const CLEANUP_INTERVAL_MS = 60 * 1000;
const SHUTDOWN_TIMEOUT_MS = 10 * 1000;

// Initialize services and start server
function start() {
  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    const logger = createLogger();
    if (error instanceof ConfigError) {
      logger.fatal({ issues: error.issues }, 'Invalid configuration');
    } else {
      logger.fatal({ err: error }, 'Failed to load configuration');
    }
    process.exit(1);
  }

  const logger = createLogger(config.logLevel);

  const { cache, redis, sweep } = createCacheTiers(config, logger);

  const registry = new ProviderRegistry(createProviders(config, logger));
  const service = new LocationService({ registry, cache, logger });
  logger.info({ providers: registry.getAvailableProviders() }, 'Providers registered');

  // Expired memory entries are otherwise only dropped when read
  const cleanupTimer = setInterval(() => {
    void sweep().then((cleaned) => {
      if (cleaned > 0) logger.debug({ cleaned }, 'Removed expired cache entries');
    });
  }, CLEANUP_INTERVAL_MS);
  cleanupTimer.unref();

  const app = createApp({
    service,
    cache,
    registry,
    logger,
    isDevelopment: config.isDevelopment,
  });

  const server = app.listen(config.port, () => {
    logger.info({ port: config.port, env: config.nodeEnv }, 'Server started');
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down gracefully');
    clearInterval(cleanupTimer);

    server.close(() => {
      logger.info('Server closed');
      const done = redis ? redis.quit().then(() => undefined) : Promise.resolve();
      done.then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: error }, 'Failed to close Redis connection');
          process.exit(1);
        }
      );
    });

    // Force exit after timeout
    setTimeout(() => {
      logger.error('Forcing exit');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

start();
