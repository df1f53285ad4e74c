/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { initDatabase } from './infra/database/client.js';
import { createLogger, makeLoggerOptions } from './infra/logger/index.js';
import { loadCodeRegistry } from './modules/code-registry/index.js';

const main = async (): Promise<void> => {
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const loggerConfig = { level: config.logger.level, pretty: config.logger.pretty };
  const logger = createLogger(loggerConfig);

  logger.info({ config: { server: config.server } }, 'Starting API server');

  const registryResult = loadCodeRegistry(config.codeCatalogue.path);
  if (registryResult.isErr()) {
    logger.fatal({ error: registryResult.error }, 'Failed to load code catalogue');
    process.exit(1);
  }
  const registry = registryResult.value;
  logger.info(
    { modules: registry.listModules().length, regions: registry.listRegions().length },
    'Code catalogue loaded'
  );

  const db = initDatabase(config);

  const app = await buildApp({
    fastifyOptions: {
      logger: makeLoggerOptions(loggerConfig),
      disableRequestLogging: false,
    },
    deps: { db, registry, config },
    version: process.env['APP_VERSION'],
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      await db.destroy();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
