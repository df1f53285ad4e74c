/**
 * Fastify application factory
 * Composition root: wires repositories, use cases and routes together
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { registerCors } from '../infra/plugins/index.js';
import { makeCodeRegistryRoutes, type CodeRegistry } from '../modules/code-registry/index.js';
import {
  makeDbHealthChecker,
  makeHealthRoutes,
  makeReferenceDataChecker,
  type HealthChecker,
} from '../modules/health/index.js';
import {
  makeFactQueryRepo,
  makeProjectionRoutes,
  type FactQueryRepository,
} from '../modules/projections/index.js';
import { makeRegionRepo, makeRegionRoutes, type RegionRepository } from '../modules/regions/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { ProjectionsDbClient } from '../infra/database/client.js';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  db: ProjectionsDbClient;
  registry: CodeRegistry;
  config: AppConfig;
  /** Defaults to the database checker plus the region seed check */
  healthCheckers?: HealthChecker[];
  regionRepo?: RegionRepository;
  factQueryRepo?: FactQueryRepository;
}

export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps?: Partial<AppDeps>;
  version?: string | undefined;
}

/**
 * Creates and configures the Fastify application
 */
export const buildApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps = {}, version } = options;

  if (deps.db === undefined || deps.registry === undefined || deps.config === undefined) {
    throw new Error('Missing required dependencies: db, registry, config');
  }

  const { db, registry, config } = deps;
  const regionRepo = deps.regionRepo ?? makeRegionRepo(db);
  const factQueryRepo = deps.factQueryRepo ?? makeFactQueryRepo(db);
  const healthCheckers = deps.healthCheckers ?? [
    makeDbHealthChecker(db),
    makeReferenceDataChecker(regionRepo),
  ];

  const app = fastifyLib({
    ...fastifyOptions,
  });

  await registerCors(app, config);

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.validation != null) {
      request.log.debug({ err: error }, 'Request validation failed');
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: error.message,
      });
    }

    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    request.log.error({ err: error }, 'Request error');
    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers: healthCheckers,
    })
  );

  // ─────────────────────────────────────────────────────────────────────────────
  // REST API
  // ─────────────────────────────────────────────────────────────────────────────
  await app.register(makeRegionRoutes({ regionRepo }));
  await app.register(makeCodeRegistryRoutes({ registry }));
  await app.register(makeProjectionRoutes({ registry, factQueryRepo }));

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
