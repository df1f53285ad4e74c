import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { ProjectionsDatabase } from './projections/types.js';
import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL } = pg;

export type ProjectionsDbClient = Kysely<ProjectionsDatabase>;

/**
 * Create a Kysely instance for the projections database
 */
export const createProjectionsDb = (connectionString: string): ProjectionsDbClient => {
  return new Kysely<ProjectionsDatabase>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString,
        max: 10, // connection pool size
      }),
    }),
  });
};

/**
 * Initialize the database client from configuration
 */
export const initDatabase = (config: AppConfig): ProjectionsDbClient => {
  const { url } = config.database;

  if (url === '') {
    throw new Error('Missing configuration for the projections database (DATABASE_URL)');
  }

  return createProjectionsDb(url);
};

export * from './projections/types.js';
