/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

import { MAX_UPSERT_BATCH_SIZE } from '@/common/constants/upsert-batch.js';

/** Default location of the code catalogue, relative to the working directory */
export const DEFAULT_CODE_CATALOGUE_PATH = './datasets/code-catalogue.json';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  DATABASE_URL: Type.String({ minLength: 1 }),

  // Comma-separated origins allowed to call the API from a browser
  ALLOWED_ORIGINS: Type.Optional(Type.String()),

  // Ingestion
  INGEST_BATCH_SIZE: Type.Integer({ default: 1000, minimum: 1, maximum: MAX_UPSERT_BATCH_SIZE }),
  CODE_CATALOGUE_PATH: Type.String({ minLength: 1 }),
});

export type Env = Static<typeof EnvSchema>;

const parseIntOr = (raw: string | undefined, fallback: number): number =>
  raw != null && raw !== '' ? Number.parseInt(raw, 10) : fallback;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: parseIntOr(env['PORT'], 3000),
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    DATABASE_URL: env['DATABASE_URL'],
    ALLOWED_ORIGINS: env['ALLOWED_ORIGINS'],
    INGEST_BATCH_SIZE: parseIntOr(env['INGEST_BATCH_SIZE'], 1000),
    CODE_CATALOGUE_PATH: env['CODE_CATALOGUE_PATH'] ?? DEFAULT_CODE_CATALOGUE_PATH,
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  database: {
    url: env.DATABASE_URL,
  },
  cors: {
    allowedOrigins: env.ALLOWED_ORIGINS,
  },
  ingestion: {
    /** Rows per upsert statement */
    batchSize: env.INGEST_BATCH_SIZE,
  },
  codeCatalogue: {
    path: env.CODE_CATALOGUE_PATH,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
