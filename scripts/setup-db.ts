#!/usr/bin/env tsx

/**
 * Database setup script
 *
 * Applies the projections schema (idempotent) and seeds the region table from
 * the code catalogue. Existing regions are left untouched.
 *
 * Usage:
 *   tsx scripts/setup-db.ts
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

import { sql } from 'kysely';

import { parseEnv, createConfig } from '../src/infra/config/index.js';
import { initDatabase } from '../src/infra/database/client.js';
import { createLogger } from '../src/infra/logger/index.js';
import { loadCodeRegistry } from '../src/modules/code-registry/index.js';
import { makeRegionRepo, seedRegions } from '../src/modules/regions/index.js';

const SCHEMA_PATH = fileURLToPath(
  new URL('../src/infra/database/projections/schema.sql', import.meta.url)
);

const main = async (): Promise<number> => {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({
    level: config.logger.level,
    name: 'setup-db',
    pretty: config.logger.pretty,
  });

  const registryResult = loadCodeRegistry(config.codeCatalogue.path);
  if (registryResult.isErr()) {
    logger.fatal({ error: registryResult.error }, 'Failed to load code catalogue');
    return 1;
  }

  const db = initDatabase(config);
  try {
    const schema = await readFile(SCHEMA_PATH, 'utf-8');
    await sql.raw(schema).execute(db);
    logger.info({ schema: SCHEMA_PATH }, 'Schema applied');

    const seeded = await seedRegions({
      registry: registryResult.value,
      regionRepo: makeRegionRepo(db),
    });
    if (seeded.isErr()) {
      logger.error({ error: seeded.error }, 'Failed to seed regions');
      return 1;
    }

    logger.info({ inserted: seeded.value }, 'Regions seeded');
    return 0;
  } finally {
    await db.destroy();
  }
};

const exitCode = await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  return 1;
});
process.exit(exitCode);
