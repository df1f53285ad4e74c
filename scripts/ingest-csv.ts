#!/usr/bin/env tsx

/**
 * CSV ingestion script
 *
 * Loads a GLOBIOM projection export into the fact store. Rows are validated
 * one by one; rejected rows are reported and do not stop the run.
 *
 * Usage:
 *   tsx scripts/ingest-csv.ts --csv data/globiom.csv
 *   tsx scripts/ingest-csv.ts --csv data/crops.csv --module crop --clear
 *
 * Options:
 *   --csv: Source file with region, year, item, variable, unit, value columns (required)
 *   --module: Only write this module; repeatable. Other rows are counted as skipped
 *   --clear: Delete the targeted modules' facts first
 *   --batch-size: Rows per upsert statement (defaults to INGEST_BATCH_SIZE)
 */

import { parseEnv, createConfig } from '../src/infra/config/index.js';
import { initDatabase } from '../src/infra/database/client.js';
import { createComponentLogger, createLogger } from '../src/infra/logger/index.js';
import { loadCodeRegistry } from '../src/modules/code-registry/index.js';
import {
  INGEST_USAGE,
  ingestRecords,
  makeFactWriter,
  openProjectionCsvFile,
  parseIngestArgs,
} from '../src/modules/ingestion/index.js';
import { makeRegionRepo } from '../src/modules/regions/index.js';

/** Rejections printed individually; the rest are only counted */
const MAX_LOGGED_REJECTIONS = 50;

const main = async (): Promise<number> => {
  const argsResult = parseIngestArgs(process.argv.slice(2));
  if (argsResult.isErr()) {
    console.error(`${argsResult.error}\n${INGEST_USAGE}`);
    return 2;
  }
  const args = argsResult.value;

  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({
    level: config.logger.level,
    name: 'ingest-csv',
    pretty: config.logger.pretty,
  });

  const registryResult = loadCodeRegistry(config.codeCatalogue.path);
  if (registryResult.isErr()) {
    logger.fatal({ error: registryResult.error }, 'Failed to load code catalogue');
    return 1;
  }

  const rows = await openProjectionCsvFile(args.csvPath);
  if (rows.isErr()) {
    logger.error({ error: rows.error, csv: args.csvPath }, 'Cannot open CSV source');
    return 1;
  }

  const db = initDatabase(config);
  try {
    const result = await ingestRecords(
      {
        registry: registryResult.value,
        regionRepo: makeRegionRepo(db),
        factWriter: makeFactWriter(db),
        logger: createComponentLogger(logger, 'ingestion'),
      },
      {
        rows: rows.value,
        options: {
          batchSize: args.batchSize ?? config.ingestion.batchSize,
          clear: args.clear,
          ...(args.modules.length > 0 && { modules: args.modules }),
        },
      }
    );

    if (result.isErr()) {
      logger.error({ error: result.error, csv: args.csvPath }, 'Ingestion aborted');
      return 1;
    }

    const { rejections, ...summary } = result.value;
    for (const rejection of rejections.slice(0, MAX_LOGGED_REJECTIONS)) {
      logger.warn(rejection, 'Row rejected');
    }
    if (rejections.length > MAX_LOGGED_REJECTIONS) {
      logger.warn(
        { omitted: rejections.length - MAX_LOGGED_REJECTIONS },
        'More rejected rows not shown'
      );
    }
    logger.info({ csv: args.csvPath, ...summary }, 'Ingestion summary');
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
