/**
 * Ingest Records Use Case
 *
 * Normalizes a stream of source rows and upserts the accepted facts into their
 * module partitions in batches. Row problems are collected, never fatal; a
 * store or source failure aborts the run.
 */

import { err, ok, type Result } from 'neverthrow';

import { createDatabaseError } from '@/common/types/errors.js';
import { MODULE_NAMES, type CodeRegistry, type ModuleName } from '@/modules/code-registry/index.js';

import { createSourceReadError, type IngestionError } from '../errors.js';
import { normalizeRow } from '../normalize-row.js';
import {
  emptyOutcome,
  type FactWrite,
  type IngestionOptions,
  type IngestionSummary,
  type RowRejection,
  type SourceRow,
} from '../types.js';

import type { FactWriter } from '../ports.js';
import type { RegionRepository } from '@/modules/regions/index.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface IngestRecordsDeps {
  registry: CodeRegistry;
  regionRepo: RegionRepository;
  factWriter: FactWriter;
  logger: Logger;
}

export interface IngestRecordsInput {
  rows: AsyncIterable<SourceRow>;
  options: IngestionOptions;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const factKey = (fact: FactWrite): string =>
  `${String(fact.regionId)}|${String(fact.year)}|${fact.item}|${fact.variable}`;

const createEmptySummary = (): IngestionSummary => ({
  totalRows: 0,
  accepted: 0,
  rejected: 0,
  skipped: 0,
  rejections: [],
  cleared: {},
  modules: {
    crop: emptyOutcome(),
    animal: emptyOutcome(),
    bioenergy: emptyOutcome(),
    landcover: emptyOutcome(),
  },
});

const loadRegionKeys = async (
  regionRepo: RegionRepository
): Promise<Result<Map<string, number>, IngestionError>> => {
  const result = await regionRepo.list();
  if (result.isErr()) {
    const error = result.error;
    return err(
      error.type === 'DatabaseError' || error.type === 'IntegrityError'
        ? error
        : createDatabaseError(error.message, error)
    );
  }
  return ok(new Map(result.value.map((region) => [region.code, region.id])));
};

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const ingestRecords = async (
  deps: IngestRecordsDeps,
  input: IngestRecordsInput
): Promise<Result<IngestionSummary, IngestionError>> => {
  const { registry, regionRepo, factWriter, logger } = deps;
  const { rows, options } = input;

  const log = logger.child({ usecase: 'ingestRecords' });
  const batchSize = Math.max(1, Math.trunc(options.batchSize));
  const targets = new Set<ModuleName>(options.modules ?? MODULE_NAMES);
  const summary = createEmptySummary();

  const regionKeysResult = await loadRegionKeys(regionRepo);
  if (regionKeysResult.isErr()) {
    log.error({ error: regionKeysResult.error }, 'Failed to load region keys');
    return err(regionKeysResult.error);
  }
  const regionKeys = regionKeysResult.value;

  if (options.clear === true) {
    for (const module of MODULE_NAMES) {
      if (!targets.has(module)) continue;

      const cleared = await factWriter.clearFacts(module);
      if (cleared.isErr()) {
        log.error({ module, error: cleared.error }, 'Failed to clear module facts');
        return err(cleared.error);
      }
      summary.cleared[module] = cleared.value;
      log.info({ module, deleted: cleared.value }, 'Cleared module facts');
    }
  }

  const pending = new Map<ModuleName, Map<string, FactWrite>>();

  const flush = async (module: ModuleName): Promise<Result<void, IngestionError>> => {
    const batch = pending.get(module);
    if (batch === undefined || batch.size === 0) {
      return ok(undefined);
    }
    pending.delete(module);

    const facts = [...batch.values()];
    const result = await factWriter.upsertFacts(module, facts);
    if (result.isErr()) {
      log.error({ module, size: facts.length, error: result.error }, 'Batch upsert failed');
      return err(result.error);
    }

    const totals = summary.modules[module];
    totals.inserted += result.value.inserted;
    totals.updated += result.value.updated;
    totals.unchanged += result.value.unchanged;
    log.debug({ module, size: facts.length, ...result.value }, 'Flushed batch');
    return ok(undefined);
  };

  const rejectRow = (row: number, rejection: RowRejection): void => {
    summary.rejected += 1;
    summary.rejections.push({ row, ...rejection });
    log.debug({ row, reason: rejection.reason, value: rejection.value }, 'Rejected row');
  };

  try {
    for await (const { index, record } of rows) {
      summary.totalRows += 1;

      const normalized = normalizeRow(registry, record);
      if (normalized.isErr()) {
        rejectRow(index, normalized.error);
        continue;
      }

      const fact = normalized.value;
      if (!targets.has(fact.module)) {
        summary.skipped += 1;
        continue;
      }

      const regionId = regionKeys.get(fact.region);
      if (regionId === undefined) {
        rejectRow(index, {
          reason: 'unknown_region',
          field: 'region',
          value: fact.region,
          message: `Region '${fact.region}' is not seeded in the store`,
        });
        continue;
      }

      summary.accepted += 1;

      let batch = pending.get(fact.module);
      if (batch === undefined) {
        batch = new Map();
        pending.set(fact.module, batch);
      }

      const write: FactWrite = {
        regionId,
        year: fact.year,
        item: fact.item,
        variable: fact.variable,
        unit: fact.unit,
        value: fact.value,
      };
      // Last row wins for a key repeated inside one batch
      batch.set(factKey(write), write);

      if (batch.size >= batchSize) {
        const flushed = await flush(fact.module);
        if (flushed.isErr()) return err(flushed.error);
      }
    }
  } catch (error) {
    log.error({ err: error, rowsRead: summary.totalRows }, 'Failed to read source rows');
    return err(createSourceReadError('Failed to read source rows', error));
  }

  for (const module of MODULE_NAMES) {
    const flushed = await flush(module);
    if (flushed.isErr()) return err(flushed.error);
  }

  log.info(
    {
      totalRows: summary.totalRows,
      accepted: summary.accepted,
      rejected: summary.rejected,
      skipped: summary.skipped,
      modules: summary.modules,
    },
    'Ingestion finished'
  );

  return ok(summary);
};
