/**
 * Kysely implementation of the FactWriter port.
 *
 * One INSERT .. ON CONFLICT statement per batch, split into chunks that stay
 * under PostgreSQL's bind parameter limit. The conflict target is the natural key; the update only fires when the stored value differs, so an
 * unchanged row is neither rewritten nor returned.
 */

import { randomUUID } from 'node:crypto';

import { sql } from 'kysely';
import { ok, err, type Result } from 'neverthrow';

import { MAX_UPSERT_BATCH_SIZE } from '@/common/constants/upsert-batch.js';
import { toStoreError, type StoreError } from '@/common/types/errors.js';
import { FACT_TABLES, type ProjectionsDbClient } from '@/infra/database/client.js';

import type { FactWriter } from '../../core/ports.js';
import { emptyOutcome, type FactWrite, type UpsertOutcome } from '../../core/types.js';
import type { ModuleName } from '@/modules/code-registry/index.js';

/**
 * Builds the batch upsert statement. `newExternalId` is only used by rows that end up inserted.
 */
export const buildUpsertFactsQuery = (
  db: ProjectionsDbClient,
  module: ModuleName,
  facts: readonly FactWrite[],
  newExternalId: () => string = randomUUID
) => {
  const table = FACT_TABLES[module];

  return db
    .insertInto(table)
    .values(
      facts.map((fact) => ({
        external_id: newExternalId(),
        region_id: fact.regionId,
        year: fact.year,
        item: fact.item,
        variable: fact.variable,
        unit: fact.unit,
        value: fact.value.toFixed(),
      }))
    )
    .onConflict((oc) =>
      oc
        .columns(['region_id', 'year', 'item', 'variable'])
        .doUpdateSet({
          value: (eb) => eb.ref('excluded.value'),
          updated_at: sql`now()`,
        })
        .where(sql<boolean>`${sql.table(table)}.value is distinct from excluded.value`)
    )
    .returning(sql<boolean>`(xmax = 0)`.as('inserted'));
};

class KyselyFactWriter implements FactWriter {
  constructor(private readonly db: ProjectionsDbClient) {}

  async upsertFacts(
    module: ModuleName,
    facts: readonly FactWrite[]
  ): Promise<Result<UpsertOutcome, StoreError>> {
    if (facts.length === 0) {
      return ok(emptyOutcome());
    }

    const outcome = emptyOutcome();

    try {
      for (let start = 0; start < facts.length; start += MAX_UPSERT_BATCH_SIZE) {
        const chunk = facts.slice(start, start + MAX_UPSERT_BATCH_SIZE);
        const written = await buildUpsertFactsQuery(this.db, module, chunk).execute();
        const inserted = written.filter((row) => row.inserted).length;

        outcome.inserted += inserted;
        outcome.updated += written.length - inserted;
        outcome.unchanged += chunk.length - written.length;
      }

      return ok(outcome);
    } catch (error) {
      return err(toStoreError(`Failed to upsert ${String(facts.length)} ${module} facts`, error));
    }
  }

  async clearFacts(module: ModuleName): Promise<Result<number, StoreError>> {
    try {
      const result = await this.db.deleteFrom(FACT_TABLES[module]).executeTakeFirst();
      return ok(Number(result.numDeletedRows));
    } catch (error) {
      return err(toStoreError(`Failed to clear ${module} facts`, error));
    }
  }
}

export const makeFactWriter = (db: ProjectionsDbClient): FactWriter => {
  return new KyselyFactWriter(db);
};
