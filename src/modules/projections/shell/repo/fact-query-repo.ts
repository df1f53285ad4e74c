/**
 * Kysely implementation of the FactQueryRepository port.
 *
 * Reads go through the `projection_facts` view, which unions the module
 * partitions and tags each row with its module.
 */

import { Decimal } from 'decimal.js';
import { ok, err, type Result } from 'neverthrow';

import { createDatabaseError, type DatabaseError } from '@/common/types/errors.js';

import type { FactQueryRepository } from '../../core/ports.js';
import type {
  FactRecord,
  GroupBy,
  GroupSum,
  HeadlineScope,
  ResolvedFilter,
} from '../../core/types.js';
import type { ProjectionsDbClient } from '@/infra/database/client.js';

const GROUP_COLUMNS = {
  year: 'f.year',
  item: 'f.item',
  region: 'r.code',
} as const satisfies Record<GroupBy, string>;

// ─────────────────────────────────────────────────────────────────────────────
// Query builders
// ─────────────────────────────────────────────────────────────────────────────

const scopedFacts = (db: ProjectionsDbClient, filter: ResolvedFilter) => {
  let query = db
    .selectFrom('projection_facts as f')
    .innerJoin('regions as r', 'r.id', 'f.region_id')
    .where('f.module', '=', filter.module)
    .where('f.variable', '=', filter.variable.code);

  if (filter.item !== undefined) {
    query = query.where('f.item', '=', filter.item);
  }
  if (filter.region !== undefined) {
    query = query.where('r.code', '=', filter.region);
  }
  if (filter.years !== undefined) {
    query = query
      .where('f.year', '>=', filter.years.start)
      .where('f.year', '<=', filter.years.end);
  }
  return query;
};

export const buildListFactsQuery = (db: ProjectionsDbClient, filter: ResolvedFilter) =>
  scopedFacts(db, filter)
    .select([
      'f.external_id as externalId',
      'r.code as region',
      'r.name as regionName',
      'f.year',
      'f.item',
      'f.variable',
      'f.unit',
      'f.value',
    ])
    .orderBy('r.code')
    .orderBy('f.item')
    .orderBy('f.variable')
    .orderBy('f.year');

export const buildSumByGroupQuery = (
  db: ProjectionsDbClient,
  filter: ResolvedFilter,
  groupBy: GroupBy
) => {
  const column = GROUP_COLUMNS[groupBy];
  return scopedFacts(db, filter)
    .select((eb) => [eb.ref(column).as('groupKey'), eb.fn.sum<string>('f.value').as('total')])
    .groupBy(column)
    .orderBy(column);
};

export const buildSumByVariableQuery = (db: ProjectionsDbClient, scope: HeadlineScope) => {
  let query = db
    .selectFrom('projection_facts as f')
    .select((eb) => ['f.variable', eb.fn.sum<string>('f.value').as('total')])
    .where('f.variable', 'in', [...scope.variables]);

  if (scope.item !== undefined) {
    query = query.where('f.item', '=', scope.item);
  }
  if (scope.year !== undefined) {
    query = query.where('f.year', '=', scope.year);
  }
  return query.groupBy('f.variable');
};

// ─────────────────────────────────────────────────────────────────────────────
// Repository
// ─────────────────────────────────────────────────────────────────────────────

class KyselyFactQueryRepo implements FactQueryRepository {
  constructor(private readonly db: ProjectionsDbClient) {}

  async listFacts(filter: ResolvedFilter): Promise<Result<FactRecord[], DatabaseError>> {
    try {
      const rows = await buildListFactsQuery(this.db, filter).execute();
      return ok(rows.map((row) => ({ ...row, value: new Decimal(row.value) })));
    } catch (error) {
      return err(createDatabaseError(`Failed to list ${filter.module} projections`, error));
    }
  }

  async sumByGroup(
    filter: ResolvedFilter,
    groupBy: GroupBy
  ): Promise<Result<GroupSum[], DatabaseError>> {
    try {
      const rows = await buildSumByGroupQuery(this.db, filter, groupBy).execute();
      return ok(rows.map((row) => ({ key: row.groupKey, value: new Decimal(row.total) })));
    } catch (error) {
      return err(
        createDatabaseError(`Failed to aggregate ${filter.module} projections by ${groupBy}`, error)
      );
    }
  }

  async sumByVariable(scope: HeadlineScope): Promise<Result<Map<string, Decimal>, DatabaseError>> {
    if (scope.variables.length === 0) {
      return ok(new Map());
    }

    try {
      const rows = await buildSumByVariableQuery(this.db, scope).execute();
      return ok(new Map(rows.map((row) => [row.variable, new Decimal(row.total)])));
    } catch (error) {
      return err(createDatabaseError('Failed to compute headline sums', error));
    }
  }
}

export const makeFactQueryRepo = (db: ProjectionsDbClient): FactQueryRepository => {
  return new KyselyFactQueryRepo(db);
};
