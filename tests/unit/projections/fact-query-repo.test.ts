/**
 * Unit tests for the Kysely fact query repository
 */

import { describe, expect, it } from 'vitest';

import {
  buildListFactsQuery,
  buildSumByGroupQuery,
  buildSumByVariableQuery,
  makeFactQueryRepo,
  type ResolvedFilter,
} from '@/modules/projections/index.js';

import { makeFakeKyselyDb } from '../../fixtures/fakes.js';

const filter = (overrides: Partial<ResolvedFilter> = {}): ResolvedFilter => ({
  module: 'crop',
  variable: { code: 'area', label: 'Harvested Area', unit: 'ha' },
  item: undefined,
  region: undefined,
  years: undefined,
  ...overrides,
});

describe('buildListFactsQuery', () => {
  it('reads one module through the union view joined to regions', () => {
    const { db } = makeFakeKyselyDb();

    const { sql, parameters } = buildListFactsQuery(db, filter()).compile();

    expect(sql).toContain('from "projection_facts" as "f"');
    expect(sql).toContain('inner join "regions" as "r" on "r"."id" = "f"."region_id"');
    expect(sql).toContain('where "f"."module" = $1 and "f"."variable" = $2');
    expect(sql).toContain('order by "r"."code", "f"."item", "f"."variable", "f"."year"');
    expect(parameters).toEqual(['crop', 'area']);
  });

  it('adds item, region and year bounds when present', () => {
    const { db } = makeFakeKyselyDb();

    const { sql, parameters } = buildListFactsQuery(
      db,
      filter({ item: 'wht', region: 'usa', years: { start: 2020, end: 2030 } })
    ).compile();

    expect(sql).toContain(
      '"f"."item" = $3 and "r"."code" = $4 and "f"."year" >= $5 and "f"."year" <= $6'
    );
    expect(parameters).toEqual(['crop', 'area', 'wht', 'usa', 2020, 2030]);
  });
});

describe('buildSumByGroupQuery', () => {
  it.each([
    ['year', '"f"."year"'],
    ['item', '"f"."item"'],
    ['region', '"r"."code"'],
  ] as const)('groups by %s', (groupBy, column) => {
    const { db } = makeFakeKyselyDb();

    const { sql } = buildSumByGroupQuery(db, filter(), groupBy).compile();

    expect(sql).toContain(`select ${column} as "groupKey", sum("f"."value") as "total"`);
    expect(sql).toContain(`group by ${column} order by ${column}`);
  });
});

describe('buildSumByVariableQuery', () => {
  it('sums every module for the requested variables', () => {
    const { db } = makeFakeKyselyDb();

    const { sql, parameters } = buildSumByVariableQuery(db, {
      variables: ['yild', 'prod'],
      item: 'wht',
      year: 2030,
    }).compile();

    expect(sql).toContain('where "f"."variable" in ($1, $2) and "f"."item" = $3 and "f"."year" = $4');
    expect(sql).toContain('group by "f"."variable"');
    expect(sql).not.toContain('"module"');
    expect(parameters).toEqual(['yild', 'prod', 'wht', 2030]);
  });
});

describe('makeFactQueryRepo', () => {
  it('returns an empty list when the store has no rows', async () => {
    const { db, executed } = makeFakeKyselyDb();

    const result = await makeFactQueryRepo(db).listFacts(filter());

    expect(result._unsafeUnwrap()).toEqual([]);
    expect(executed).toHaveLength(1);
  });

  it('skips the query when no variables are requested', async () => {
    const { db, executed } = makeFakeKyselyDb();

    const result = await makeFactQueryRepo(db).sumByVariable({
      variables: [],
      item: undefined,
      year: undefined,
    });

    expect(result._unsafeUnwrap().size).toBe(0);
    expect(executed).toEqual([]);
  });

  it('wraps failures in a DatabaseError naming the operation', async () => {
    const { db } = makeFakeKyselyDb({ failWithError: new Error('connection reset') });
    const repo = makeFactQueryRepo(db);

    expect((await repo.listFacts(filter()))._unsafeUnwrapErr().message).toBe(
      'Failed to list crop projections'
    );
    expect((await repo.sumByGroup(filter(), 'region'))._unsafeUnwrapErr().message).toBe(
      'Failed to aggregate crop projections by region'
    );
    expect(
      (
        await repo.sumByVariable({ variables: ['prod'], item: undefined, year: undefined })
      )._unsafeUnwrapErr().message
    ).toBe('Failed to compute headline sums');
  });
});
