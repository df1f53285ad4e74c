/**
 * Integration tests for the projection, region and module REST endpoints
 */

import { Decimal } from 'decimal.js';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { createApp } from '@/app/build-app.js';

import { makeTestConfig, makeTestRegions, makeTestRegistry } from '../fixtures/builders.js';
import {
  makeFakeFactStore,
  makeFakeKyselyDb,
  makeFakeRegionRepo,
  makeStoreFailure,
} from '../fixtures/fakes.js';

import type { FastifyInstance } from 'fastify';

const registry = makeTestRegistry();

describe('Projections REST API', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    const regionRepo = makeFakeRegionRepo({ initial: makeTestRegions() });
    const store = makeFakeFactStore({ regions: () => regionRepo.all() });

    // bra = 1, usa = 3
    const seeded = await store.upsertFacts('crop', [
      { regionId: 3, year: 2020, item: 'wht', variable: 'prod', unit: 't', value: new Decimal('1000.25') },
      { regionId: 3, year: 2030, item: 'wht', variable: 'prod', unit: 't', value: new Decimal('1200') },
      { regionId: 1, year: 2020, item: 'wht', variable: 'prod', unit: 't', value: new Decimal('400') },
      { regionId: 1, year: 2020, item: 'ric', variable: 'prod', unit: 't', value: new Decimal('80') },
    ]);
    expect(seeded.isOk()).toBe(true);
    const seededLong = await store.upsertFacts('bioenergy', [
      {
        regionId: 1,
        year: 2040,
        item: 'sgc',
        variable: 'prod',
        unit: 't',
        value: new Decimal('12345678901234567890.123456789'),
      },
    ]);
    expect(seededLong.isOk()).toBe(true);

    app = await createApp({
      fastifyOptions: { logger: false },
      deps: {
        db: makeFakeKyselyDb().db,
        registry,
        config: makeTestConfig(),
        regionRepo,
        factQueryRepo: store,
      },
    });
  });

  afterAll(async () => {
    await app.close();
  });

  describe('GET /api/v1/projections', () => {
    it('returns labelled facts with exact decimal values', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/projections?module=crop&variable=prod&region=usa&item=wht',
      });

      expect(response.statusCode).toBe(200);
      const body = response.json<{
        ok: boolean;
        data: { projections: Record<string, unknown>[] };
      }>();
      expect(body.ok).toBe(true);
      expect(body.data.projections).toHaveLength(2);
      expect(body.data.projections[0]).toMatchObject({
        region: 'usa',
        regionName: 'USA',
        year: 2020,
        item: 'wht',
        itemLabel: 'Wheat',
        variable: 'prod',
        variableLabel: 'Production',
        unit: 't',
        value: '1000.25',
      });
      expect(typeof body.data.projections[0]?.['externalId']).toBe('string');
    });

    it('keeps every digit of values a double cannot hold', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/projections?module=bioenergy&variable=prod',
      });

      const body = response.json<{ data: { projections: { item: string; value: string }[] } }>();
      expect(body.data.projections.map((p) => [p.item, p.value])).toEqual([
        ['sgc', '12345678901234567890.123456789'],
      ]);
    });

    it('filters by a single year', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/projections?module=crop&variable=prod&region=all&item=all&year=2030',
      });

      const body = response.json<{ data: { projections: { region: string; value: string }[] } }>();
      expect(body.data.projections.map((p) => [p.region, p.value])).toEqual([['usa', '1200']]);
    });

    it('answers an invalid filter with 400 and the error type', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/projections?module=crop&variable=land',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        ok: false,
        error: 'InvalidFilterError',
        message: "Variable 'land' is not tracked by module 'crop'",
      });
    });

    it('rejects a request without a module', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/projections?variable=prod',
      });

      expect(response.statusCode).toBe(400);
      const body = response.json<{ ok: boolean; error: string; message: string }>();
      expect(body.ok).toBe(false);
      expect(body.error).toBe('ValidationError');
      expect(body.message).toContain('module');
    });

    it('rejects a non-integer year', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/projections?module=crop&variable=prod&year=soon',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json<{ error: string }>().error).toBe('ValidationError');
    });
  });

  describe('GET /api/v1/projections/aggregate', () => {
    it('groups by year by default', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/projections/aggregate?module=crop&variable=prod',
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        ok: true,
        data: {
          unit: 't',
          groupBy: 'year',
          groups: [
            { key: 2020, value: '1480.25' },
            { key: 2030, value: '1200' },
          ],
        },
      });
    });

    it('computes shares per item', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/projections/aggregate?module=crop&variable=prod&year=2020&group_by=item',
      });

      const body = response.json<{ data: { groups: { key: string; value: string }[] } }>();
      expect(body.data.groups).toEqual([
        { key: 'ric', value: '80' },
        { key: 'wht', value: '1400.25' },
      ]);
    });

    it('rejects an unknown grouping', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/projections/aggregate?module=crop&variable=prod&group_by=decade',
      });

      expect(response.statusCode).toBe(400);
    });
  });

  describe('GET /api/v1/stats/headline', () => {
    it('returns the four headline figures', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/stats/headline?year=2020' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        ok: true,
        data: {
          stats: [
            { variable: 'yild', label: 'Yield', value: '0', unit: 't/ha' },
            { variable: 'cons', label: 'Total Consumption', value: '0', unit: 't' },
            { variable: 'nett', label: 'Net Trade', value: '0', unit: 't' },
            { variable: 'prod', label: 'Production', value: '1480.25', unit: 't' },
          ],
        },
      });
    });

    it('reports zero for an item no module carries', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/stats/headline?item=xyz' });

      expect(response.statusCode).toBe(200);
      const body = response.json<{ data: { stats: { variable: string; value: string }[] } }>();
      expect(body.data.stats.map((s) => [s.variable, s.value])).toEqual([
        ['yild', '0'],
        ['cons', '0'],
        ['nett', '0'],
        ['prod', '0'],
      ]);
    });

    it('rejects a year outside the horizon', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/stats/headline?year=2100' });

      expect(response.statusCode).toBe(400);
      expect(response.json<{ error: string }>().error).toBe('InvalidFilterError');
    });
  });

  describe('GET /api/v1/regions', () => {
    it('lists regions ordered by code', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/regions' });

      expect(response.statusCode).toBe(200);
      const body = response.json<{ data: { regions: { code: string }[] } }>();
      expect(body.data.regions.map((r) => r.code)).toEqual(['bra', 'chn', 'usa']);
    });
  });

  describe('GET /api/v1/modules', () => {
    it('describes the four modules with their items and variables', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/modules' });

      expect(response.statusCode).toBe(200);
      const body = response.json<{
        data: {
          modules: {
            name: string;
            items: { code: string; label: string }[];
            variables: { code: string; unit: string }[];
          }[];
        };
      }>();
      expect(body.data.modules.map((m) => m.name)).toEqual([
        'crop',
        'animal',
        'bioenergy',
        'landcover',
      ]);
      expect(body.data.modules[3]?.variables).toEqual([
        { code: 'land', label: 'Land Area', unit: 'ha' },
      ]);
    });
  });

  it('answers unknown routes with 404', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/v1/unknown' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      ok: false,
      error: 'NotFoundError',
      message: 'Route GET /api/v1/unknown not found',
    });
  });
});

describe('Projections REST API with a failing store', () => {
  it('answers store failures with 500', async () => {
    const regionRepo = makeFakeRegionRepo({ failWith: makeStoreFailure() });
    const app = await createApp({
      fastifyOptions: { logger: false },
      deps: {
        db: makeFakeKyselyDb().db,
        registry,
        config: makeTestConfig(),
        regionRepo,
        factQueryRepo: makeFakeFactStore({ regions: () => [], readError: makeStoreFailure() }),
      },
    });

    try {
      const projections = await app.inject({
        method: 'GET',
        url: '/api/v1/projections?module=crop&variable=prod',
      });
      const regions = await app.inject({ method: 'GET', url: '/api/v1/regions' });

      expect(projections.statusCode).toBe(500);
      expect(projections.json()).toEqual({
        ok: false,
        error: 'DatabaseError',
        message: 'connection refused',
      });
      expect(regions.statusCode).toBe(500);
    } finally {
      await app.close();
    }
  });
});
