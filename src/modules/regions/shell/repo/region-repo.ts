/**
 * Kysely repository implementation for regions.
 */

import { ok, err, type Result } from 'neverthrow';

import { toStoreError } from '@/common/types/errors.js';

import { createRegionNotFoundError, type RegionError } from '../../core/errors.js';

import type { RegionRepository } from '../../core/ports.js';
import type { NewRegion, Region } from '../../core/types.js';
import type { ProjectionsDbClient } from '@/infra/database/client.js';

class KyselyRegionRepo implements RegionRepository {
  constructor(private readonly db: ProjectionsDbClient) {}

  async list(): Promise<Result<Region[], RegionError>> {
    try {
      const rows = await this.db
        .selectFrom('regions')
        .select(['id', 'code', 'name', 'description'])
        .orderBy('code', 'asc')
        .execute();

      return ok(rows);
    } catch (error) {
      return err(toStoreError('Failed to list regions', error));
    }
  }

  async seed(regions: readonly NewRegion[]): Promise<Result<number, RegionError>> {
    if (regions.length === 0) {
      return ok(0);
    }

    try {
      const inserted = await this.db
        .insertInto('regions')
        .values(regions.map((r) => ({ code: r.code, name: r.name, description: r.description })))
        .onConflict((oc) => oc.column('code').doNothing())
        .returning('id')
        .execute();

      return ok(inserted.length);
    } catch (error) {
      return err(toStoreError('Failed to seed regions', error));
    }
  }

  async create(region: NewRegion): Promise<Result<Region, RegionError>> {
    try {
      const row = await this.db
        .insertInto('regions')
        .values({ code: region.code, name: region.name, description: region.description })
        .returning(['id', 'code', 'name', 'description'])
        .executeTakeFirstOrThrow();

      return ok(row);
    } catch (error) {
      return err(toStoreError(`Failed to create region '${region.code}'`, error));
    }
  }

  async deleteByCode(code: string): Promise<Result<void, RegionError>> {
    try {
      const result = await this.db
        .deleteFrom('regions')
        .where('code', '=', code)
        .executeTakeFirst();

      if (result.numDeletedRows === 0n) {
        return err(createRegionNotFoundError(code));
      }
      return ok(undefined);
    } catch (error) {
      return err(toStoreError(`Failed to delete region '${code}'`, error));
    }
  }
}

/**
 * Factory function to create RegionRepository.
 */
export const makeRegionRepo = (db: ProjectionsDbClient): RegionRepository => {
  return new KyselyRegionRepo(db);
};
