/**
 * Port interfaces for the Regions module.
 */

import type { RegionError } from './errors.js';
import type { NewRegion, Region } from './types.js';
import type { Result } from 'neverthrow';

export interface RegionRepository {
  /** All regions ordered by code. */
  list(): Promise<Result<Region[], RegionError>>;

  /**
   * Inserts regions whose code is not stored yet; existing codes are left as they are.
   * @returns number of regions inserted
   */
  seed(regions: readonly NewRegion[]): Promise<Result<number, RegionError>>;

  /** Strict insert. A duplicate code fails with an IntegrityError ('unique'). */
  create(region: NewRegion): Promise<Result<Region, RegionError>>;

  /**
   * Deletes a region.
   * Fails with IntegrityError ('foreign_key') while any fact references it.
   */
  deleteByCode(code: string): Promise<Result<void, RegionError>>;
}
