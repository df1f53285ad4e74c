/**
 * Use case: register a single region that is not part of the catalogue seed.
 */

import { err, type Result } from 'neverthrow';

import { createInvalidRegionError, type RegionError } from '../errors.js';

import type { RegionRepository } from '../ports.js';
import type { NewRegion, Region } from '../types.js';

const REGION_CODE_PATTERN = /^[a-z0-9_]{1,10}$/;

export interface CreateRegionDeps {
  regionRepo: RegionRepository;
}

/**
 * Validates the code and name, then performs a strict insert.
 * An existing code is reported by the repository as an IntegrityError.
 */
export const createRegion = async (
  deps: CreateRegionDeps,
  input: NewRegion
): Promise<Result<Region, RegionError>> => {
  const code = input.code.trim();
  const name = input.name.trim();

  if (!REGION_CODE_PATTERN.test(code)) {
    return err(
      createInvalidRegionError('code', `Region code '${code}' must be 1-10 lower-case characters`)
    );
  }
  if (name === '' || name.length > 100) {
    return err(createInvalidRegionError('name', 'Region name must be 1-100 characters'));
  }

  return deps.regionRepo.create({ code, name, description: input.description.trim() });
};
