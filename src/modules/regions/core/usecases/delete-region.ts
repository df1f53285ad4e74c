/**
 * Use case: delete a region.
 *
 * Regions referenced by facts are protected by the store (ON DELETE RESTRICT);
 * the resulting IntegrityError is returned unchanged.
 */

import type { RegionError } from '../errors.js';
import type { RegionRepository } from '../ports.js';
import type { Result } from 'neverthrow';

export interface DeleteRegionDeps {
  regionRepo: RegionRepository;
}

export const deleteRegion = async (
  deps: DeleteRegionDeps,
  code: string
): Promise<Result<void, RegionError>> => {
  return deps.regionRepo.deleteByCode(code.trim());
};
