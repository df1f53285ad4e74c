/**
 * Use case: seed the region table from the code catalogue.
 *
 * Safe to run repeatedly; regions already present are not modified.
 */

import type { CodeRegistry } from '@/modules/code-registry/index.js';
import type { RegionError } from '../errors.js';
import type { RegionRepository } from '../ports.js';
import type { Result } from 'neverthrow';

export interface SeedRegionsDeps {
  regionRepo: RegionRepository;
  registry: CodeRegistry;
}

export const seedRegions = async (deps: SeedRegionsDeps): Promise<Result<number, RegionError>> => {
  const regions = deps.registry.listRegions().map((region) => ({
    code: region.code,
    name: region.name,
    description: region.description,
  }));

  return deps.regionRepo.seed(regions);
};
