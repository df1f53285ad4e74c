import type { RegionError } from '../errors.js';
import type { RegionRepository } from '../ports.js';
import type { Region } from '../types.js';
import type { Result } from 'neverthrow';

export interface ListRegionsDeps {
  regionRepo: RegionRepository;
}

export const listRegions = async (deps: ListRegionsDeps): Promise<Result<Region[], RegionError>> => {
  return deps.regionRepo.list();
};
