/**
 * Regions Module - Public API
 *
 * Region reference table: seeding, listing and protected deletion.
 */

// =============================================================================
// Repository
// =============================================================================
export { makeRegionRepo } from './shell/repo/region-repo.js';
export type { RegionRepository } from './core/ports.js';

// =============================================================================
// Use Cases
// =============================================================================
export { listRegions, type ListRegionsDeps } from './core/usecases/list-regions.js';
export { seedRegions, type SeedRegionsDeps } from './core/usecases/seed-regions.js';
export { createRegion, type CreateRegionDeps } from './core/usecases/create-region.js';
export { deleteRegion, type DeleteRegionDeps } from './core/usecases/delete-region.js';

// =============================================================================
// REST
// =============================================================================
export { makeRegionRoutes, type MakeRegionRoutesDeps } from './shell/rest/routes.js';

// =============================================================================
// Types & Errors
// =============================================================================
export type { Region, NewRegion } from './core/types.js';
export {
  createRegionNotFoundError,
  createInvalidRegionError,
  REGION_ERROR_HTTP_STATUS,
  type RegionError,
  type RegionNotFoundError,
  type InvalidRegionError,
} from './core/errors.js';
