/**
 * Reports whether the region reference table has been seeded.
 * Ingestion rejects every row until it is, but reads still work, so the check is not critical.
 */

import type { HealthChecker } from '../../core/ports.js';
import type { RegionRepository } from '@/modules/regions/index.js';

export const makeReferenceDataChecker = (
  regionRepo: RegionRepository,
  name = 'regions'
): HealthChecker => {
  return async () => {
    const result = await regionRepo.list();

    if (result.isErr()) {
      return { name, status: 'unhealthy', message: result.error.message, critical: false };
    }
    if (result.value.length === 0) {
      return { name, status: 'unhealthy', message: 'No regions seeded', critical: false };
    }
    return {
      name,
      status: 'healthy',
      message: `${String(result.value.length)} regions`,
      critical: false,
    };
  };
};
