/**
 * Projections Module - Public API
 *
 * Filtered reads, grouped sums and headline statistics over the fact store.
 */

// =============================================================================
// Repository
// =============================================================================
export {
  makeFactQueryRepo,
  buildListFactsQuery,
  buildSumByGroupQuery,
  buildSumByVariableQuery,
} from './shell/repo/fact-query-repo.js';
export type { FactQueryRepository } from './core/ports.js';

// =============================================================================
// Use Cases
// =============================================================================
export { resolveFilter, resolveYears, resolveHeadlineInput, ALL } from './core/filter.js';
export { listProjections, type ListProjectionsDeps } from './core/usecases/list-projections.js';
export {
  aggregateProjections,
  type AggregateProjectionsDeps,
  type AggregateProjectionsInput,
} from './core/usecases/aggregate-projections.js';
export { getHeadlineStats, type GetHeadlineStatsDeps } from './core/usecases/get-headline-stats.js';

// =============================================================================
// REST
// =============================================================================
export { makeProjectionRoutes, type MakeProjectionRoutesDeps } from './shell/rest/routes.js';

// =============================================================================
// Types & Errors
// =============================================================================
export {
  GROUP_BY_DIMENSIONS,
  HEADLINE_VARIABLES,
  type GroupBy,
  type GroupKey,
  type GroupSum,
  type AggregateResult,
  type FactRecord,
  type HeadlineScope,
  type HeadlineStat,
  type HeadlineStatsInput,
  type ProjectionFilterInput,
  type ProjectionRow,
  type ResolvedFilter,
  type YearRange,
} from './core/types.js';
export {
  createInvalidFilterError,
  PROJECTION_ERROR_HTTP_STATUS,
  type FilterField,
  type InvalidFilterError,
  type ProjectionError,
} from './core/errors.js';
