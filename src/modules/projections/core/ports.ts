/**
 * Port interfaces for the Projections module.
 */

import type { FactRecord, GroupBy, GroupSum, HeadlineScope, ResolvedFilter } from './types.js';
import type { DatabaseError } from '@/common/types/errors.js';
import type { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';

export interface FactQueryRepository {
  /** Facts matching the filter, ordered by region code, item, variable, year. */
  listFacts(filter: ResolvedFilter): Promise<Result<FactRecord[], DatabaseError>>;

  /** SUM(value) per group, ordered by group key. Groups without facts are absent. */
  sumByGroup(filter: ResolvedFilter, groupBy: GroupBy): Promise<Result<GroupSum[], DatabaseError>>;

  /** SUM(value) per variable across every module. Variables without facts are absent. */
  sumByVariable(scope: HeadlineScope): Promise<Result<Map<string, Decimal>, DatabaseError>>;
}
