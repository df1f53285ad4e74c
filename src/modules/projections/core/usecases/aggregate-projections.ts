/**
 * Aggregate Projections Use Case
 *
 * Sums the filtered facts per year (time series), item or region (shares).
 */

import { err, ok, type Result } from 'neverthrow';

import { resolveFilter } from '../filter.js';

import type { ProjectionError } from '../errors.js';
import type { FactQueryRepository } from '../ports.js';
import type { AggregateResult, GroupBy, ProjectionFilterInput } from '../types.js';
import type { CodeRegistry } from '@/modules/code-registry/index.js';

export interface AggregateProjectionsDeps {
  registry: CodeRegistry;
  factQueryRepo: FactQueryRepository;
}

export interface AggregateProjectionsInput {
  filter: ProjectionFilterInput;
  groupBy: GroupBy;
}

export const aggregateProjections = async (
  deps: AggregateProjectionsDeps,
  input: AggregateProjectionsInput
): Promise<Result<AggregateResult, ProjectionError>> => {
  const { registry, factQueryRepo } = deps;

  const filterResult = resolveFilter(registry, input.filter);
  if (filterResult.isErr()) {
    return err(filterResult.error);
  }
  const filter = filterResult.value;

  const groupsResult = await factQueryRepo.sumByGroup(filter, input.groupBy);
  if (groupsResult.isErr()) {
    return err(groupsResult.error);
  }

  return ok({
    unit: filter.variable.unit,
    groupBy: input.groupBy,
    groups: groupsResult.value,
  });
};
