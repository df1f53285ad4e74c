/**
 * List Projections Use Case
 *
 * Returns the facts of one module matching a filter, labelled from the registry.
 */

import { err, ok, type Result } from 'neverthrow';

import { resolveFilter } from '../filter.js';

import type { ProjectionError } from '../errors.js';
import type { FactQueryRepository } from '../ports.js';
import type { ProjectionFilterInput, ProjectionRow } from '../types.js';
import type { CodeRegistry } from '@/modules/code-registry/index.js';

export interface ListProjectionsDeps {
  registry: CodeRegistry;
  factQueryRepo: FactQueryRepository;
}

export const listProjections = async (
  deps: ListProjectionsDeps,
  input: ProjectionFilterInput
): Promise<Result<ProjectionRow[], ProjectionError>> => {
  const { registry, factQueryRepo } = deps;

  const filterResult = resolveFilter(registry, input);
  if (filterResult.isErr()) {
    return err(filterResult.error);
  }
  const filter = filterResult.value;

  const factsResult = await factQueryRepo.listFacts(filter);
  if (factsResult.isErr()) {
    return err(factsResult.error);
  }

  // Labels come from the queried module: grs is labelled differently in animal and landcover
  const itemLabels = new Map(registry.getModule(filter.module).items.map((i) => [i.code, i.label]));

  return ok(
    factsResult.value.map((fact) => ({
      ...fact,
      itemLabel: itemLabels.get(fact.item) ?? fact.item,
      variableLabel: filter.variable.label,
    }))
  );
};
