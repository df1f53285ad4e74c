/**
 * Get Headline Stats Use Case
 *
 * Sums yield, consumption, net trade and production across all modules for an
 * optional year and item. A module that does not carry the item adds nothing,
 * and a variable without facts reports zero.
 */

import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { resolveHeadlineInput } from '../filter.js';
import { HEADLINE_VARIABLES, type HeadlineStat, type HeadlineStatsInput } from '../types.js';

import type { ProjectionError } from '../errors.js';
import type { FactQueryRepository } from '../ports.js';
import type { CodeRegistry } from '@/modules/code-registry/index.js';

export interface GetHeadlineStatsDeps {
  registry: CodeRegistry;
  factQueryRepo: FactQueryRepository;
}

export const getHeadlineStats = async (
  deps: GetHeadlineStatsDeps,
  input: HeadlineStatsInput
): Promise<Result<HeadlineStat[], ProjectionError>> => {
  const { registry, factQueryRepo } = deps;

  const scopeResult = resolveHeadlineInput(input);
  if (scopeResult.isErr()) {
    return err(scopeResult.error);
  }
  const { item, year } = scopeResult.value;

  const sumsResult = await factQueryRepo.sumByVariable({
    variables: HEADLINE_VARIABLES.map((v) => v.code),
    item,
    year,
  });
  if (sumsResult.isErr()) {
    return err(sumsResult.error);
  }
  const sums = sumsResult.value;

  const stats: HeadlineStat[] = [];
  for (const { code, label } of HEADLINE_VARIABLES) {
    const unit = registry.canonicalUnit(code);
    if (unit === undefined) continue;
    stats.push({ variable: code, label, value: sums.get(code) ?? new Decimal(0), unit });
  }
  return ok(stats);
};
