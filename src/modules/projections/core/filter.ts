/**
 * Filter validation for projection queries.
 *
 * A filter either resolves completely against the registry or fails with the
 * first offending field. 'all' (or an absent value) disables the item and
 * region filters.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  MAX_PROJECTION_YEAR,
  MIN_PROJECTION_YEAR,
  isProjectionYear,
} from '@/common/constants/projection-years.js';
import { isModuleName, type CodeRegistry } from '@/modules/code-registry/index.js';

import { createInvalidFilterError, type FilterField, type InvalidFilterError } from './errors.js';

import type { HeadlineStatsInput, ProjectionFilterInput, ResolvedFilter, YearRange } from './types.js';

export const ALL = 'all';

const optionalCode = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed === undefined || trimmed === '' || trimmed === ALL ? undefined : trimmed;
};

const checkYear = (field: FilterField, year: number): Result<number, InvalidFilterError> =>
  isProjectionYear(year)
    ? ok(year)
    : err(
        createInvalidFilterError(
          field,
          year,
          `Year ${String(year)} is outside ${String(MIN_PROJECTION_YEAR)}-${String(MAX_PROJECTION_YEAR)}`
        )
      );

export const resolveYears = (
  input: Pick<ProjectionFilterInput, 'year' | 'yearStart' | 'yearEnd'>
): Result<YearRange | undefined, InvalidFilterError> => {
  const { year, yearStart, yearEnd } = input;
  const hasRange = yearStart !== undefined || yearEnd !== undefined;

  if (year !== undefined) {
    if (hasRange) {
      return err(
        createInvalidFilterError('year', year, 'A single year cannot be combined with a year range')
      );
    }
    return checkYear('year', year).map((y) => ({ start: y, end: y }));
  }

  if (!hasRange) {
    return ok(undefined);
  }

  const start = checkYear('yearStart', yearStart ?? MIN_PROJECTION_YEAR);
  if (start.isErr()) return err(start.error);
  const end = checkYear('yearEnd', yearEnd ?? MAX_PROJECTION_YEAR);
  if (end.isErr()) return err(end.error);

  if (start.value > end.value) {
    return err(
      createInvalidFilterError(
        'yearStart',
        start.value,
        `Year range start ${String(start.value)} is after its end ${String(end.value)}`
      )
    );
  }
  return ok({ start: start.value, end: end.value });
};

export const resolveFilter = (
  registry: CodeRegistry,
  input: ProjectionFilterInput
): Result<ResolvedFilter, InvalidFilterError> => {
  const moduleName = input.module.trim();
  if (!isModuleName(moduleName)) {
    return err(createInvalidFilterError('module', moduleName, `Unknown module '${moduleName}'`));
  }

  const variableCode = input.variable.trim();
  const variable = registry.lookupVariable(variableCode);
  if (variable === undefined) {
    return err(
      createInvalidFilterError('variable', variableCode, `Unknown variable '${variableCode}'`)
    );
  }
  if (!registry.moduleHasVariable(moduleName, variable.code)) {
    return err(
      createInvalidFilterError(
        'variable',
        variableCode,
        `Variable '${variableCode}' is not tracked by module '${moduleName}'`
      )
    );
  }

  // An item outside the module is not an error; it simply matches no facts.
  const item = optionalCode(input.item);

  const region = optionalCode(input.region);
  if (region !== undefined && !registry.isRecognizedRegion(region)) {
    return err(createInvalidFilterError('region', region, `Unknown region '${region}'`));
  }

  return resolveYears(input).map((years) => ({
    module: moduleName,
    variable,
    item,
    region,
    years,
  }));
};

/**
 * Validates the headline filter. Only the year can be invalid: a module that
 * does not carry the item, or no module at all, contributes zero.
 */
export const resolveHeadlineInput = (
  input: HeadlineStatsInput
): Result<{ item: string | undefined; year: number | undefined }, InvalidFilterError> => {
  const item = optionalCode(input.item);

  if (input.year === undefined) {
    return ok({ item, year: undefined });
  }
  return checkYear('year', input.year).map((year) => ({ item, year }));
};
