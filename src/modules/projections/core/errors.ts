/**
 * Domain errors for the Projections module.
 */

import type { DatabaseError } from '@/common/types/errors.js';

export type FilterField = 'module' | 'variable' | 'region' | 'year' | 'yearStart' | 'yearEnd';

/** The filter cannot be answered; no partial data is returned */
export interface InvalidFilterError {
  readonly type: 'InvalidFilterError';
  readonly message: string;
  readonly field: FilterField;
  readonly value: string;
}

export type ProjectionError = InvalidFilterError | DatabaseError;

export const createInvalidFilterError = (
  field: FilterField,
  value: string | number,
  message: string
): InvalidFilterError => ({
  type: 'InvalidFilterError',
  message,
  field,
  value: String(value),
});

export const PROJECTION_ERROR_HTTP_STATUS: Record<ProjectionError['type'], number> = {
  InvalidFilterError: 400,
  DatabaseError: 500,
};
