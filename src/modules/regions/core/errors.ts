/**
 * Domain error types for the Regions module.
 */

import type { DatabaseError, IntegrityError } from '@/common/types/errors.js';

export interface RegionNotFoundError {
  readonly type: 'RegionNotFoundError';
  readonly message: string;
  readonly code: string;
}

export interface InvalidRegionError {
  readonly type: 'InvalidRegionError';
  readonly message: string;
  readonly field: 'code' | 'name';
}

export type RegionError = DatabaseError | IntegrityError | RegionNotFoundError | InvalidRegionError;

export const createRegionNotFoundError = (code: string): RegionNotFoundError => ({
  type: 'RegionNotFoundError',
  message: `Region '${code}' not found`,
  code,
});

export const createInvalidRegionError = (
  field: InvalidRegionError['field'],
  message: string
): InvalidRegionError => ({
  type: 'InvalidRegionError',
  message,
  field,
});

export const REGION_ERROR_HTTP_STATUS: Record<RegionError['type'], number> = {
  DatabaseError: 500,
  IntegrityError: 409,
  RegionNotFoundError: 404,
  InvalidRegionError: 400,
};
