/**
 * Domain errors for the Ingestion module.
 * Row-level problems are not errors: they are collected as RowRejections.
 */

import type { RawRecordField } from './types.js';
import type { DatabaseError, IntegrityError } from '@/common/types/errors.js';

export interface InvalidHeaderError {
  readonly type: 'InvalidHeaderError';
  readonly message: string;
  readonly missingColumns: readonly RawRecordField[];
}

export interface SourceReadError {
  readonly type: 'SourceReadError';
  readonly message: string;
  readonly cause?: unknown;
}

export type IngestionError = DatabaseError | IntegrityError | InvalidHeaderError | SourceReadError;

export const createInvalidHeaderError = (
  missingColumns: readonly RawRecordField[]
): InvalidHeaderError => ({
  type: 'InvalidHeaderError',
  message: `Source header is missing required columns: ${missingColumns.join(', ')}`,
  missingColumns,
});

export const createSourceReadError = (message: string, cause?: unknown): SourceReadError => ({
  type: 'SourceReadError',
  message,
  ...(cause !== undefined && { cause }),
});
