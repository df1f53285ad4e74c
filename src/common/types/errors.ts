/**
 * Base error types shared by every module.
 * Module-specific errors live next to their module and reuse these shapes.
 */

/**
 * Base interface for all application errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Storage failure that is not caused by the data itself (connection, timeout, syntax).
 */
export interface DatabaseError extends AppError {
  readonly type: 'DatabaseError';
  readonly retryable: boolean;
}

/**
 * A write was refused by a relational constraint.
 * - foreign_key: the row is still referenced (e.g. deleting a region that has facts)
 * - unique: a strict insert collided with an existing natural key
 */
export interface IntegrityError extends AppError {
  readonly type: 'IntegrityError';
  readonly constraint: 'foreign_key' | 'unique';
  readonly detail?: string | undefined;
}

export type StoreError = DatabaseError | IntegrityError;

export const createDatabaseError = (message: string, cause?: unknown): DatabaseError => ({
  type: 'DatabaseError',
  message,
  retryable: true,
  cause,
});

export const createIntegrityError = (
  constraint: IntegrityError['constraint'],
  message: string,
  detail?: string
): IntegrityError => ({
  type: 'IntegrityError',
  message,
  constraint,
  ...(detail !== undefined && { detail }),
});

/** PostgreSQL SQLSTATE codes mapped to integrity violations */
const PG_FOREIGN_KEY_VIOLATION = '23503';
const PG_UNIQUE_VIOLATION = '23505';

const readStringField = (error: unknown, field: string): string | undefined => {
  if (typeof error !== 'object' || error === null || !(field in error)) {
    return undefined;
  }
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'string' ? value : undefined;
};

/**
 * Classifies a driver exception into a StoreError.
 * Constraint violations become IntegrityErrors; anything else is a DatabaseError.
 */
export const toStoreError = (message: string, error: unknown): StoreError => {
  const code = readStringField(error, 'code');
  const detail = readStringField(error, 'detail');

  if (code === PG_FOREIGN_KEY_VIOLATION) {
    return createIntegrityError('foreign_key', message, detail);
  }
  if (code === PG_UNIQUE_VIOLATION) {
    return createIntegrityError('unique', message, detail);
  }
  return createDatabaseError(message, error);
};
