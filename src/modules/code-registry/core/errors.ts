/**
 * Domain errors for the Code Registry module.
 */

export interface CatalogueError {
  readonly type: 'CatalogueError';
  readonly message: string;
  readonly details: readonly string[];
  readonly cause?: unknown;
}

export const createCatalogueError = (
  message: string,
  details: readonly string[] = [],
  cause?: unknown
): CatalogueError => ({
  type: 'CatalogueError',
  message,
  details,
  ...(cause !== undefined && { cause }),
});
