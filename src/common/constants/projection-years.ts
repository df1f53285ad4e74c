/** Inclusive range of projection years accepted by ingestion and query filters */
export const MIN_PROJECTION_YEAR = 2000;
export const MAX_PROJECTION_YEAR = 2040;

export const isProjectionYear = (year: number): boolean =>
  Number.isInteger(year) && year >= MIN_PROJECTION_YEAR && year <= MAX_PROJECTION_YEAR;
