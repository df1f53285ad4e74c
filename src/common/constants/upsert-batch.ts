/** PostgreSQL accepts at most this many bind parameters in one statement */
export const MAX_BIND_PARAMETERS = 65_535;

/** Bind parameters one fact row takes in the batch upsert */
export const FACT_UPSERT_PARAMETERS = 7;

/** Most facts a single upsert statement can carry (9362) */
export const MAX_UPSERT_BATCH_SIZE = Math.floor(MAX_BIND_PARAMETERS / FACT_UPSERT_PARAMETERS);
