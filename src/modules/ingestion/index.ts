/**
 * Ingestion Module - Public API
 *
 * Row normalization, batched idempotent upserts and the CSV source.
 */

// =============================================================================
// Core
// =============================================================================
export { normalizeRow } from './core/normalize-row.js';
export {
  ingestRecords,
  type IngestRecordsDeps,
  type IngestRecordsInput,
} from './core/usecases/ingest-records.js';
export type { FactWriter } from './core/ports.js';

// =============================================================================
// Shell
// =============================================================================
export { openProjectionCsv, openProjectionCsvFile } from './shell/csv/csv-source.js';
export { makeFactWriter, buildUpsertFactsQuery } from './shell/repo/fact-writer-repo.js';
export { parseIngestArgs, INGEST_USAGE, type IngestCliOptions } from './shell/cli/parse-args.js';

// =============================================================================
// Types & Errors
// =============================================================================
export {
  RAW_RECORD_FIELDS,
  emptyOutcome,
  type RawRecord,
  type RawRecordField,
  type SourceRow,
  type NormalizedFact,
  type RejectionReason,
  type RowRejection,
  type RejectedRow,
  type FactWrite,
  type UpsertOutcome,
  type IngestionOptions,
  type IngestionSummary,
} from './core/types.js';
export {
  createInvalidHeaderError,
  createSourceReadError,
  type IngestionError,
  type InvalidHeaderError,
  type SourceReadError,
} from './core/errors.js';
