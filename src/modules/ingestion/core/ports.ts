/**
 * Port interfaces for the Ingestion module.
 */

import type { FactWrite, UpsertOutcome } from './types.js';
import type { StoreError } from '@/common/types/errors.js';
import type { ModuleName } from '@/modules/code-registry/index.js';
import type { Result } from 'neverthrow';

export interface FactWriter {
  /**
   * Upserts one batch into the module's partition as a single statement.
   * Existing rows keep their external id; `value` is rewritten only when it differs.
   * Keys must be unique within the batch.
   */
  upsertFacts(module: ModuleName, facts: readonly FactWrite[]): Promise<Result<UpsertOutcome, StoreError>>;

  /** @returns number of rows deleted */
  clearFacts(module: ModuleName): Promise<Result<number, StoreError>>;
}
