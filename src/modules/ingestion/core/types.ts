/**
 * Domain types for the Ingestion module.
 */

import type { ModuleName, UnitCode } from '@/modules/code-registry/index.js';
import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Source rows
// ─────────────────────────────────────────────────────────────────────────────

/** One source row as read from a file, every field still a raw string */
export interface RawRecord {
  region: string;
  year: string;
  item: string;
  variable: string;
  unit: string;
  value: string;
}

export const RAW_RECORD_FIELDS = ['region', 'year', 'item', 'variable', 'unit', 'value'] as const;

export type RawRecordField = (typeof RAW_RECORD_FIELDS)[number];

export interface SourceRow {
  /** 1-based position among the data rows of the source */
  index: number;
  record: RawRecord;
}

// ─────────────────────────────────────────────────────────────────────────────
// Normalization
// ─────────────────────────────────────────────────────────────────────────────

export interface NormalizedFact {
  module: ModuleName;
  region: string;
  year: number;
  item: string;
  variable: string;
  /** Always the canonical unit of `variable` */
  unit: UnitCode;
  /** Value expressed in the canonical unit */
  value: Decimal;
}

export type RejectionReason =
  | 'unknown_region'
  | 'year_out_of_range'
  | 'unknown_item'
  | 'unknown_variable'
  | 'variable_not_allowed'
  | 'unit_mismatch'
  | 'non_numeric_value'
  | 'value_out_of_range';

export interface RowRejection {
  reason: RejectionReason;
  field: RawRecordField;
  value: string;
  message: string;
}

export interface RejectedRow extends RowRejection {
  row: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Writes
// ─────────────────────────────────────────────────────────────────────────────

/** A fact ready for the store, region already resolved to its key */
export interface FactWrite {
  regionId: number;
  year: number;
  item: string;
  variable: string;
  unit: UnitCode;
  value: Decimal;
}

export interface UpsertOutcome {
  inserted: number;
  updated: number;
  unchanged: number;
}

export const emptyOutcome = (): UpsertOutcome => ({ inserted: 0, updated: 0, unchanged: 0 });

// ─────────────────────────────────────────────────────────────────────────────
// Run
// ─────────────────────────────────────────────────────────────────────────────

export interface IngestionOptions {
  batchSize: number;
  /** Only these modules are written; rows of other modules are skipped */
  modules?: readonly ModuleName[];
  /** Delete the facts of the targeted modules before ingesting */
  clear?: boolean;
}

export interface IngestionSummary {
  totalRows: number;
  accepted: number;
  rejected: number;
  skipped: number;
  rejections: RejectedRow[];
  /** Rows removed per module by `clear` */
  cleared: Partial<Record<ModuleName, number>>;
  modules: Record<ModuleName, UpsertOutcome>;
}
