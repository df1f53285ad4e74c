/**
 * Domain types for the Projections (aggregation) module.
 */

import type { ModuleName, UnitCode, VariableDefinition } from '@/modules/code-registry/index.js';
import type { Decimal } from 'decimal.js';

export const GROUP_BY_DIMENSIONS = ['year', 'item', 'region'] as const;

export type GroupBy = (typeof GROUP_BY_DIMENSIONS)[number];

/**
 * Filter as received from a caller. `item` and `region` accept 'all' for no filter.
 */
export interface ProjectionFilterInput {
  module: string;
  variable: string;
  item?: string | undefined;
  region?: string | undefined;
  year?: number | undefined;
  yearStart?: number | undefined;
  yearEnd?: number | undefined;
}

export interface YearRange {
  start: number;
  end: number;
}

/** A validated filter. A single year is a range with start = end. */
export interface ResolvedFilter {
  module: ModuleName;
  variable: VariableDefinition;
  item: string | undefined;
  region: string | undefined;
  years: YearRange | undefined;
}

/** A stored fact as read back from the store */
export interface FactRecord {
  externalId: string;
  region: string;
  regionName: string;
  year: number;
  item: string;
  variable: string;
  unit: string;
  value: Decimal;
}

export interface ProjectionRow extends FactRecord {
  itemLabel: string;
  variableLabel: string;
}

export type GroupKey = string | number;

export interface GroupSum {
  key: GroupKey;
  value: Decimal;
}

export interface AggregateResult {
  unit: UnitCode;
  groupBy: GroupBy;
  groups: GroupSum[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Headline statistics
// ─────────────────────────────────────────────────────────────────────────────

export const HEADLINE_VARIABLES = [
  { code: 'yild', label: 'Yield' },
  { code: 'cons', label: 'Total Consumption' },
  { code: 'nett', label: 'Net Trade' },
  { code: 'prod', label: 'Production' },
] as const;

export interface HeadlineStatsInput {
  year?: number | undefined;
  item?: string | undefined;
}

/** Scope shared by every module when summing headline variables */
export interface HeadlineScope {
  variables: readonly string[];
  year: number | undefined;
  item: string | undefined;
}

export interface HeadlineStat {
  variable: string;
  label: string;
  value: Decimal;
  unit: UnitCode;
}
