// Table names follow the SQL schema (snake_case)

import type { ModuleName } from '@/modules/code-registry/index.js';
import type { ColumnType, Generated } from 'kysely';

// Helper for timestamps which can be strings or Dates depending on driver config
export type Timestamp = ColumnType<Date, Date | string, Date | string>;

/**
 * NUMERIC columns are returned by node-postgres as strings to keep precision.
 * Writes accept the decimal string form as well.
 */
export type Numeric = ColumnType<string, string, string>;

// Regions Table
export interface Regions {
  id: Generated<number>;
  code: string;
  name: string;
  description: Generated<string>;
}

// Fact tables (identical layout, one per module)
export interface ProjectionFacts {
  id: Generated<number>;
  external_id: string;
  region_id: number;
  year: number;
  item: string;
  variable: string;
  unit: string;
  value: Numeric;
  created_at: Generated<Timestamp>;
  updated_at: Generated<Timestamp>;
}

// Read-only union view over the four partitions
export interface ProjectionFactsView {
  module: ModuleName;
  external_id: string;
  region_id: number;
  year: number;
  item: string;
  variable: string;
  unit: string;
  value: string;
}

export interface ProjectionsDatabase {
  regions: Regions;
  crop_projections: ProjectionFacts;
  animal_projections: ProjectionFacts;
  bioenergy_projections: ProjectionFacts;
  land_cover_projections: ProjectionFacts;
  projection_facts: ProjectionFactsView;
}

export type FactTableName = Exclude<keyof ProjectionsDatabase, 'regions' | 'projection_facts'>;

/** Module → partition table */
export const FACT_TABLES: Readonly<Record<ModuleName, FactTableName>> = {
  crop: 'crop_projections',
  animal: 'animal_projections',
  bioenergy: 'bioenergy_projections',
  landcover: 'land_cover_projections',
};
