/**
 * Domain types for the Code Registry module.
 *
 * The registry is the closed vocabulary of GLOBIOM output: which items belong
 * to which module, which unit each variable is measured in, and which region
 * codes exist. It is loaded once at startup and never mutated.
 */

import { Type, type Static } from '@sinclair/typebox';

import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Modules and units
// ─────────────────────────────────────────────────────────────────────────────

/** Fact partitions, one per commodity domain */
export const MODULE_NAMES = ['crop', 'animal', 'bioenergy', 'landcover'] as const;

export type ModuleName = (typeof MODULE_NAMES)[number];

export const isModuleName = (value: string): value is ModuleName =>
  (MODULE_NAMES as readonly string[]).includes(value);

export const UnitCodeSchema = Type.Union([
  Type.Literal('ha'),
  Type.Literal('t'),
  Type.Literal('t/ha'),
]);

export type UnitCode = Static<typeof UnitCodeSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Catalogue file schema
// ─────────────────────────────────────────────────────────────────────────────

const CodeSchema = Type.String({ minLength: 1, maxLength: 10, pattern: '^[a-z0-9_/]+$' });

export const CodeCatalogueSchema = Type.Object({
  units: Type.Array(
    Type.Object({
      code: UnitCodeSchema,
      label: Type.String(),
      aliases: Type.Array(
        Type.Object({
          label: Type.String({ minLength: 1 }),
          scale: Type.String({ pattern: '^[0-9]+(\\.[0-9]+)?$' }),
        })
      ),
    })
  ),
  variables: Type.Array(
    Type.Object({
      code: CodeSchema,
      label: Type.String(),
      unit: UnitCodeSchema,
    })
  ),
  modules: Type.Array(
    Type.Object({
      name: Type.String(),
      label: Type.String(),
      variables: Type.Array(CodeSchema),
      items: Type.Array(
        Type.Object({
          code: CodeSchema,
          label: Type.String(),
          category: Type.String(),
        })
      ),
    })
  ),
  regions: Type.Array(
    Type.Object({
      code: CodeSchema,
      name: Type.String({ minLength: 1 }),
      description: Type.String(),
    })
  ),
});

export type CodeCatalogue = Static<typeof CodeCatalogueSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Lookup results
// ─────────────────────────────────────────────────────────────────────────────

export interface ItemDefinition {
  code: string;
  label: string;
  category: string;
  /** Modules that list this item. More than one only when variables disambiguate (grs). */
  modules: readonly ModuleName[];
}

export interface VariableDefinition {
  code: string;
  label: string;
  unit: UnitCode;
}

export interface RegionDefinition {
  code: string;
  name: string;
  description: string;
}

export interface ModuleItem {
  code: string;
  label: string;
  category: string;
}

export interface ModuleDefinition {
  name: ModuleName;
  label: string;
  items: readonly ModuleItem[];
  variables: readonly VariableDefinition[];
}

/**
 * A unit label as it appears in source files.
 * `1000 ha` parses to { unit: 'ha', scale: 1000 }.
 */
export interface UnitLabel {
  unit: UnitCode;
  scale: Decimal;
}

/**
 * Read-only lookups over the catalogue.
 * Misses return undefined; nothing here throws.
 */
export interface CodeRegistry {
  lookupItem(code: string): ItemDefinition | undefined;
  /** Owning module of an (item, variable) pair. */
  resolveModule(item: string, variable: string): ModuleName | undefined;
  lookupVariable(code: string): VariableDefinition | undefined;
  canonicalUnit(variable: string): UnitCode | undefined;
  parseUnitLabel(label: string): UnitLabel | undefined;
  lookupRegion(code: string): RegionDefinition | undefined;
  isRecognizedRegion(code: string): boolean;
  getModule(name: ModuleName): ModuleDefinition;
  moduleHasItem(module: ModuleName, item: string): boolean;
  moduleHasVariable(module: ModuleName, variable: string): boolean;
  listModules(): readonly ModuleDefinition[];
  listRegions(): readonly RegionDefinition[];
}
