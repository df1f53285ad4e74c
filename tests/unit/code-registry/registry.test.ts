/**
 * Unit tests for the Code Registry
 */

import { describe, expect, it } from 'vitest';

import { createCodeRegistry, type CodeCatalogue } from '@/modules/code-registry/index.js';

import { makeTestRegistry } from '../../fixtures/builders.js';

const makeCatalogue = (overrides: Partial<CodeCatalogue> = {}): CodeCatalogue => ({
  units: [
    { code: 'ha', label: 'Hectares', aliases: [{ label: '1000 ha', scale: '1000' }] },
    { code: 't', label: 'Tonnes', aliases: [] },
  ],
  variables: [
    { code: 'area', label: 'Area', unit: 'ha' },
    { code: 'prod', label: 'Production', unit: 't' },
    { code: 'land', label: 'Land', unit: 'ha' },
  ],
  modules: [
    { name: 'crop', label: 'Crop', variables: ['area', 'prod'], items: [{ code: 'wht', label: 'Wheat', category: 'cereals' }] },
    { name: 'animal', label: 'Animal', variables: ['prod'], items: [{ code: 'grs', label: 'Grazing', category: 'grassland' }] },
    { name: 'bioenergy', label: 'Bioenergy', variables: ['area'], items: [{ code: 'sgc', label: 'Sugarcane', category: 'energy_crops' }] },
    { name: 'landcover', label: 'Land Cover', variables: ['land'], items: [{ code: 'grs', label: 'Grassland', category: 'land_cover' }] },
  ],
  regions: [
    { code: 'usa', name: 'United States', description: '' },
    { code: 'bra', name: 'Brazil', description: '' },
  ],
  ...overrides,
});

describe('createCodeRegistry', () => {
  it('builds a registry from a consistent catalogue', () => {
    const result = createCodeRegistry(makeCatalogue());

    expect(result.isOk()).toBe(true);
    const registry = result._unsafeUnwrap();
    expect(registry.listRegions().map((r) => r.code)).toEqual(['bra', 'usa']);
  });

  it('rejects an (item, variable) pair claimed by two modules', () => {
    const catalogue = makeCatalogue();
    const [crop, animal, bioenergy, landcover] = catalogue.modules;
    if (crop === undefined || animal === undefined || bioenergy === undefined || landcover === undefined) {
      throw new Error('fixture has four modules');
    }

    const result = createCodeRegistry({
      ...catalogue,
      modules: [
        crop,
        { ...animal, items: [...animal.items, { code: 'wht', label: 'Wheat', category: 'cereals' }] },
        bioenergy,
        landcover,
      ],
    });

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().details).toContain(
      "Item 'wht' with variable 'prod' is claimed by both 'crop' and 'animal'"
    );
  });

  it('reports every missing module and unknown variable reference', () => {
    const catalogue = makeCatalogue();
    const result = createCodeRegistry({
      ...catalogue,
      modules: [
        { name: 'crop', label: 'Crop', variables: ['area', 'yild'], items: [] },
      ],
    });

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe('CatalogueError');
    expect(error.details).toEqual([
      "Module 'crop' references unknown variable 'yild'",
      "Module 'animal' is missing from the catalogue",
      "Module 'bioenergy' is missing from the catalogue",
      "Module 'landcover' is missing from the catalogue",
    ]);
  });

  it('rejects module names outside the fixed partitions', () => {
    const catalogue = makeCatalogue();
    const result = createCodeRegistry({
      ...catalogue,
      modules: [...catalogue.modules, { name: 'forestry', label: 'Forestry', variables: [], items: [] }],
    });

    expect(result._unsafeUnwrapErr().details).toEqual(["Unknown module 'forestry'"]);
  });

  it('rejects duplicate unit labels and region codes', () => {
    const catalogue = makeCatalogue();
    const result = createCodeRegistry({
      ...catalogue,
      units: [
        { code: 'ha', label: 'Hectares', aliases: [{ label: 'ha', scale: '1' }] },
        { code: 't', label: 'Tonnes', aliases: [] },
      ],
      regions: [
        { code: 'usa', name: 'United States', description: '' },
        { code: 'usa', name: 'USA', description: '' },
      ],
    });

    expect(result._unsafeUnwrapErr().details).toEqual([
      "Unit label 'ha' is declared more than once",
      "Region 'usa' is declared more than once",
    ]);
  });
});

describe('CodeRegistry lookups (shipped catalogue)', () => {
  const registry = makeTestRegistry();

  it('lists the four modules in partition order', () => {
    expect(registry.listModules().map((m) => m.name)).toEqual([
      'crop',
      'animal',
      'bioenergy',
      'landcover',
    ]);
  });

  it('resolves grs by variable: land cover for land, animal otherwise', () => {
    expect(registry.resolveModule('grs', 'land')).toBe('landcover');
    expect(registry.resolveModule('grs', 'prod')).toBe('animal');
    expect(registry.lookupItem('grs')?.modules).toEqual(['animal', 'landcover']);
  });

  it('returns undefined for pairs no module tracks', () => {
    expect(registry.resolveModule('wht', 'land')).toBeUndefined();
    expect(registry.resolveModule('sgc', 'feed')).toBeUndefined();
    expect(registry.resolveModule('xyz', 'area')).toBeUndefined();
  });

  it('maps variables to their canonical units', () => {
    expect(registry.canonicalUnit('area')).toBe('ha');
    expect(registry.canonicalUnit('prod')).toBe('t');
    expect(registry.canonicalUnit('yild')).toBe('t/ha');
    expect(registry.canonicalUnit('nope')).toBeUndefined();
  });

  it('parses canonical and scaled unit labels', () => {
    const scaled = registry.parseUnitLabel('1000 ha');
    expect(scaled?.unit).toBe('ha');
    expect(scaled?.scale.toString()).toBe('1000');

    expect(registry.parseUnitLabel('t/ha')?.scale.toString()).toBe('1');
    expect(registry.parseUnitLabel('1000 t/ha')).toBeUndefined();
    expect(registry.parseUnitLabel('HA')).toBeUndefined();
  });

  it('recognizes catalogue regions only', () => {
    expect(registry.isRecognizedRegion('usa')).toBe(true);
    expect(registry.isRecognizedRegion('USA')).toBe(false);
    expect(registry.lookupRegion('wld')?.name).toBe('World');
    expect(registry.listRegions()).toHaveLength(19);
  });

  it('answers module membership for items and variables', () => {
    expect(registry.moduleHasItem('crop', 'wht')).toBe(true);
    expect(registry.moduleHasItem('landcover', 'wht')).toBe(false);
    expect(registry.moduleHasVariable('animal', 'feed')).toBe(false);
    expect(registry.moduleHasVariable('crop', 'feed')).toBe(true);
  });
});
