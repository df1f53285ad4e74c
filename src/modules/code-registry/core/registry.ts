/**
 * Builds the in-memory Code Registry from a validated catalogue.
 *
 * All lookup tables are constructed once here. Besides shape validation (done by
 * the loader) this checks the cross-references the schema cannot express:
 * every module is present exactly once, referenced variables exist, and no
 * (item, variable) pair is claimed by two modules.
 */

import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { createCatalogueError, type CatalogueError } from './errors.js';
import {
  MODULE_NAMES,
  isModuleName,
  type CodeCatalogue,
  type CodeRegistry,
  type ItemDefinition,
  type ModuleDefinition,
  type ModuleName,
  type RegionDefinition,
  type UnitCode,
  type UnitLabel,
  type VariableDefinition,
} from './types.js';

const pairKey = (item: string, variable: string): string => `${item}|${variable}`;

const collectUnitLabels = (catalogue: CodeCatalogue, problems: string[]): Map<string, UnitLabel> => {
  const labels = new Map<string, UnitLabel>();

  const register = (label: string, unit: UnitCode, scale: Decimal): void => {
    if (labels.has(label)) {
      problems.push(`Unit label '${label}' is declared more than once`);
      return;
    }
    labels.set(label, { unit, scale });
  };

  for (const unit of catalogue.units) {
    register(unit.code, unit.code, new Decimal(1));
    for (const alias of unit.aliases) {
      register(alias.label, unit.code, new Decimal(alias.scale));
    }
  }

  return labels;
};

const collectVariables = (
  catalogue: CodeCatalogue,
  problems: string[]
): Map<string, VariableDefinition> => {
  const variables = new Map<string, VariableDefinition>();
  const declaredUnits = new Set(catalogue.units.map((u) => u.code));

  for (const variable of catalogue.variables) {
    if (variables.has(variable.code)) {
      problems.push(`Variable '${variable.code}' is declared more than once`);
      continue;
    }
    if (!declaredUnits.has(variable.unit)) {
      problems.push(`Variable '${variable.code}' uses undeclared unit '${variable.unit}'`);
    }
    variables.set(variable.code, { ...variable });
  }

  return variables;
};

const collectRegions = (
  catalogue: CodeCatalogue,
  problems: string[]
): Map<string, RegionDefinition> => {
  const regions = new Map<string, RegionDefinition>();
  for (const region of catalogue.regions) {
    if (regions.has(region.code)) {
      problems.push(`Region '${region.code}' is declared more than once`);
      continue;
    }
    regions.set(region.code, { ...region });
  }
  return regions;
};

/**
 * Creates a CodeRegistry, or a CatalogueError listing every inconsistency found.
 */
export const createCodeRegistry = (
  catalogue: CodeCatalogue
): Result<CodeRegistry, CatalogueError> => {
  const problems: string[] = [];

  const unitLabels = collectUnitLabels(catalogue, problems);
  const variables = collectVariables(catalogue, problems);
  const regions = collectRegions(catalogue, problems);

  const modules = new Map<ModuleName, ModuleDefinition>();
  const items = new Map<string, ItemDefinition>();
  const pairOwners = new Map<string, ModuleName>();

  for (const entry of catalogue.modules) {
    if (!isModuleName(entry.name)) {
      problems.push(`Unknown module '${entry.name}'`);
      continue;
    }
    const moduleName = entry.name;
    if (modules.has(moduleName)) {
      problems.push(`Module '${moduleName}' is declared more than once`);
      continue;
    }

    const moduleVariables: VariableDefinition[] = [];
    for (const code of entry.variables) {
      const variable = variables.get(code);
      if (variable === undefined) {
        problems.push(`Module '${moduleName}' references unknown variable '${code}'`);
        continue;
      }
      moduleVariables.push(variable);
    }

    const seenItems = new Set<string>();
    for (const item of entry.items) {
      if (seenItems.has(item.code)) {
        problems.push(`Item '${item.code}' is listed twice in module '${moduleName}'`);
        continue;
      }
      seenItems.add(item.code);

      const existing = items.get(item.code);
      items.set(item.code, {
        code: item.code,
        // The first module to declare an item provides its label and category
        label: existing?.label ?? item.label,
        category: existing?.category ?? item.category,
        modules: [...(existing?.modules ?? []), moduleName],
      });

      for (const variable of moduleVariables) {
        const key = pairKey(item.code, variable.code);
        const owner = pairOwners.get(key);
        if (owner !== undefined) {
          problems.push(
            `Item '${item.code}' with variable '${variable.code}' is claimed by both '${owner}' and '${moduleName}'`
          );
          continue;
        }
        pairOwners.set(key, moduleName);
      }
    }

    modules.set(moduleName, {
      name: moduleName,
      label: entry.label,
      items: entry.items.map((item) => ({ ...item })),
      variables: moduleVariables,
    });
  }

  for (const name of MODULE_NAMES) {
    if (!modules.has(name)) {
      problems.push(`Module '${name}' is missing from the catalogue`);
    }
  }

  if (problems.length > 0) {
    return err(createCatalogueError('Code catalogue is inconsistent', problems));
  }

  const orderedModules = MODULE_NAMES.flatMap((name) => {
    const definition = modules.get(name);
    return definition !== undefined ? [definition] : [];
  });
  const orderedRegions = [...regions.values()].sort((a, b) => a.code.localeCompare(b.code));

  const getModule = (name: ModuleName): ModuleDefinition => {
    const definition = modules.get(name);
    if (definition === undefined) {
      // Unreachable: every module name was checked above
      throw new Error(`Module '${name}' is not registered`);
    }
    return definition;
  };

  const registry: CodeRegistry = {
    lookupItem: (code) => items.get(code),
    resolveModule: (item, variable) => pairOwners.get(pairKey(item, variable)),
    lookupVariable: (code) => variables.get(code),
    canonicalUnit: (variable) => variables.get(variable)?.unit,
    parseUnitLabel: (label) => unitLabels.get(label),
    lookupRegion: (code) => regions.get(code),
    isRecognizedRegion: (code) => regions.has(code),
    getModule,
    moduleHasItem: (module, item) => items.get(item)?.modules.includes(module) ?? false,
    moduleHasVariable: (module, variable) =>
      getModule(module).variables.some((v) => v.code === variable),
    listModules: () => orderedModules,
    listRegions: () => orderedRegions,
  };

  return ok(Object.freeze(registry));
};
