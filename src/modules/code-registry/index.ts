/**
 * Code Registry Module - Public API
 *
 * Static lookup tables for GLOBIOM item, variable, unit and region codes.
 */

export { createCodeRegistry } from './core/registry.js';
export { loadCodeRegistry, parseCodeCatalogue } from './shell/catalogue-loader.js';
export {
  makeCodeRegistryRoutes,
  type MakeCodeRegistryRoutesDeps,
} from './shell/rest/routes.js';

export {
  MODULE_NAMES,
  isModuleName,
  CodeCatalogueSchema,
  UnitCodeSchema,
  type ModuleName,
  type UnitCode,
  type CodeCatalogue,
  type CodeRegistry,
  type ItemDefinition,
  type VariableDefinition,
  type RegionDefinition,
  type ModuleDefinition,
  type ModuleItem,
  type UnitLabel,
} from './core/types.js';

export { createCatalogueError, type CatalogueError } from './core/errors.js';
