/**
 * Loads the code catalogue JSON file and builds the registry.
 */

import fs from 'node:fs';

import { Value } from '@sinclair/typebox/value';
import { err, fromThrowable, ok, type Result } from 'neverthrow';

import { createCatalogueError, type CatalogueError } from '../core/errors.js';
import { createCodeRegistry } from '../core/registry.js';
import { CodeCatalogueSchema, type CodeCatalogue, type CodeRegistry } from '../core/types.js';

const safeJsonParse = fromThrowable(
  (content: string): unknown => JSON.parse(content),
  (error) => error
);

const safeReadFile = fromThrowable(
  (filePath: string): string => fs.readFileSync(filePath, 'utf-8'),
  (error) => error
);

/**
 * Validates an already-parsed catalogue object against the schema.
 */
export const parseCodeCatalogue = (raw: unknown): Result<CodeCatalogue, CatalogueError> => {
  if (!Value.Check(CodeCatalogueSchema, raw)) {
    const details = [...Value.Errors(CodeCatalogueSchema, raw)].map(
      (e) => `${e.path}: ${e.message}`
    );
    return err(createCatalogueError('Code catalogue does not match the expected schema', details));
  }
  return ok(raw);
};

/**
 * Reads, validates and indexes the catalogue at `filePath`.
 */
export const loadCodeRegistry = (filePath: string): Result<CodeRegistry, CatalogueError> => {
  return safeReadFile(filePath)
    .mapErr((error) => createCatalogueError(`Cannot read code catalogue at ${filePath}`, [], error))
    .andThen((content) =>
      safeJsonParse(content).mapErr((error) =>
        createCatalogueError(`Code catalogue at ${filePath} is not valid JSON`, [], error)
      )
    )
    .andThen(parseCodeCatalogue)
    .andThen(createCodeRegistry);
};
