/**
 * CSV source for projection rows.
 *
 * The header is read eagerly so a missing column fails before any row is
 * processed. Extra columns are ignored, empty lines skipped, cells trimmed.
 */

import fs from 'node:fs';

import { parse } from 'csv-parse';
import { err, ok, type Result } from 'neverthrow';

import {
  createInvalidHeaderError,
  createSourceReadError,
  type IngestionError,
} from '../../core/errors.js';
import { RAW_RECORD_FIELDS, type RawRecord, type RawRecordField, type SourceRow } from '../../core/types.js';

import type { Readable } from 'node:stream';

type ColumnPositions = Record<RawRecordField, number>;

const toCells = (record: unknown): string[] =>
  Array.isArray(record) ? record.map((cell) => String(cell)) : [];

const locateColumns = (header: readonly string[]): Result<ColumnPositions, IngestionError> => {
  const normalized = header.map((name) => name.trim().toLowerCase());
  const missing = RAW_RECORD_FIELDS.filter((field) => !normalized.includes(field));
  if (missing.length > 0) {
    return err(createInvalidHeaderError(missing));
  }

  const position = (field: RawRecordField): number => normalized.indexOf(field);
  return ok({
    region: position('region'),
    year: position('year'),
    item: position('item'),
    variable: position('variable'),
    unit: position('unit'),
    value: position('value'),
  });
};

const toRawRecord = (cells: readonly string[], columns: ColumnPositions): RawRecord => {
  const cell = (field: RawRecordField): string => cells[columns[field]] ?? '';
  return {
    region: cell('region'),
    year: cell('year'),
    item: cell('item'),
    variable: cell('variable'),
    unit: cell('unit'),
    value: cell('value'),
  };
};

async function* readDataRows(
  records: AsyncIterator<unknown>,
  columns: ColumnPositions
): AsyncGenerator<SourceRow> {
  let index = 0;
  for (;;) {
    const next = await records.next();
    if (next.done === true) return;
    index += 1;
    yield { index, record: toRawRecord(toCells(next.value), columns) };
  }
}

/**
 * Opens a CSV stream of projection rows.
 * Fails with InvalidHeaderError when a required column is absent (or the stream is empty).
 */
export const openProjectionCsv = async (
  input: Readable
): Promise<Result<AsyncIterable<SourceRow>, IngestionError>> => {
  const parser = parse({
    bom: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  input.on('error', (error) => parser.destroy(error));
  input.pipe(parser);

  const records: AsyncIterator<unknown> = parser[Symbol.asyncIterator]();

  let first: IteratorResult<unknown>;
  try {
    first = await records.next();
  } catch (error) {
    return err(createSourceReadError('Failed to read CSV header', error));
  }

  if (first.done === true) {
    return err(createInvalidHeaderError(RAW_RECORD_FIELDS));
  }

  const columns = locateColumns(toCells(first.value));
  if (columns.isErr()) {
    parser.destroy();
    input.destroy();
    return err(columns.error);
  }

  return ok(readDataRows(records, columns.value));
};

/**
 * Opens a CSV file of projection rows.
 */
export const openProjectionCsvFile = async (
  filePath: string
): Promise<Result<AsyncIterable<SourceRow>, IngestionError>> => {
  try {
    await fs.promises.access(filePath, fs.constants.R_OK);
  } catch (error) {
    return err(createSourceReadError(`Cannot read CSV file at ${filePath}`, error));
  }
  return openProjectionCsv(fs.createReadStream(filePath));
};
