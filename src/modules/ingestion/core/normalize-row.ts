/**
 * Row Normalizer
 *
 * Turns a raw source row into a fact in canonical codes and units, or explains
 * why it cannot. Checks run in a fixed order and the first failure wins:
 * region, year, item, variable (and unit), value.
 *
 * Values are kept exact: no significant digit is dropped by scaling, and a value
 * the store cannot hold is rejected instead of rounded.
 */

import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import {
  MAX_PROJECTION_YEAR,
  MIN_PROJECTION_YEAR,
  isProjectionYear,
} from '@/common/constants/projection-years.js';

import type { NormalizedFact, RawRecord, RawRecordField, RejectionReason, RowRejection } from './types.js';
import type { CodeRegistry } from '@/modules/code-registry/index.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;

// Plain decimal literals only. Decimal.js would also take hex, binary and Infinity.
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(?:[eE]([+-]?\d+))?$/;

// Larger exponents are out of range and are never handed to Decimal.js,
// which would overflow them to Infinity or underflow them to zero.
const MAX_EXPONENT_LITERAL = 1_000_000;

// PostgreSQL NUMERIC limits: digits before and after the decimal point.
const MAX_INTEGER_DIGITS = 131_072;
const MAX_FRACTION_DIGITS = 16_383;

// Full precision so scaling never rounds.
const ExactDecimal = Decimal.clone({ precision: 1e9 });

const reject = (
  reason: RejectionReason,
  field: RawRecordField,
  value: string,
  message: string
): Result<never, RowRejection> => err({ reason, field, value, message });

export const normalizeRow = (
  registry: CodeRegistry,
  record: RawRecord
): Result<NormalizedFact, RowRejection> => {
  const region = record.region.trim();
  const yearText = record.year.trim();
  const item = record.item.trim();
  const variableCode = record.variable.trim();
  const unitLabel = record.unit.trim();
  const valueText = record.value.trim();

  if (!registry.isRecognizedRegion(region)) {
    return reject('unknown_region', 'region', region, `Unknown region code '${region}'`);
  }

  const year = INTEGER_PATTERN.test(yearText) ? Number(yearText) : Number.NaN;
  if (!isProjectionYear(year)) {
    return reject(
      'year_out_of_range',
      'year',
      yearText,
      `Year '${yearText}' is not an integer between ${String(MIN_PROJECTION_YEAR)} and ${String(MAX_PROJECTION_YEAR)}`
    );
  }

  if (registry.lookupItem(item) === undefined) {
    return reject('unknown_item', 'item', item, `Unknown item code '${item}'`);
  }

  const variable = registry.lookupVariable(variableCode);
  if (variable === undefined) {
    return reject('unknown_variable', 'variable', variableCode, `Unknown variable code '${variableCode}'`);
  }

  const module = registry.resolveModule(item, variable.code);
  if (module === undefined) {
    return reject(
      'variable_not_allowed',
      'variable',
      variableCode,
      `Variable '${variableCode}' is not tracked for item '${item}'`
    );
  }

  const unit = registry.parseUnitLabel(unitLabel);
  if (unit === undefined || unit.unit !== variable.unit) {
    return reject(
      'unit_mismatch',
      'unit',
      unitLabel,
      `Unit '${unitLabel}' does not match unit '${variable.unit}' of variable '${variable.code}'`
    );
  }

  const literal = DECIMAL_PATTERN.exec(valueText);
  if (literal === null) {
    return reject('non_numeric_value', 'value', valueText, `Value '${valueText}' is not a number`);
  }

  const exponent = literal[2];
  const value =
    exponent !== undefined && Math.abs(Number(exponent)) > MAX_EXPONENT_LITERAL
      ? undefined
      : new ExactDecimal(valueText).mul(unit.scale);

  if (
    value === undefined ||
    !value.isFinite() ||
    value.e >= MAX_INTEGER_DIGITS ||
    value.decimalPlaces() > MAX_FRACTION_DIGITS
  ) {
    return reject(
      'value_out_of_range',
      'value',
      valueText,
      `Value '${valueText}' is outside the range of a stored number`
    );
  }

  return ok({
    module,
    region,
    year,
    item,
    variable: variable.code,
    unit: variable.unit,
    value,
  });
};
