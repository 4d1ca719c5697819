import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { parseDecimal, parseInteger } from '../../../common/numbers.js';
import { createInvalidFactValueError, type GridMappingError } from './errors.js';
import { FACT_FIELDS, type FactRecord, type RawFactRow } from './types.js';

/**
 * Published placeholders that are read as zero before numeric coercion:
 * "-" (no data) and "..." (not applicable).
 */
export const ZERO_FILL_SENTINELS: ReadonlySet<string> = new Set(['-', '...']);

/**
 * Names the fourteen positional fields of a fact row.
 * @param row - 1-based data row number, used in errors
 */
export const toRawFactRow = (
  fields: readonly string[],
  row: number
): Result<RawFactRow, GridMappingError> => {
  if (fields.length !== FACT_FIELDS.length) {
    return err({
      type: 'InvalidFactRow',
      message: `Fact row ${String(row)}: expected ${String(FACT_FIELDS.length)} fields, got ${String(fields.length)}`,
      row,
      fieldCount: fields.length,
    });
  }

  const at = (index: number): string => fields[index] ?? '';

  return ok({
    territorialLevelCode: at(0),
    territorialLevelName: at(1),
    unitCode: at(2),
    unitName: at(3),
    value: at(4),
    municipalityCode: at(5),
    municipalityName: at(6),
    variableCode: at(7),
    variableName: at(8),
    yearCode: at(9),
    yearName: at(10),
    categoryCode: at(11),
    categoryName: at(12),
    year: at(13),
  });
};

/**
 * Reads a published value, zero-filling the sentinels.
 * Returns null when the value is neither a sentinel nor a number.
 */
export const parseFactValue = (raw: string): Decimal | null => {
  const value = raw.trim();
  if (ZERO_FILL_SENTINELS.has(value)) {
    return new Decimal(0);
  }
  return parseDecimal(value);
};

export const cleanFactRow = (raw: RawFactRow, row: number): Result<FactRecord, GridMappingError> => {
  const value = parseFactValue(raw.value);
  if (value === null) {
    return err(createInvalidFactValueError(row, 'value', raw.value));
  }

  const municipalityCode = parseInteger(raw.municipalityCode);
  if (municipalityCode === null) {
    return err(createInvalidFactValueError(row, 'municipalityCode', raw.municipalityCode));
  }

  const year = parseInteger(raw.year);
  if (year === null) {
    return err(createInvalidFactValueError(row, 'year', raw.year));
  }

  return ok({
    municipalityCode,
    categoryName: raw.categoryName,
    year,
    value,
  });
};

/**
 * Cleans every fact row, stopping at the first one that cannot be read.
 */
export const cleanFactRows = (
  rows: readonly (readonly string[])[]
): Result<FactRecord[], GridMappingError> => {
  const facts: FactRecord[] = [];

  for (const [i, fields] of rows.entries()) {
    const rowNumber = i + 1;

    const rawResult = toRawFactRow(fields, rowNumber);
    if (rawResult.isErr()) {
      return err(rawResult.error);
    }

    const cleaned = cleanFactRow(rawResult.value, rowNumber);
    if (cleaned.isErr()) {
      return err(cleaned.error);
    }

    facts.push(cleaned.value);
  }

  return ok(facts);
};
