/**
 * Reference Data Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

import type { DelimitedFileError } from '../../../infra/csv/index.js';

export type ReferenceDataError =
  | DelimitedFileError
  | { type: 'NotConfigured'; message: string; reference: string }
  | { type: 'SchemaValidationError'; message: string; details: string[] }
  | {
      type: 'InvalidReferenceValue';
      message: string;
      row: number;
      column: string;
      value: string;
    }
  | { type: 'ConflictingMapping'; message: string; source: string; targets: string[] };

export { formatSchemaErrors } from '../../../common/schema-errors.js';

export const createInvalidReferenceValueError = (
  row: number,
  column: string,
  value: string
): ReferenceDataError => ({
  type: 'InvalidReferenceValue',
  message: `Row ${String(row)}: invalid ${column} '${value}'`,
  row,
  column,
  value,
});
