/**
 * Grid Mapping Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 * Every error is fatal for the pipeline run that produced it.
 */

import type { FactField } from './types.js';
import type { DelimitedFileError } from '../../../infra/csv/index.js';
import type { ReferenceDataError } from '../../reference-data/index.js';

export type GridMappingError =
  | DelimitedFileError
  | { type: 'SchemaValidationError'; message: string; details: string[] }
  | { type: 'InvalidFactRow'; message: string; row: number; fieldCount: number }
  | { type: 'InvalidFactValue'; message: string; row: number; field: FactField; value: string }
  | { type: 'MissingTaxonomy'; message: string }
  | { type: 'UnmappedCategory'; message: string; categories: string[] }
  | { type: 'DomainNotConfigured'; message: string; domain: string }
  | { type: 'WriteError'; message: string; path: string };

/**
 * Any error a pipeline run can end with.
 */
export type PipelineError = GridMappingError | ReferenceDataError;

export const createInvalidFactValueError = (
  row: number,
  field: FactField,
  value: string
): GridMappingError => ({
  type: 'InvalidFactValue',
  message: `Fact row ${String(row)}: cannot read ${field} '${value}'`,
  row,
  field,
  value,
});

export const createUnmappedCategoryError = (categories: string[]): GridMappingError => ({
  type: 'UnmappedCategory',
  message: `No target category for: ${categories.join(', ')}`,
  categories,
});

/**
 * Renders an error for logs and CLI output, including validation details.
 */
export const describePipelineError = (error: PipelineError): string => {
  if (error.type === 'SchemaValidationError' && error.details.length > 0) {
    return `${error.message}\n  - ${error.details.join('\n  - ')}`;
  }
  return error.message;
};
